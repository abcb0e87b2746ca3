export { ChainGateway, type ChainGatewayConfig } from "./chain-gateway.js";
export {
	PaperChainClient,
	type PaperChainConfig,
	type SubmissionRecord,
} from "./paper-chain-client.js";
export type { BlockNotification, ChainClient, SubmitOptions } from "./types.js";
