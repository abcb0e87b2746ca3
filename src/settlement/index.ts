export { decodeSettlement, failed, failureFromError } from "./decoder.js";
export {
	type DecodeContext,
	type FailedResult,
	type SettledResult,
	SettlementKind,
	type SettlementResult,
	type StakeReceipt,
} from "./types.js";
