import type { Network } from "../shared/config.js";
import { ConfigError } from "../shared/errors.js";
import {
	type AccountAddress,
	type DelegateId,
	accountAddress,
	delegateId,
} from "../shared/identifiers.js";
import type { SigningCapability } from "../wallet/signing-capability.js";

/**
 * Everything network- and wallet-specific the engine needs, fixed at startup.
 * Built once and passed in; nothing reads a process-wide mode later.
 */
export interface RuntimeContext {
	readonly network: Network;
	readonly walletAddress: AccountAddress;
	readonly signer: SigningCapability;
	readonly defaultDelegate: DelegateId | null;
}

export interface RuntimeContextInput {
	readonly network: Network;
	readonly walletAddress: string | undefined;
	readonly signer: SigningCapability;
	readonly defaultDelegate?: string | undefined;
}

/**
 * Validates and freezes the runtime context.
 * @throws ConfigError when the wallet address is missing
 */
export function createRuntimeContext(input: RuntimeContextInput): RuntimeContext {
	const wallet = input.walletAddress?.trim();
	if (!wallet) {
		throw new ConfigError("A wallet address is required", { network: input.network });
	}
	const fallback = input.defaultDelegate?.trim();
	return Object.freeze({
		network: input.network,
		walletAddress: accountAddress(wallet),
		signer: input.signer,
		defaultDelegate: fallback ? delegateId(fallback) : null,
	});
}
