/**
 * Opaque signing capability: key material never leaks through toString,
 * JSON.stringify, Node.js inspect or the logger.
 *
 * The staking core only passes the handle through to the chain client; the
 * chain client is the one place that unwraps it.
 */

import { SystemError } from "../shared/errors.js";
import type { AccountAddress } from "../shared/identifiers.js";

/** Key holder behind the capability, supplied by the wallet. */
export interface Signer {
	/** Coldkey address the signer signs for */
	readonly address: AccountAddress;
	sign(payload: Uint8Array): Promise<Uint8Array>;
}

const REDACTED = "[REDACTED]";

// ── Private store ────────────────────────────────────────────────────

const store = new WeakMap<SigningCapability, Signer>();

export class SigningCapability {
	readonly __opaque = true as const;

	private constructor() {}

	/** @internal Use createSigningCapability. */
	static seal(signer: Signer): SigningCapability {
		const capability = new SigningCapability();
		store.set(capability, signer);
		return Object.freeze(capability);
	}

	toString(): string {
		return REDACTED;
	}

	toJSON(): string {
		return REDACTED;
	}

	[Symbol.for("nodejs.util.inspect.custom")](): string {
		return REDACTED;
	}
}

// ── Factory ──────────────────────────────────────────────────────────

/**
 * Seals a signer into an opaque capability.
 *
 * @example
 * const signer = createSigningCapability(walletSigner);
 * logger.info({ signer }, "Ready"); // signer: "[REDACTED]"
 */
export function createSigningCapability(signer: Signer): SigningCapability {
	return SigningCapability.seal(signer);
}

// ── Accessor ─────────────────────────────────────────────────────────

/**
 * Retrieves the signer behind a capability. Chain clients only.
 * @throws SystemError if the capability was not created by createSigningCapability
 */
export function unwrapSigningCapability(capability: SigningCapability): Signer {
	const signer = store.get(capability);
	if (!signer) {
		throw new SystemError("Invalid signing capability");
	}
	return signer;
}
