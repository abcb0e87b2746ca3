/**
 * Domain primitive identifiers: branded types for compile-time safety.
 *
 * A subnet id is a number on chain and a string key in maps and files; the
 * brands keep extrinsic hashes, block hashes and account addresses from being
 * swapped for one another.
 */

// ── Brand infrastructure ─────────────────────────────────────────────

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ── Identifier types ─────────────────────────────────────────────────

/** Subnet number (netuid). */
export type SubnetId = Brand<number, "SubnetId">;
/** Hash of a submitted extrinsic; the ledger's idempotency key. */
export type ExtrinsicId = Brand<string, "ExtrinsicId">;
/** Hash of the block an extrinsic was included in. */
export type BlockHash = Brand<string, "BlockHash">;
/** SS58 address of a validator hotkey receiving the stake. */
export type DelegateId = Brand<string, "DelegateId">;
/** SS58 address of the wallet coldkey paying for the stake. */
export type AccountAddress = Brand<string, "AccountAddress">;

// ── Factory functions with validation ────────────────────────────────

function createBrandedId<B extends string>(value: string, label: B): Brand<string, B> {
	const trimmed = value.trim();
	if (trimmed.length === 0) {
		throw new Error(`${label} cannot be empty`);
	}
	return trimmed as Brand<string, B>;
}

/** Create a SubnetId. Throws unless the value is a non-negative safe integer. */
export function subnetId(value: number): SubnetId {
	if (!Number.isSafeInteger(value) || value < 0) {
		throw new Error(`SubnetId must be a non-negative integer, got ${value}`);
	}
	return value as SubnetId;
}

/** Create a validated ExtrinsicId from a raw string. Throws if empty. */
export function extrinsicId(value: string): ExtrinsicId {
	return createBrandedId(value, "ExtrinsicId");
}

/** Create a validated BlockHash from a raw string. Throws if empty. */
export function blockHash(value: string): BlockHash {
	return createBrandedId(value, "BlockHash");
}

/** Create a validated DelegateId from a raw string. Throws if empty. */
export function delegateId(value: string): DelegateId {
	return createBrandedId(value, "DelegateId");
}

/** Create a validated AccountAddress from a raw string. Throws if empty. */
export function accountAddress(value: string): AccountAddress {
	return createBrandedId(value, "AccountAddress");
}
