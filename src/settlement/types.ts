/**
 * Settlement types: what a submitted stake order turned into.
 */

import type { Transaction } from "../ledger/types.js";
import type { FailureReason } from "../shared/errors.js";
import type { AccountAddress, SubnetId } from "../shared/identifiers.js";

export const SettlementKind = {
	Settled: "settled",
	Failed: "failed",
} as const;

export type SettlementKind = (typeof SettlementKind)[keyof typeof SettlementKind];

export interface SettledResult {
	readonly kind: typeof SettlementKind.Settled;
	readonly transaction: Transaction;
}

export interface FailedResult {
	readonly kind: typeof SettlementKind.Failed;
	readonly reason: FailureReason;
	readonly message: string;
	/** The rule cannot succeed for the rest of the run */
	readonly permanent: boolean;
}

export type SettlementResult = SettledResult | FailedResult;

/** What the decoder needs beyond the receipt itself. */
export interface DecodeContext {
	/** Subnet the order was submitted for */
	readonly subnetId: SubnetId;
	/** Wallet coldkey; stake events for other accounts in the block are ignored */
	readonly coldkey: AccountAddress;
	/** Height being handled when the order was submitted */
	readonly submittedAtHeight: number;
	readonly timestampMs: number;
}

/**
 * Receipt shape delivered by the chain client after inclusion.
 *
 * `events` holds every event of the extrinsic in substrate form:
 * `{ event: { event_id, attributes } }`. A StakeAdded event's attributes are
 * `[coldkey, hotkey, spentBaseUnits, stakedBaseUnits, subnetId, feeBaseUnits]`.
 */
export interface StakeReceipt {
	readonly extrinsicId: string;
	readonly blockHash: string;
	readonly blockHeight: number;
	readonly success: boolean;
	readonly errorMessage?: string;
	readonly events: readonly unknown[];
}
