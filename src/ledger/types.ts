/**
 * Ledger domain types.
 */

import type { Decimal } from "../shared/decimal.js";
import type {
	AccountAddress,
	BlockHash,
	DelegateId,
	ExtrinsicId,
	SubnetId,
} from "../shared/identifiers.js";

/** One settled stake order. Immutable, append-only. */
export interface Transaction {
	readonly subnetId: SubnetId;
	/** Alpha received */
	readonly stakedAmount: Decimal;
	/** Native token spent */
	readonly spentAmount: Decimal;
	readonly feePaid: Decimal;
	/** spentAmount / stakedAmount */
	readonly executionPrice: Decimal;
	/** Unique across the ledger; the idempotency key */
	readonly extrinsicId: ExtrinsicId;
	readonly blockId: BlockHash;
	/** Height of the block that included the extrinsic */
	readonly blockHeight: number;
	/** Height being handled when the order was submitted; keys the same-height guard */
	readonly submittedAtHeight: number;
	readonly timestamp: number;
	readonly delegateId: DelegateId;
	readonly coldkey: AccountAddress;
}

/** Aggregate of all committed transactions for one subnet. */
export interface Position {
	readonly subnetId: SubnetId;
	readonly totalStakedAmount: Decimal;
	readonly totalSpentAmount: Decimal;
	readonly totalFeePaid: Decimal;
	readonly transactionCount: number;
	/** Timestamp of the latest committed transaction; null before the first */
	readonly lastUpdatedMs: number | null;
}

/** What a commit did. */
export const CommitStatus = {
	Applied: "applied",
	Duplicate: "duplicate",
} as const;

export type CommitStatus = (typeof CommitStatus)[keyof typeof CommitStatus];

export interface CommitOutcome {
	readonly status: CommitStatus;
	/** Position after the commit (unchanged for duplicates) */
	readonly position: Position;
}

/** Serialized transaction as it is written to the store. */
export interface TransactionRecord {
	readonly type: "transaction";
	readonly v: 1;
	readonly subnetId: number;
	readonly stakedAmount: string;
	readonly spentAmount: string;
	readonly feePaid: string;
	readonly executionPrice: string;
	readonly extrinsicId: string;
	readonly blockId: string;
	readonly blockHeight: number;
	readonly submittedAtHeight: number;
	readonly timestamp: number;
	readonly delegateId: string;
	readonly coldkey: string;
}

/** A record in the store that could not be read back. */
export interface CorruptRecord {
	readonly lineNumber: number;
	readonly raw: string;
}

/** Result of loading every record from a store. */
export interface LoadResult {
	readonly records: readonly unknown[];
	readonly corruptRecords: readonly CorruptRecord[];
	/** Partial final record left by an interrupted append, already removed from the store */
	readonly truncatedTail: string | null;
}

/**
 * Durable backing for the ledger. `append` must make a record durable before
 * resolving; one record is the unit of atomicity.
 */
export interface LedgerStore {
	load(): Promise<LoadResult>;
	append(record: TransactionRecord): Promise<void>;
	close(): Promise<void>;
}
