/**
 * StakeEngine types.
 */

import type { CommitStatus, Position, Transaction } from "../ledger/types.js";
import type { StakeOrderRequest } from "../order/types.js";
import type { FailedResult } from "../settlement/types.js";
import type { Decimal } from "../shared/decimal.js";
import type { SubnetId } from "../shared/identifiers.js";

/** Per-rule states within one block-handling pass. */
export const RuleState = {
	Idle: "idle",
	Eligible: "eligible",
	Submitted: "submitted",
	Settled: "settled",
	Failed: "failed",
	Disabled: "disabled",
} as const;

export type RuleState = (typeof RuleState)[keyof typeof RuleState];

/** Why an eligible rule was not submitted. */
export const SkipReason = {
	/** The ledger already holds a transaction for this subnet at this height */
	AlreadyStakedAtHeight: "already_staked_at_height",
	InsufficientBalance: "insufficient_balance",
	BalanceUnavailable: "balance_unavailable",
} as const;

export type SkipReason = (typeof SkipReason)[keyof typeof SkipReason];

interface OutcomeBase {
	readonly subnetId: SubnetId;
}

export interface IdleOutcome extends OutcomeBase {
	readonly state: typeof RuleState.Idle;
	/** Null when the price could not be fetched */
	readonly price: Decimal | null;
}

export interface SkippedOutcome extends OutcomeBase {
	readonly state: typeof RuleState.Eligible;
	readonly price: Decimal;
	readonly skipped: SkipReason;
}

export interface SettledOutcome extends OutcomeBase {
	readonly state: typeof RuleState.Settled;
	readonly price: Decimal;
	readonly order: StakeOrderRequest;
	readonly transaction: Transaction;
	readonly commit: CommitStatus;
	readonly position: Position;
}

export interface FailedOutcome extends OutcomeBase {
	readonly state: typeof RuleState.Failed;
	readonly price: Decimal;
	readonly order: StakeOrderRequest;
	readonly failure: FailedResult;
}

export interface DisabledOutcome extends OutcomeBase {
	readonly state: typeof RuleState.Disabled;
}

/** Where a rule ended up at the end of a block-handling pass. */
export type RuleOutcome =
	| IdleOutcome
	| SkippedOutcome
	| SettledOutcome
	| FailedOutcome
	| DisabledOutcome;

/** Result of handling one block: one outcome per rule, in declaration order. */
export interface BlockReport {
	readonly height: number;
	readonly hash: string;
	readonly prices: ReadonlyMap<SubnetId, Decimal>;
	/** Free balance read this block; null when no rule was eligible or the query failed */
	readonly balance: Decimal | null;
	readonly outcomes: readonly RuleOutcome[];
}
