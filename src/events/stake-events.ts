/**
 * Staking events: what the engine reports while handling blocks.
 *
 * Emitted synchronously through a TypedEmitter; listeners feed alerting,
 * metrics or a UI without the engine knowing about them.
 */

import type { CommitStatus, Position, Transaction } from "../ledger/types.js";
import type { StakeOrderRequest } from "../order/types.js";
import type { FailedResult } from "../settlement/types.js";
import type { Decimal } from "../shared/decimal.js";
import type { SubnetId } from "../shared/identifiers.js";

export interface PriceUnavailable {
	readonly type: "price_unavailable";
	readonly timestamp: number;
	readonly blockHeight: number;
	readonly subnetId: SubnetId;
	readonly message: string;
}

export interface OrderSubmitted {
	readonly type: "order_submitted";
	readonly timestamp: number;
	readonly blockHeight: number;
	readonly order: StakeOrderRequest;
}

export interface OrderSettled {
	readonly type: "order_settled";
	readonly timestamp: number;
	readonly blockHeight: number;
	readonly transaction: Transaction;
	readonly commit: CommitStatus;
	readonly position: Position;
}

export interface OrderFailed {
	readonly type: "order_failed";
	readonly timestamp: number;
	readonly blockHeight: number;
	readonly subnetId: SubnetId;
	readonly failure: FailedResult;
}

export interface RuleDisabled {
	readonly type: "rule_disabled";
	readonly timestamp: number;
	readonly subnetId: SubnetId;
	readonly reason: FailedResult["reason"];
}

export interface StakingSkipped {
	readonly type: "staking_skipped";
	readonly timestamp: number;
	readonly blockHeight: number;
	/** Free balance, or null when it could not be read */
	readonly balance: Decimal | null;
}

export type StakeEvent =
	| PriceUnavailable
	| OrderSubmitted
	| OrderSettled
	| OrderFailed
	| RuleDisabled
	| StakingSkipped;

export type StakeEventType = StakeEvent["type"];

/** Handler signature per event type, for TypedEmitter. */
export type StakeEventMap = {
	[E in StakeEvent as E["type"]]: (event: E) => void;
};
