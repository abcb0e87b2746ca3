/**
 * Position aggregate math. Positions are values; the ledger replaces the
 * stored one with `applyTransaction(...)` inside a commit.
 */

import { Decimal } from "../shared/decimal.js";
import type { SubnetId } from "../shared/identifiers.js";
import type { Position, Transaction } from "./types.js";

/** Zero-valued position for a subnet with no committed transactions. */
export function emptyPosition(subnetId: SubnetId): Position {
	return {
		subnetId,
		totalStakedAmount: Decimal.zero(),
		totalSpentAmount: Decimal.zero(),
		totalFeePaid: Decimal.zero(),
		transactionCount: 0,
		lastUpdatedMs: null,
	};
}

/** Position after adding one transaction. */
export function applyTransaction(position: Position, tx: Transaction): Position {
	return {
		subnetId: position.subnetId,
		totalStakedAmount: position.totalStakedAmount.add(tx.stakedAmount),
		totalSpentAmount: position.totalSpentAmount.add(tx.spentAmount),
		totalFeePaid: position.totalFeePaid.add(tx.feePaid),
		transactionCount: position.transactionCount + 1,
		lastUpdatedMs:
			position.lastUpdatedMs === null ? tx.timestamp : Math.max(position.lastUpdatedMs, tx.timestamp),
	};
}

/** Native token paid per alpha held; zero for an empty position. */
export function averageEntryPrice(position: Position): Decimal {
	if (position.transactionCount === 0 || position.totalStakedAmount.isZero()) {
		return Decimal.zero();
	}
	return position.totalSpentAmount.div(position.totalStakedAmount);
}
