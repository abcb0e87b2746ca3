/**
 * Staking rule types.
 */

import type { Decimal } from "../shared/decimal.js";
import type { DelegateId, SubnetId } from "../shared/identifiers.js";

/**
 * One limit-order rule per subnet. Immutable once loaded.
 *
 * Staking triggers when the subnet price is at or below `activationPrice`;
 * the chain refuses to fill above `limitPrice`.
 */
export interface Rule {
	readonly subnetId: SubnetId;
	readonly activationPrice: Decimal;
	/** Worst acceptable execution price; never above `activationPrice` */
	readonly limitPrice: Decimal;
	/** Native-token amount spent per order */
	readonly stakeAmount: Decimal;
	readonly delegateId: DelegateId;
}

/** Options for `RuleSet.load`. */
export interface RuleSetOptions {
	/** Hotkey for definitions that omit `delegateId` */
	readonly defaultDelegate?: string | undefined;
}
