/**
 * Order domain types.
 */

import type { Decimal } from "../shared/decimal.js";
import type { DelegateId, SubnetId } from "../shared/identifiers.js";

/**
 * Unsigned limit stake order, ready for the chain client to sign and submit.
 *
 * Token amounts are carried twice: as decimals for logs and ledger checks,
 * and as integer base-unit strings for the extrinsic call.
 */
export interface StakeOrderRequest {
	readonly subnetId: SubnetId;
	readonly delegateId: DelegateId;
	/** Native-token amount to spend */
	readonly stakeAmount: Decimal;
	readonly stakeAmountBaseUnits: string;
	/** Worst acceptable price, copied from the rule */
	readonly limitPrice: Decimal;
	/** Limit price in base units per whole alpha */
	readonly limitPriceBaseUnits: string;
	/** Fill what the limit allows instead of failing the whole order */
	readonly allowPartial: true;
	/** Price observed when the order was built; informational only */
	readonly referencePrice: Decimal;
}
