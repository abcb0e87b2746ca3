import type { Rule } from "../rules/types.js";
import type { Decimal } from "../shared/decimal.js";
import { toBaseUnits } from "../shared/units.js";
import type { StakeOrderRequest } from "./types.js";

/**
 * Builds the stake order for an eligible rule.
 *
 * The limit price comes from the rule verbatim; `currentPrice` is only
 * recorded as the reference. Eligibility is the caller's decision.
 *
 * @example
 * ```ts
 * const order = buildStakeOrder(rule, Decimal.from("0.0884"));
 * order.limitPriceBaseUnits; // "87400000" for a 0.0874 limit
 * ```
 */
export function buildStakeOrder(rule: Rule, currentPrice: Decimal): StakeOrderRequest {
	return Object.freeze({
		subnetId: rule.subnetId,
		delegateId: rule.delegateId,
		stakeAmount: rule.stakeAmount,
		stakeAmountBaseUnits: toBaseUnits(rule.stakeAmount),
		limitPrice: rule.limitPrice,
		limitPriceBaseUnits: toBaseUnits(rule.limitPrice),
		allowPartial: true,
		referencePrice: currentPrice,
	});
}
