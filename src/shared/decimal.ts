/**
 * Decimal: safe financial math facade.
 *
 * All amounts and prices (stake sizes, limit prices, fees, aggregates) MUST
 * use Decimal. Never use raw `number` for money.
 */

export { LibDecimal as Decimal } from "../lib/decimal/index.js";
