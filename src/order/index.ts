export { buildStakeOrder } from "./order-builder.js";
export type { StakeOrderRequest } from "./types.js";
