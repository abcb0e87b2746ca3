export type {
	OrderFailed,
	OrderSettled,
	OrderSubmitted,
	PriceUnavailable,
	RuleDisabled,
	StakeEvent,
	StakeEventMap,
	StakeEventType,
	StakingSkipped,
} from "./stake-events.js";
