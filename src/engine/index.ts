export {
	type BlockHandler,
	type BlockLoopOptions,
	type BlockLoopSummary,
	runBlockLoop,
} from "./block-loop.js";
export {
	type RuntimeContext,
	type RuntimeContextInput,
	createRuntimeContext,
} from "./runtime-context.js";
export { StakeEngine, type StakeEngineConfig } from "./stake-engine.js";
export {
	type BlockReport,
	type DisabledOutcome,
	type FailedOutcome,
	type IdleOutcome,
	type RuleOutcome,
	RuleState,
	type SettledOutcome,
	SkipReason,
	type SkippedOutcome,
} from "./types.js";
