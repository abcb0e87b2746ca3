// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type AccountAddress,
	type BlockHash,
	type DelegateId,
	type ExtrinsicId,
	type SubnetId,
	accountAddress,
	blockHash,
	delegateId,
	extrinsicId,
	subnetId,
	type Result,
	ok,
	err,
	isOk,
	isErr,
	unwrap,
	Decimal,
	BASE_UNIT_DECIMALS,
	fromBaseUnits,
	toBaseUnits,
	type Clock,
	SystemClock,
	FakeClock,
	Duration,
	Network,
	type StakerConfig,
	DEFAULT_STAKER_CONFIG,
	configFromEnv,
	resolveConfig,
	ErrorCategory,
	FailureReason,
	StakingError,
	ConfigError,
	PriceFetchError,
	SubmissionError,
	DecodeError,
	LedgerError,
	TimeoutError,
	NetworkError,
	SystemError,
	classifyError,
	isPermanentFailure,
} from "./shared/index.js";

// ── Libraries ───────────────────────────────────────────────────────
export { type Logger, type LoggerConfig, type LogLevel, createLogger, silentLogger } from "./lib/logger/index.js";
export { type ListenerErrorHandler, TypedEmitter, type TypedEmitterOptions } from "./lib/events/index.js";

// ── Rules ───────────────────────────────────────────────────────────
export { RuleSet, loadRuleFile, type Rule, type RuleSetOptions } from "./rules/index.js";

// ── Ledger ──────────────────────────────────────────────────────────
export {
	Ledger,
	type LedgerOptions,
	FileLedgerStore,
	MemoryLedgerStore,
	commitWithRetry,
	averageEntryPrice,
	CommitStatus,
	type CommitOutcome,
	type LedgerStore,
	type Position,
	type Transaction,
} from "./ledger/index.js";

// ── Settlement & Orders ─────────────────────────────────────────────
export {
	decodeSettlement,
	failureFromError,
	SettlementKind,
	type DecodeContext,
	type FailedResult,
	type SettledResult,
	type SettlementResult,
	type StakeReceipt,
} from "./settlement/index.js";
export { buildStakeOrder, type StakeOrderRequest } from "./order/index.js";

// ── Chain & Wallet ──────────────────────────────────────────────────
export {
	ChainGateway,
	PaperChainClient,
	type BlockNotification,
	type ChainClient,
	type SubmitOptions,
} from "./chain/index.js";
export {
	type Signer,
	SigningCapability,
	createSigningCapability,
	unwrapSigningCapability,
} from "./wallet/index.js";

// ── Engine ──────────────────────────────────────────────────────────
export {
	StakeEngine,
	type StakeEngineConfig,
	runBlockLoop,
	type BlockLoopSummary,
	createRuntimeContext,
	type RuntimeContext,
	type BlockReport,
	type RuleOutcome,
	RuleState,
	SkipReason,
} from "./engine/index.js";
export type { StakeEvent, StakeEventMap, StakeEventType } from "./events/index.js";

// ── Composition ─────────────────────────────────────────────────────
export { createStaker, type Staker, type StakerDependencies } from "./bootstrap.js";
