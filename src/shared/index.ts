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
} from "./identifiers.js";

export {
	type Result,
	ok,
	err,
	map,
	mapErr,
	unwrap,
	isOk,
	isErr,
	tryCatchAsync,
} from "./result.js";

export {
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
	reasonFromChainMessage,
	isConfigError,
	isLedgerError,
	isSubmissionError,
	isTimeoutError,
} from "./errors.js";

export { Decimal } from "./decimal.js";
export { BASE_UNIT_DECIMALS, fromBaseUnits, toBaseUnits } from "./units.js";
export { type Clock, SystemClock, FakeClock, Duration, sleep, withDeadline } from "./time.js";
export {
	Network,
	type StakerConfig,
	DEFAULT_STAKER_CONFIG,
	configFromEnv,
	resolveConfig,
} from "./config.js";
