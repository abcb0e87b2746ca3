/**
 * StakingError hierarchy: structured error classification.
 *
 * Every error has a category (retryable, non-retryable, fatal). The engine
 * uses it to decide between "try again next block", "disable this rule" and
 * "stop the process".
 */

/** Error severity categories that drive retry and shutdown behavior. */
export const ErrorCategory = {
	Retryable: "retryable",
	NonRetryable: "non_retryable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Why a stake order did not settle. */
export const FailureReason = {
	Rejected: "rejected",
	TimedOut: "timed_out",
	Underfunded: "underfunded",
	SlippageExceeded: "slippage_exceeded",
	InvalidDelegate: "invalid_delegate",
	SubnetMissing: "subnet_missing",
	StaleEra: "stale_era",
	Malformed: "malformed",
	Unknown: "unknown",
} as const;

export type FailureReason = (typeof FailureReason)[keyof typeof FailureReason];

const PERMANENT_REASONS: ReadonlySet<FailureReason> = new Set([
	FailureReason.InvalidDelegate,
	FailureReason.SubnetMissing,
]);

/** Permanent reasons describe a misconfigured rule; retrying next block cannot help. */
export function isPermanentFailure(reason: FailureReason): boolean {
	return PERMANENT_REASONS.has(reason);
}

type ErrorContext = Record<string, unknown> & { readonly cause?: unknown };

/** Base error class for all staking operations. */
export class StakingError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: ErrorContext = {},
	) {
		const { cause, ...rest } = context;
		super(message);
		this.name = "StakingError";
		this.category = category;
		this.code = code;
		this.context = rest;
		if (cause !== undefined) this.cause = cause;
	}

	get isRetryable(): boolean {
		return this.category === ErrorCategory.Retryable;
	}

	get isFatal(): boolean {
		return this.category === ErrorCategory.Fatal;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			retryable: this.isRetryable,
			context: this.context,
		};
	}
}

// ── Specific error types ─────────────────────────────────────────────

/** Fatal error for malformed or invariant-violating configuration. */
export class ConfigError extends StakingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, context);
		this.name = "ConfigError";
	}
}

/** A subnet price could not be read this block. */
export class PriceFetchError extends StakingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "PRICE_FETCH_ERROR", ErrorCategory.Retryable, context);
		this.name = "PriceFetchError";
	}
}

/** The chain refused or lost a stake order. */
export class SubmissionError extends StakingError {
	readonly reason: FailureReason;

	constructor(message: string, reason: FailureReason, context: ErrorContext = {}) {
		super(
			message,
			"SUBMISSION_ERROR",
			isPermanentFailure(reason) ? ErrorCategory.NonRetryable : ErrorCategory.Retryable,
			context,
		);
		this.name = "SubmissionError";
		this.reason = reason;
	}

	get isPermanent(): boolean {
		return isPermanentFailure(this.reason);
	}

	override toJSON(): Record<string, unknown> {
		return { ...super.toJSON(), reason: this.reason };
	}
}

/** A confirmation payload could not be understood. */
export class DecodeError extends StakingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "DECODE_ERROR", ErrorCategory.NonRetryable, context);
		this.name = "DecodeError";
	}
}

/** Ledger persistence failed; retryable for a single commit, fatal at startup. */
export class LedgerError extends StakingError {
	constructor(message: string, fatal: boolean, context: ErrorContext = {}) {
		super(
			message,
			"LEDGER_ERROR",
			fatal ? ErrorCategory.Fatal : ErrorCategory.Retryable,
			context,
		);
		this.name = "LedgerError";
	}
}

/** Retryable error for chain calls that exceeded their deadline. */
export class TimeoutError extends StakingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "TIMEOUT_ERROR", ErrorCategory.Retryable, context);
		this.name = "TimeoutError";
	}
}

/** Retryable error for node connectivity failures. */
export class NetworkError extends StakingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "NETWORK_ERROR", ErrorCategory.Retryable, context);
		this.name = "NetworkError";
	}
}

/** Fatal error for unexpected internal failures. */
export class SystemError extends StakingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "SYSTEM_ERROR", ErrorCategory.Fatal, context);
		this.name = "SystemError";
	}
}

// ── Classification helper ────────────────────────────────────────────

const CHAIN_REASON_PATTERNS: ReadonlyArray<readonly [RegExp, FailureReason]> = [
	[/ancient birth block|transaction is outdated/i, FailureReason.StaleEra],
	[/notenoughbalance|insufficient ?balance|balance too low/i, FailureReason.Underfunded],
	[/slippage|zeromaxstakeamount|pricelimit/i, FailureReason.SlippageExceeded],
	[/hotkeyaccountnotexists|hotkeynotregistered|invalid ?(hotkey|delegate)/i, FailureReason.InvalidDelegate],
	[/subnetnotexists|subnetworkdoesnotexist|mechanismdoesnotexist/i, FailureReason.SubnetMissing],
];

/** Map a chain error name or message to a failure reason, or null when nothing matches. */
export function reasonFromChainMessage(message: string): FailureReason | null {
	for (const [pattern, reason] of CHAIN_REASON_PATTERNS) {
		if (pattern.test(message)) return reason;
	}
	return null;
}

/** Classify an unknown thrown value into the appropriate StakingError subtype. */
export function classifyError(error: unknown): StakingError {
	if (error instanceof StakingError) return error;
	if (!(error instanceof Error)) {
		return new SystemError(String(error), { cause: error });
	}

	const msg = error.message.toLowerCase();
	const code = (error as NodeJS.ErrnoException).code;

	if (code === "ETIMEDOUT" || msg.includes("timeout") || msg.includes("timed out")) {
		return new TimeoutError(error.message, { cause: error });
	}
	if (
		code === "ECONNREFUSED" ||
		code === "ECONNRESET" ||
		code === "ENOTFOUND" ||
		msg.includes("websocket") ||
		msg.includes("connection closed")
	) {
		return new NetworkError(error.message, { cause: error });
	}

	const reason = reasonFromChainMessage(error.message);
	if (reason !== null) {
		return new SubmissionError(error.message, reason, { cause: error });
	}
	return new SystemError(error.message, { cause: error });
}

// ── Type guards ──────────────────────────────────────────────────────

/** Type guard for ConfigError. */
export function isConfigError(e: unknown): e is ConfigError {
	return e instanceof ConfigError;
}

/** Type guard for LedgerError. */
export function isLedgerError(e: unknown): e is LedgerError {
	return e instanceof LedgerError;
}

/** Type guard for SubmissionError. */
export function isSubmissionError(e: unknown): e is SubmissionError {
	return e instanceof SubmissionError;
}

/** Type guard for TimeoutError. */
export function isTimeoutError(e: unknown): e is TimeoutError {
	return e instanceof TimeoutError;
}
