/**
 * Commit retry: exponential backoff with jitter around Ledger.commit.
 *
 * A settled transaction is already on chain, so a failed commit is retried
 * until it succeeds or the attempts run out; running out is fatal.
 */

import type { Logger } from "../lib/logger/index.js";
import { LedgerError } from "../shared/errors.js";
import { sleep as defaultSleep } from "../shared/time.js";
import type { Ledger } from "./ledger.js";
import type { CommitOutcome, Transaction } from "./types.js";

export interface CommitRetryConfig {
	readonly maxAttempts: number;
	readonly baseDelayMs: number;
	readonly maxDelayMs: number;
	readonly jitterFactor: number;
}

/** 5 attempts, 100ms base delay, 5s max, 10% jitter. */
export const DEFAULT_COMMIT_RETRY_CONFIG: CommitRetryConfig = {
	maxAttempts: 5,
	baseDelayMs: 100,
	maxDelayMs: 5_000,
	jitterFactor: 0.1,
};

export interface CommitRetryOptions {
	readonly config?: Partial<CommitRetryConfig>;
	readonly logger?: Logger;
	/** Replaced in tests to avoid real waits */
	readonly sleep?: (ms: number) => Promise<void>;
	/** Source of randomness for jitter, in [0, 1) */
	readonly random?: () => number;
}

function resolveConfig(overrides?: Partial<CommitRetryConfig>): CommitRetryConfig {
	return {
		maxAttempts: overrides?.maxAttempts ?? DEFAULT_COMMIT_RETRY_CONFIG.maxAttempts,
		baseDelayMs: overrides?.baseDelayMs ?? DEFAULT_COMMIT_RETRY_CONFIG.baseDelayMs,
		maxDelayMs: overrides?.maxDelayMs ?? DEFAULT_COMMIT_RETRY_CONFIG.maxDelayMs,
		jitterFactor: overrides?.jitterFactor ?? DEFAULT_COMMIT_RETRY_CONFIG.jitterFactor,
	};
}

/** @internal Exported for testing only. */
export function computeDelay(
	attempt: number,
	config: CommitRetryConfig,
	random: () => number = Math.random,
): number {
	const exponential = config.baseDelayMs * 2 ** attempt;
	const delay = Math.min(exponential, config.maxDelayMs);
	const jitter = 1 + (random() - 0.5) * 2 * config.jitterFactor;
	return delay * jitter;
}

/**
 * Commits `tx`, retrying retryable LedgerErrors with exponential backoff.
 *
 * @throws LedgerError (fatal) when every attempt failed or the ledger
 * reported a fatal error
 */
export async function commitWithRetry(
	ledger: Ledger,
	tx: Transaction,
	options: CommitRetryOptions = {},
): Promise<CommitOutcome> {
	const config = resolveConfig(options.config);
	const sleep = options.sleep ?? defaultSleep;
	const random = options.random ?? Math.random;

	let lastError: LedgerError | undefined;
	for (let attempt = 0; attempt < config.maxAttempts; attempt++) {
		if (attempt > 0) {
			await sleep(computeDelay(attempt - 1, config, random));
		}
		const result = await ledger.commit(tx);
		if (result.ok) return result.value;
		if (result.error.isFatal) throw result.error;

		lastError = result.error;
		options.logger?.warn(
			{ extrinsicId: tx.extrinsicId, attempt: attempt + 1, error: result.error.message },
			"Ledger commit failed",
		);
	}

	throw new LedgerError(
		`Ledger commit for ${tx.extrinsicId} failed after ${config.maxAttempts} attempt(s)`,
		true,
		{ extrinsicId: tx.extrinsicId, cause: lastError },
	);
}
