/**
 * Time utilities: injectable clock and bounded waits.
 *
 * All code uses Clock.now() instead of Date.now() directly, so ledger
 * timestamps are deterministic in tests.
 */

import { TimeoutError } from "./errors.js";

/** Injectable time source. */
export interface Clock {
	now(): number;
}

/** Production clock backed by `Date.now()`. */
export const SystemClock: Clock = {
	now: () => Date.now(),
};

/** Controllable clock for deterministic testing -- advance time manually with `advance()`. */
export class FakeClock implements Clock {
	private time: number;

	constructor(startMs = 0) {
		this.time = startMs;
	}

	now(): number {
		return this.time;
	}

	advance(ms: number): void {
		if (ms < 0) {
			throw new Error(`FakeClock.advance requires non-negative ms, got ${ms}`);
		}
		this.time += ms;
	}

	set(ms: number): void {
		this.time = ms;
	}
}

/** Target block time of the chain. */
export const BLOCK_TIME_MS = 6_000;

/** Converts durations to milliseconds. */
export const Duration = {
	ms: (n: number) => n,
	seconds: (n: number) => n * 1_000,
	minutes: (n: number) => n * 60_000,
	/** `n` target block times */
	blocks: (n: number) => n * BLOCK_TIME_MS,
} as const;

/** Resolves after `ms`; resolves immediately for non-positive values. */
export function sleep(ms: number): Promise<void> {
	if (ms <= 0) return Promise.resolve();
	return new Promise((resolve) => {
		setTimeout(resolve, ms);
	});
}

/**
 * Races `promise` against a timer. Rejects with TimeoutError when the timer
 * wins; the timer is always cleared. `timeoutMs` undefined means no deadline.
 */
export async function withDeadline<T>(
	promise: Promise<T>,
	timeoutMs: number | undefined,
	operationName: string,
): Promise<T> {
	if (timeoutMs === undefined) {
		return promise;
	}

	let timer: ReturnType<typeof setTimeout> | undefined;
	const timeoutPromise = new Promise<never>((_, reject) => {
		timer = setTimeout(
			() =>
				reject(
					new TimeoutError(`${operationName} timed out after ${timeoutMs}ms`, {
						timeoutMs,
					}),
				),
			timeoutMs,
		);
	});
	try {
		return await Promise.race([promise, timeoutPromise]);
	} finally {
		clearTimeout(timer);
	}
}
