/**
 * Block driver loop: pulls block notifications and hands them to the
 * engine one at a time, in height order.
 */

import type { BlockNotification } from "../chain/types.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import type { BlockReport } from "./types.js";

export interface BlockHandler {
	handleBlock(block: BlockNotification): Promise<BlockReport>;
}

export interface BlockLoopOptions {
	/** Stops the loop after the current block, or while waiting for the next one */
	readonly signal?: AbortSignal | undefined;
	readonly logger?: Logger | undefined;
	/** Called after every handled block */
	readonly onReport?: ((report: BlockReport) => void) | undefined;
}

export interface BlockLoopSummary {
	readonly blocksHandled: number;
	/** Notifications dropped for not being above the last handled height */
	readonly blocksSkipped: number;
	readonly lastHeight: number | null;
	readonly stoppedBy: "abort" | "end";
}

type Next = IteratorResult<BlockNotification, unknown>;

const ABORTED: Next = { done: true, value: undefined };

/**
 * Runs until the block stream ends or `signal` aborts. Heights at or below
 * the last handled one are skipped. A rejection from `handleBlock` (a fatal
 * ledger error) ends the loop and propagates.
 */
export async function runBlockLoop(
	blocks: AsyncIterable<BlockNotification>,
	engine: BlockHandler,
	options: BlockLoopOptions = {},
): Promise<BlockLoopSummary> {
	const logger = (options.logger ?? silentLogger()).child({ component: "block-loop" });
	const signal = options.signal;
	const iterator = blocks[Symbol.asyncIterator]();

	let removeAbortListener = (): void => {};
	const aborted = new Promise<Next>((resolve) => {
		if (!signal) return;
		if (signal.aborted) {
			resolve(ABORTED);
			return;
		}
		const onAbort = (): void => resolve(ABORTED);
		signal.addEventListener("abort", onAbort, { once: true });
		removeAbortListener = () => signal.removeEventListener("abort", onAbort);
	});

	let blocksHandled = 0;
	let blocksSkipped = 0;
	let lastHeight: number | null = null;
	let waitingForBlock = false;

	try {
		while (!signal?.aborted) {
			waitingForBlock = true;
			const next = await Promise.race([iterator.next(), aborted]);
			if (next.done) break;
			waitingForBlock = false;

			const block = next.value;
			if (lastHeight !== null && block.height <= lastHeight) {
				blocksSkipped++;
				logger.warn({ height: block.height, lastHeight }, "Skipping out-of-order block");
				continue;
			}

			const report = await engine.handleBlock(block);
			blocksHandled++;
			lastHeight = block.height;
			options.onReport?.(report);
		}
	} finally {
		removeAbortListener();
		// A pending next() would hold return() until another block arrives.
		if (!waitingForBlock) {
			await iterator.return?.();
		}
	}

	const stoppedBy = signal?.aborted ? "abort" : "end";
	logger.info({ blocksHandled, blocksSkipped, lastHeight, stoppedBy }, "Block loop stopped");
	return { blocksHandled, blocksSkipped, lastHeight, stoppedBy };
}
