/**
 * Ledger: single source of truth for what has been staked.
 *
 * Holds positions keyed by subnet and transactions keyed by extrinsic id.
 * Only transactions are persisted; positions are folded from them on open and
 * after each commit, so a transaction can never exist without its position
 * update (or the reverse). Commits run one at a time through an internal
 * queue, whoever calls them.
 */

import { type Logger, silentLogger } from "../lib/logger/index.js";
import { LedgerError } from "../shared/errors.js";
import type { SubnetId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { applyTransaction, emptyPosition } from "./position.js";
import { fromRecord, toRecord } from "./records.js";
import {
	type CommitOutcome,
	CommitStatus,
	type LedgerStore,
	type Position,
	type Transaction,
} from "./types.js";

export interface LedgerOptions {
	readonly logger?: Logger;
}

export class Ledger {
	private readonly store: LedgerStore;
	private readonly logger: Logger;
	private readonly positionsBySubnet = new Map<SubnetId, Position>();
	/** Per subnet, ascending block height; equal heights keep commit order */
	private readonly transactionsBySubnet = new Map<SubnetId, Transaction[]>();
	private readonly extrinsicIds = new Set<string>();
	private readonly submissionHeights = new Map<SubnetId, Set<number>>();
	private commitQueue: Promise<unknown> = Promise.resolve();
	private closed = false;
	private closing: Promise<void> | null = null;

	private constructor(store: LedgerStore, logger: Logger) {
		this.store = store;
		this.logger = logger;
	}

	/**
	 * Opens a ledger over `store`, rebuilding every position and transaction
	 * from the persisted records.
	 * @throws LedgerError (fatal) when the store cannot be read or holds invalid records
	 */
	static async open(store: LedgerStore, options: LedgerOptions = {}): Promise<Ledger> {
		const logger = (options.logger ?? silentLogger()).child({ component: "ledger" });

		let loaded: Awaited<ReturnType<LedgerStore["load"]>>;
		try {
			loaded = await store.load();
		} catch (e: unknown) {
			const msg = e instanceof Error ? e.message : String(e);
			throw new LedgerError(`Ledger store unavailable: ${msg}`, true, { cause: e });
		}

		if (loaded.truncatedTail !== null) {
			logger.warn(
				{ tail: loaded.truncatedTail },
				"Discarded partial ledger record from an interrupted write",
			);
		}
		if (loaded.corruptRecords.length > 0) {
			throw new LedgerError(
				`Ledger store holds ${loaded.corruptRecords.length} unreadable record(s)`,
				true,
				{ corruptRecords: loaded.corruptRecords },
			);
		}

		const ledger = new Ledger(store, logger);
		for (const [index, raw] of loaded.records.entries()) {
			const parsed = fromRecord(raw);
			if (!parsed.ok) {
				throw new LedgerError(
					`Ledger record ${index + 1} is invalid: ${parsed.error.message}`,
					true,
					{ issues: parsed.error.issues },
				);
			}
			if (!ledger.apply(parsed.value)) {
				// A retried append whose first attempt reached disk before failing.
				logger.debug({ extrinsicId: parsed.value.extrinsicId }, "Skipped repeated ledger record");
			}
		}

		logger.info(
			{ transactions: ledger.extrinsicIds.size, positions: ledger.positionsBySubnet.size },
			"Ledger opened",
		);
		return ledger;
	}

	// ── Queries ────────────────────────────────────────────────────

	/** Current aggregate for a subnet; zero-valued when nothing was committed. */
	getPosition(subnetId: SubnetId): Position {
		return this.positionsBySubnet.get(subnetId) ?? emptyPosition(subnetId);
	}

	/** Every non-empty position, by ascending subnet id. */
	positions(): readonly Position[] {
		return [...this.positionsBySubnet.values()].sort((a, b) => a.subnetId - b.subnetId);
	}

	/**
	 * Transactions for a subnet in ascending block-height order. Lazy and
	 * re-iterable: each iteration walks the transactions committed by the
	 * time it starts.
	 */
	listTransactions(subnetId: SubnetId): Iterable<Transaction> {
		return {
			[Symbol.iterator]: () => this.iterateTransactions(subnetId),
		};
	}

	hasExtrinsic(extrinsicId: string): boolean {
		return this.extrinsicIds.has(extrinsicId);
	}

	/**
	 * Whether a transaction for `subnetId` was submitted while handling
	 * `blockHeight`. Keyed on the submission height, not the inclusion
	 * height, which a real chain places one or more blocks later.
	 */
	hasTransactionAt(subnetId: SubnetId, blockHeight: number): boolean {
		return this.submissionHeights.get(subnetId)?.has(blockHeight) ?? false;
	}

	/** Total number of committed transactions. */
	get size(): number {
		return this.extrinsicIds.size;
	}

	// ── Mutation ───────────────────────────────────────────────────

	/**
	 * Records a settled transaction and folds it into its subnet's position.
	 *
	 * A transaction whose extrinsic id is already recorded is a `duplicate`
	 * and changes nothing. A store failure leaves the ledger untouched and
	 * returns a retryable LedgerError.
	 */
	commit(tx: Transaction): Promise<Result<CommitOutcome, LedgerError>> {
		const run = async (): Promise<Result<CommitOutcome, LedgerError>> => {
			if (this.closed) {
				return err(new LedgerError("Ledger is closed", true));
			}
			if (this.extrinsicIds.has(tx.extrinsicId)) {
				return ok({ status: CommitStatus.Duplicate, position: this.getPosition(tx.subnetId) });
			}
			try {
				await this.store.append(toRecord(tx));
			} catch (e: unknown) {
				const msg = e instanceof Error ? e.message : String(e);
				return err(
					new LedgerError(`Ledger append failed: ${msg}`, false, {
						extrinsicId: tx.extrinsicId,
						cause: e,
					}),
				);
			}
			this.apply(tx);
			return ok({ status: CommitStatus.Applied, position: this.getPosition(tx.subnetId) });
		};

		const result = this.commitQueue.then(run);
		this.commitQueue = result.catch(() => undefined);
		return result;
	}

	/** Closes the store once every commit queued before it has run. Idempotent. */
	close(): Promise<void> {
		if (this.closing === null) {
			const run = async (): Promise<void> => {
				this.closed = true;
				await this.store.close();
			};
			this.closing = this.commitQueue.then(run);
			this.commitQueue = this.closing.catch(() => undefined);
		}
		return this.closing;
	}

	// ── Internal ───────────────────────────────────────────────────

	/** Folds a transaction into memory; false when its extrinsic is already known. */
	private apply(tx: Transaction): boolean {
		if (this.extrinsicIds.has(tx.extrinsicId)) {
			return false;
		}
		this.extrinsicIds.add(tx.extrinsicId);
		this.positionsBySubnet.set(tx.subnetId, applyTransaction(this.getPosition(tx.subnetId), tx));

		const list = this.transactionsBySubnet.get(tx.subnetId) ?? [];
		const at = list.findIndex((existing) => existing.blockHeight > tx.blockHeight);
		if (at === -1) {
			list.push(tx);
		} else {
			list.splice(at, 0, tx);
		}
		this.transactionsBySubnet.set(tx.subnetId, list);

		const heights = this.submissionHeights.get(tx.subnetId) ?? new Set<number>();
		heights.add(tx.submittedAtHeight);
		this.submissionHeights.set(tx.subnetId, heights);
		return true;
	}

	private *iterateTransactions(subnetId: SubnetId): Generator<Transaction, void, undefined> {
		const list = this.transactionsBySubnet.get(subnetId);
		if (list === undefined) return;
		yield* list.slice();
	}
}
