/**
 * MemoryLedgerStore: in-memory store for tests and dry runs.
 *
 * Records outlive any single Ledger instance, so opening a second Ledger over
 * the same store exercises the same replay path as a process restart.
 */

import type { LedgerStore, LoadResult, TransactionRecord } from "./types.js";

export class MemoryLedgerStore implements LedgerStore {
	private readonly store: unknown[];

	constructor(initial: readonly unknown[] = []) {
		this.store = [...initial];
	}

	async load(): Promise<LoadResult> {
		return {
			records: structuredClone(this.store),
			corruptRecords: [],
			truncatedTail: null,
		};
	}

	async append(record: TransactionRecord): Promise<void> {
		this.store.push(structuredClone(record));
	}

	/** No-op; records stay available for the next Ledger. */
	async close(): Promise<void> {}

	/** Shallow copy of the raw records, in append order. */
	records(): unknown[] {
		return [...this.store];
	}

	get size(): number {
		return this.store.length;
	}
}
