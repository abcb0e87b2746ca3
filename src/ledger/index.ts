export {
	type CommitRetryConfig,
	type CommitRetryOptions,
	DEFAULT_COMMIT_RETRY_CONFIG,
	commitWithRetry,
} from "./commit-retry.js";
export { FileLedgerStore, type FileLedgerStoreConfig } from "./file-ledger-store.js";
export { Ledger, type LedgerOptions } from "./ledger.js";
export { MemoryLedgerStore } from "./memory-ledger-store.js";
export { applyTransaction, averageEntryPrice, emptyPosition } from "./position.js";
export { fromRecord, toRecord } from "./records.js";
export {
	type CommitOutcome,
	CommitStatus,
	type CorruptRecord,
	type LedgerStore,
	type LoadResult,
	type Position,
	type Transaction,
	type TransactionRecord,
} from "./types.js";
