/**
 * FileLedgerStore -- JSONL-backed durable store for ledger records.
 *
 * Appends one JSON object per line and fsyncs before resolving. A record is
 * the unit of atomicity: a crash or failed write mid-append can only leave a
 * partial final line. load() cuts it off on open, and the next append cuts
 * it off before writing, so a retried record always starts on a fresh line.
 */

import { type FileHandle, mkdir, open, readFile, truncate } from "node:fs/promises";
import { dirname } from "node:path";
import type { CorruptRecord, LedgerStore, LoadResult, TransactionRecord } from "./types.js";

/** Configuration for creating a FileLedgerStore instance. */
export interface FileLedgerStoreConfig {
	readonly filePath: string;
	/** Create missing parent directories on first write. Default: true */
	readonly createDirectories?: boolean;
}

const NEWLINE = 0x0a;

export class FileLedgerStore implements LedgerStore {
	private readonly config: FileLedgerStoreConfig;
	private closed = false;
	private writeQueue: Promise<void> = Promise.resolve();
	private directoryReady = false;

	private constructor(config: FileLedgerStoreConfig) {
		this.config = config;
	}

	/**
	 * Creates a store writing to the specified file path.
	 * @param config - Configuration with the target file path
	 */
	static create(config: FileLedgerStoreConfig): FileLedgerStore {
		return new FileLedgerStore(config);
	}

	get filePath(): string {
		return this.config.filePath;
	}

	/**
	 * Reads every record. Complete lines that fail to parse are reported in
	 * `corruptRecords`; an unterminated final line is truncated away.
	 */
	async load(): Promise<LoadResult> {
		let content: Buffer;
		try {
			content = await readFile(this.filePath);
		} catch (err: unknown) {
			if (isNodeError(err) && err.code === "ENOENT") {
				return { records: [], corruptRecords: [], truncatedTail: null };
			}
			throw err;
		}

		let truncatedTail: string | null = null;
		let body = content;
		if (content.length > 0 && content[content.length - 1] !== NEWLINE) {
			const keep = content.lastIndexOf(NEWLINE) + 1;
			truncatedTail = content.subarray(keep).toString("utf-8").slice(0, 200);
			body = content.subarray(0, keep);
			await truncate(this.filePath, keep);
		}

		const lines = body.toString("utf-8").split("\n");
		const records: unknown[] = [];
		const corruptRecords: CorruptRecord[] = [];

		for (let i = 0; i < lines.length; i++) {
			const trimmed = lines[i]?.trim() ?? "";
			if (trimmed.length === 0) {
				continue;
			}
			try {
				records.push(JSON.parse(trimmed));
			} catch {
				corruptRecords.push({ lineNumber: i + 1, raw: trimmed.slice(0, 200) });
			}
		}

		return { records, corruptRecords, truncatedTail };
	}

	async append(record: TransactionRecord): Promise<void> {
		if (this.closed) {
			throw new Error("FileLedgerStore is closed");
		}
		const line = `${JSON.stringify(record)}\n`;
		const prev = this.writeQueue;
		const next = prev.catch(() => undefined).then(() => this.writeOnce(line));
		this.writeQueue = next;
		await next;
	}

	/** Marks the store as closed, draining any pending writes first. */
	async close(): Promise<void> {
		this.closed = true;
		await this.writeQueue.catch(() => undefined);
	}

	private async writeOnce(line: string): Promise<void> {
		try {
			if (!this.directoryReady && this.config.createDirectories !== false) {
				await mkdir(dirname(this.filePath), { recursive: true });
				this.directoryReady = true;
			}
			const handle = await open(this.filePath, "a+");
			try {
				await this.dropPartialTail(handle);
				await handle.appendFile(line, "utf-8");
				await handle.sync();
			} finally {
				await handle.close();
			}
		} catch (err: unknown) {
			const code = isNodeError(err) ? err.code : "UNKNOWN";
			const msg = err instanceof Error ? err.message : String(err);
			throw new Error(`FileLedgerStore write to ${this.filePath} failed: [${code}] ${msg}`, {
				cause: err,
			});
		}
	}

	/** Truncates back to the last complete line when a failed write left a fragment. */
	private async dropPartialTail(handle: FileHandle): Promise<void> {
		const { size } = await handle.stat();
		if (size === 0) return;
		const last = Buffer.alloc(1);
		await handle.read(last, 0, 1, size - 1);
		if (last[0] === NEWLINE) return;

		const content = await readFile(this.filePath);
		await handle.truncate(content.lastIndexOf(NEWLINE) + 1);
	}
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
	return err instanceof Error && "code" in err;
}
