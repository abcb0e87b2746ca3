import { appendFile, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createStaker } from "../bootstrap.js";
import { PaperChainClient } from "../chain/paper-chain-client.js";
import { RuleState } from "../engine/types.js";
import type { BlockReport } from "../engine/types.js";
import { FileLedgerStore } from "../ledger/file-ledger-store.js";
import type { LedgerStore, LoadResult, TransactionRecord } from "../ledger/types.js";
import { type StakerConfig, resolveConfig } from "../shared/config.js";
import { Decimal } from "../shared/decimal.js";
import { subnetId } from "../shared/identifiers.js";
import { FakeClock } from "../shared/time.js";
import { createSigningCapability } from "../wallet/signing-capability.js";
import { COLDKEY, HOTKEY } from "./fixtures.js";

const S1 = subnetId(1);
const S64 = subnetId(64);
const signer = createSigningCapability({ address: COLDKEY, sign: async (payload) => payload });

/** File store whose append reaches disk but whose acknowledgement is lost once. */
class LostAckStore implements LedgerStore {
	private readonly inner: FileLedgerStore;
	loseNext = false;

	constructor(filePath: string) {
		this.inner = FileLedgerStore.create({ filePath });
	}

	load(): Promise<LoadResult> {
		return this.inner.load();
	}

	async append(record: TransactionRecord): Promise<void> {
		await this.inner.append(record);
		if (this.loseNext) {
			this.loseNext = false;
			throw new Error("connection reset after write");
		}
	}

	close(): Promise<void> {
		return this.inner.close();
	}
}

async function runPricePath(
	chain: PaperChainClient,
	path: ReadonlyArray<Readonly<Record<number, string>>>,
): Promise<void> {
	for (const prices of path) {
		for (const [id, price] of Object.entries(prices)) {
			chain.setPrice(subnetId(Number(id)), Decimal.from(price));
		}
		chain.produceBlock();
	}
	chain.end();
}

describe("Integration: block-driven staking", () => {
	let dir: string;
	let config: StakerConfig;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "staking-it-"));
		const rulesPath = join(dir, "subnets.json");
		await writeFile(
			rulesPath,
			JSON.stringify([
				{ subnetId: 64, activationPrice: "0.0884", limitPrice: "0.0874", stakeAmount: "0.005", delegateId: HOTKEY },
				{ subnetId: 1, activationPrice: "0.05", limitPrice: "0.05", stakeAmount: "0.01", delegateId: HOTKEY },
			]),
		);
		config = resolveConfig({
			STAKER_WALLET_ADDRESS: COLDKEY,
			STAKER_RULES_PATH: rulesPath,
			STAKER_LEDGER_PATH: join(dir, "ledger.jsonl"),
			STAKER_LOG_LEVEL: "silent",
		});
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	function chainFrom(startHeight: number): PaperChainClient {
		const chain = new PaperChainClient({ startHeight, clock: new FakeClock(1_000) });
		chain.setBalance(COLDKEY, Decimal.from("1"));
		return chain;
	}

	describe("1. Price path", () => {
		it("ledger totals equal the settled outcomes of every block", async () => {
			const chain = chainFrom(0);
			const staker = await createStaker(config, { chain, signer, sleep: async () => {} });
			const reports: BlockReport[] = [];

			await runPricePath(chain, [
				{ 64: "0.09", 1: "0.06" },
				{ 64: "0.0884", 1: "0.05" },
				{ 64: "0.087", 1: "0.051" },
				{ 64: "0.0874", 1: "0.04" },
			]);
			await staker.run({ onReport: (report) => reports.push(report) });

			const settled = reports.flatMap((r) => r.outcomes.flatMap((o) => (o.state === RuleState.Settled ? [o] : [])));
			expect(settled.map((o) => `${o.transaction.blockHeight}:${o.subnetId}`)).toEqual([
				"2:1",
				"3:64",
				"4:64",
				"4:1",
			]);
			for (const id of [S1, S64]) {
				const own = settled.filter((o) => o.subnetId === id).map((o) => o.transaction);
				const position = staker.ledger.getPosition(id);
				expect(position.transactionCount).toBe(own.length);
				expect(position.totalStakedAmount.eq(Decimal.sum(own.map((tx) => tx.stakedAmount)))).toBe(true);
				expect(position.totalSpentAmount.eq(Decimal.sum(own.map((tx) => tx.spentAmount)))).toBe(true);
			}
			expect(staker.ledger.getPosition(S1).totalStakedAmount.toString()).toBe("0.45");
			await staker.close();
		});
	});

	describe("2. Crash recovery", () => {
		it("discards a torn final record and keeps every complete one", async () => {
			const chain = chainFrom(0);
			const staker = await createStaker(config, { chain, signer });
			await runPricePath(chain, [{ 64: "0.08", 1: "0.04" }]);
			await staker.run();
			await staker.close();
			await appendFile(config.ledgerPath, '{"type":"transaction","v":1,"subnetId":64,"staked');

			const restarted = await createStaker(config, { chain: chainFrom(1), signer });

			expect(restarted.ledger.size).toBe(2);
			expect(restarted.ledger.getPosition(S1).totalStakedAmount.toString()).toBe("0.25");
			const content = await readFile(config.ledgerPath, "utf-8");
			expect(content.endsWith("}\n")).toBe(true);
			await restarted.close();
		});
	});

	describe("3. Exactly-once", () => {
		it("counts a transaction once when its write succeeded but the acknowledgement was lost", async () => {
			const store = new LostAckStore(config.ledgerPath);
			store.loseNext = true;
			const chain = chainFrom(0);
			const staker = await createStaker(config, { chain, signer, ledgerStore: store, sleep: async () => {} });

			await runPricePath(chain, [{ 64: "0.09", 1: "0.04" }]);
			await staker.run();
			await staker.close();

			const lines = (await readFile(config.ledgerPath, "utf-8")).trim().split("\n");
			expect(lines).toHaveLength(2);
			expect(staker.ledger.getPosition(S1).transactionCount).toBe(1);

			const restarted = await createStaker(config, { chain: chainFrom(1), signer });
			expect(restarted.ledger.size).toBe(1);
			expect(restarted.ledger.getPosition(S1).totalStakedAmount.toString()).toBe("0.25");
			await restarted.close();
		});

		it("a restarted run stakes again on later blocks without recounting earlier ones", async () => {
			const first = chainFrom(0);
			const before = await createStaker(config, { chain: first, signer });
			await runPricePath(first, [{ 1: "0.04", 64: "0.1" }]);
			await before.run();
			await before.close();

			const second = chainFrom(1);
			const after = await createStaker(config, { chain: second, signer });
			await runPricePath(second, [{ 1: "0.04", 64: "0.1" }]);
			await after.run();

			expect([...after.ledger.listTransactions(S1)].map((tx) => tx.blockHeight)).toEqual([1, 2]);
			expect(after.ledger.getPosition(S1).totalStakedAmount.toString()).toBe("0.5");
			await after.close();
		});
	});
});
