/**
 * Paper Staking Loop
 *
 * Dry run of the full staking core against PaperChainClient:
 * - Loads examples/subnets.json with a default delegate
 * - Keeps the ledger in memory
 * - Replays a short price path, one block per step, and prints each report
 *
 * Run: npx tsx examples/paper-staking.ts
 */

import { fileURLToPath } from "node:url";
import {
	Decimal,
	MemoryLedgerStore,
	Network,
	PaperChainClient,
	type BlockReport,
	accountAddress,
	averageEntryPrice,
	createLogger,
	createSigningCapability,
	createStaker,
	resolveConfig,
	subnetId,
} from "../src/index.js";

const wallet = accountAddress("5DryRunColdkey");

const config = {
	...resolveConfig({}),
	network: Network.Local,
	walletAddress: wallet,
	defaultDelegate: "5DryRunValidatorHotkey",
	rulesPath: fileURLToPath(new URL("./subnets.json", import.meta.url)),
	logLevel: "warn" as const,
};

const pricePath = [
	{ 64: "0.0900", 19: "0.0130" },
	{ 64: "0.0884", 19: "0.0125" },
	{ 64: "0.0872", 19: "0.0119" },
	{ 64: "0.0880", 19: "0.0117" },
	{ 64: "0.0869", 19: "0.0121" },
];

function describeReport(report: BlockReport): string {
	const parts = report.outcomes.map((o) => {
		switch (o.state) {
			case "settled":
				return `${o.subnetId}: settled ${o.transaction.stakedAmount} @ ${o.transaction.executionPrice.toFixed(6)}`;
			case "failed":
				return `${o.subnetId}: failed (${o.failure.reason})`;
			case "eligible":
				return `${o.subnetId}: skipped (${o.skipped})`;
			case "idle":
				return `${o.subnetId}: idle at ${o.price ?? "?"}`;
			default:
				return `${o.subnetId}: ${o.state}`;
		}
	});
	return `#${report.height} ${parts.join(" | ")}`;
}

async function main(): Promise<void> {
	const chain = new PaperChainClient({ fee: Decimal.from("0.00005") });
	chain.setBalance(wallet, Decimal.from("0.1"));

	const staker = await createStaker(config, {
		chain,
		signer: createSigningCapability({ address: wallet, sign: async (payload) => payload }),
		ledgerStore: new MemoryLedgerStore(),
		logger: createLogger({ level: config.logLevel }),
	});

	for (const prices of pricePath) {
		for (const [id, price] of Object.entries(prices)) {
			chain.setPrice(subnetId(Number(id)), Decimal.from(price));
		}
		chain.produceBlock();
	}
	chain.end();

	await staker.run({ onReport: (report) => console.log(describeReport(report)) });

	for (const position of staker.ledger.positions()) {
		console.log(
			`subnet ${position.subnetId}: ${position.transactionCount} stake(s), ` +
				`${position.totalStakedAmount} alpha for ${position.totalSpentAmount}, ` +
				`avg ${averageEntryPrice(position).toFixed(6)}`,
		);
	}
	await staker.close();
}

main().catch((error: unknown) => {
	console.error(error);
	process.exitCode = 1;
});
