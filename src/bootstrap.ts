/**
 * Composition root: config, rule file, file-backed ledger and engine.
 *
 * Everything that can make the process refuse to start (bad config, bad
 * rules, unreadable ledger) throws from `createStaker`.
 */

import { ChainGateway } from "./chain/chain-gateway.js";
import type { ChainClient } from "./chain/types.js";
import { type BlockLoopSummary, runBlockLoop } from "./engine/block-loop.js";
import { type RuntimeContext, createRuntimeContext } from "./engine/runtime-context.js";
import { StakeEngine } from "./engine/stake-engine.js";
import type { BlockReport } from "./engine/types.js";
import { FileLedgerStore } from "./ledger/file-ledger-store.js";
import { Ledger } from "./ledger/ledger.js";
import type { LedgerStore } from "./ledger/types.js";
import { type Logger, createLogger } from "./lib/logger/index.js";
import { loadRuleFile } from "./rules/rule-set.js";
import type { RuleSet } from "./rules/rule-set.js";
import type { StakerConfig } from "./shared/config.js";
import { unwrap } from "./shared/result.js";
import { type Clock, SystemClock } from "./shared/time.js";
import type { SigningCapability } from "./wallet/signing-capability.js";

export interface StakerDependencies {
	readonly chain: ChainClient;
	readonly signer: SigningCapability;
	readonly logger?: Logger | undefined;
	readonly clock?: Clock | undefined;
	/** Overrides the JSONL store at `config.ledgerPath` */
	readonly ledgerStore?: LedgerStore | undefined;
	/** Replaced in tests to avoid real waits between commit attempts */
	readonly sleep?: ((ms: number) => Promise<void>) | undefined;
}

export interface Staker {
	readonly context: RuntimeContext;
	readonly rules: RuleSet;
	readonly ledger: Ledger;
	readonly engine: StakeEngine;
	/** Consumes the chain's block subscription until it ends or `signal` aborts. */
	run(options?: {
		signal?: AbortSignal | undefined;
		onReport?: ((report: BlockReport) => void) | undefined;
	}): Promise<BlockLoopSummary>;
	/** Flushes and closes the ledger. */
	close(): Promise<void>;
}

/**
 * Builds a ready-to-run staker.
 *
 * @throws ConfigError for a missing wallet address or invalid rule file
 * @throws LedgerError when the ledger cannot be opened
 *
 * @example
 * ```ts
 * const staker = await createStaker(resolveConfig(), { chain, signer });
 * await staker.run({ signal: controller.signal });
 * await staker.close();
 * ```
 */
export async function createStaker(config: StakerConfig, deps: StakerDependencies): Promise<Staker> {
	const logger = deps.logger ?? createLogger({ level: config.logLevel, base: { network: config.network } });
	const clock = deps.clock ?? SystemClock;

	const context = createRuntimeContext({
		network: config.network,
		walletAddress: config.walletAddress,
		signer: deps.signer,
		defaultDelegate: config.defaultDelegate,
	});

	const rules = unwrap(
		await loadRuleFile(config.rulesPath, {
			defaultDelegate: context.defaultDelegate ?? undefined,
		}),
	);
	logger.info({ rulesPath: config.rulesPath, rules: rules.size }, "Rules loaded");

	const store = deps.ledgerStore ?? FileLedgerStore.create({ filePath: config.ledgerPath });
	const ledger = await Ledger.open(store, { logger });

	const chain = new ChainGateway(deps.chain, {
		submitTimeoutMs: config.submitTimeoutMs,
		queryTimeoutMs: config.queryTimeoutMs,
		logger,
	});
	const engine = new StakeEngine({
		rules,
		ledger,
		chain,
		context,
		minFreeBalance: config.minFreeBalance,
		commitRetry: { maxAttempts: config.commitMaxAttempts },
		sleep: deps.sleep,
		logger,
		clock,
	});

	logger.info(
		{ wallet: context.walletAddress, subnets: rules.subnetIds(), signer: context.signer },
		"Staker ready",
	);

	return {
		context,
		rules,
		ledger,
		engine,
		run: (options = {}) =>
			runBlockLoop(deps.chain.subscribeBlocks(), engine, {
				signal: options.signal,
				onReport: options.onReport,
				logger,
			}),
		close: () => ledger.close(),
	};
}
