/**
 * StakeEngine: per-block decision and settlement pass.
 *
 * Each block: read one price per subnet, decide which rules are eligible
 * from those prices and the ledger, then submit, decode and commit one rule
 * at a time. Nothing carries over between blocks except the ledger and the
 * set of rules disabled by a permanent failure.
 */

import type { BlockNotification } from "../chain/types.js";
import type { ChainGateway } from "../chain/chain-gateway.js";
import type { StakeEventMap } from "../events/stake-events.js";
import { type CommitRetryOptions, commitWithRetry } from "../ledger/commit-retry.js";
import type { Ledger } from "../ledger/ledger.js";
import { averageEntryPrice } from "../ledger/position.js";
import { TypedEmitter } from "../lib/events/index.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import { buildStakeOrder } from "../order/order-builder.js";
import type { RuleSet } from "../rules/rule-set.js";
import type { Rule } from "../rules/types.js";
import { decodeSettlement, failureFromError } from "../settlement/decoder.js";
import { SettlementKind } from "../settlement/types.js";
import { Decimal } from "../shared/decimal.js";
import { FailureReason, SystemError } from "../shared/errors.js";
import type { SubnetId } from "../shared/identifiers.js";
import { type Clock, SystemClock } from "../shared/time.js";
import type { RuntimeContext } from "./runtime-context.js";
import {
	type BlockReport,
	type RuleOutcome,
	RuleState,
	SkipReason,
} from "./types.js";

export interface StakeEngineConfig {
	readonly rules: RuleSet;
	readonly ledger: Ledger;
	readonly chain: ChainGateway;
	readonly context: RuntimeContext;
	/** Orders are skipped while the free balance is at or below this. Default: 0.01 */
	readonly minFreeBalance?: Decimal | undefined;
	readonly commitRetry?: CommitRetryOptions["config"];
	/** Replaced in tests to avoid real waits between commit attempts */
	readonly sleep?: ((ms: number) => Promise<void>) | undefined;
	readonly logger?: Logger | undefined;
	readonly clock?: Clock | undefined;
}

const DEFAULT_MIN_FREE_BALANCE = Decimal.from("0.01");

export class StakeEngine {
	/** Staking events; handlers run synchronously inside handleBlock. A throwing handler is logged. */
	readonly events = new TypedEmitter<StakeEventMap>({
		onListenerError: (event, error) => {
			this.logger.error(
				{ event, error: error instanceof Error ? error.message : String(error) },
				"Stake event listener threw",
			);
		},
	});

	private readonly rules: RuleSet;
	private readonly ledger: Ledger;
	private readonly chain: ChainGateway;
	private readonly context: RuntimeContext;
	private readonly minFreeBalance: Decimal;
	private readonly commitRetry: CommitRetryOptions;
	private readonly logger: Logger;
	private readonly clock: Clock;
	private readonly disabled = new Set<SubnetId>();
	private handling = false;

	constructor(config: StakeEngineConfig) {
		this.rules = config.rules;
		this.ledger = config.ledger;
		this.chain = config.chain;
		this.context = config.context;
		this.minFreeBalance = config.minFreeBalance ?? DEFAULT_MIN_FREE_BALANCE;
		this.logger = (config.logger ?? silentLogger()).child({ component: "stake-engine" });
		this.clock = config.clock ?? SystemClock;
		this.commitRetry = {
			...(config.commitRetry ? { config: config.commitRetry } : {}),
			...(config.sleep ? { sleep: config.sleep } : {}),
			logger: this.logger,
		};
	}

	// ── Queries ────────────────────────────────────────────────────

	isDisabled(subnetId: SubnetId): boolean {
		return this.disabled.has(subnetId);
	}

	/** Subnets whose rule was disabled by a permanent failure this run. */
	disabledSubnets(): readonly SubnetId[] {
		return [...this.disabled];
	}

	// ── Block handling ─────────────────────────────────────────────

	/**
	 * Runs one decision-and-settlement pass for `block`.
	 *
	 * Per-subnet failures (price, submission, decoding) end up in the report;
	 * only a ledger commit that exhausts its retries rejects.
	 *
	 * @throws LedgerError (fatal) when a settled transaction cannot be recorded
	 * @throws SystemError when called while another pass is still running
	 */
	async handleBlock(block: BlockNotification): Promise<BlockReport> {
		if (this.handling) {
			throw new SystemError("handleBlock called while a block is still being handled", {
				height: block.height,
			});
		}
		this.handling = true;
		try {
			return await this.runPass(block);
		} finally {
			this.handling = false;
		}
	}

	private async runPass(block: BlockNotification): Promise<BlockReport> {
		const log = this.logger.child({ block: block.height });
		log.debug({ hash: block.hash }, "Handling block");

		const prices = await this.refreshPrices(block, log);
		// undefined until first needed; null when the query failed
		let available: Decimal | null | undefined;
		const outcomes: RuleOutcome[] = [];

		for (const rule of this.rules.rules()) {
			const subnetId = rule.subnetId;
			if (this.disabled.has(subnetId)) {
				outcomes.push({ subnetId, state: RuleState.Disabled });
				continue;
			}
			const price = prices.get(subnetId);
			if (price === undefined || price.gt(rule.activationPrice)) {
				outcomes.push({ subnetId, state: RuleState.Idle, price: price ?? null });
				continue;
			}

			if (this.ledger.hasTransactionAt(subnetId, block.height)) {
				log.info({ subnetId }, "Already staked on this subnet at this height");
				outcomes.push({
					subnetId,
					state: RuleState.Eligible,
					price,
					skipped: SkipReason.AlreadyStakedAtHeight,
				});
				continue;
			}

			if (available === undefined) {
				available = await this.readBalance(block, log);
			}
			const shortfall = this.fundsShortfall(available);
			if (shortfall !== null) {
				outcomes.push({ subnetId, state: RuleState.Eligible, price, skipped: shortfall });
				continue;
			}

			const outcome = await this.stake(rule, price, block, log);
			if (outcome.state === RuleState.Settled && available !== null) {
				available = available.sub(rule.stakeAmount);
			}
			outcomes.push(outcome);
		}

		return {
			height: block.height,
			hash: block.hash,
			prices,
			balance: available ?? null,
			outcomes,
		};
	}

	/** One price query per distinct subnet; failures leave the subnet out of the map. */
	private async refreshPrices(
		block: BlockNotification,
		log: Logger,
	): Promise<Map<SubnetId, Decimal>> {
		const prices = new Map<SubnetId, Decimal>();
		for (const subnetId of this.rules.subnetIds()) {
			if (this.disabled.has(subnetId)) continue;
			const result = await this.chain.getPrice(subnetId);
			if (result.ok) {
				prices.set(subnetId, result.value);
				continue;
			}
			log.warn({ subnetId, error: result.error.message }, "Price unavailable, subnet idle this block");
			this.events.emit("price_unavailable", {
				type: "price_unavailable",
				timestamp: this.clock.now(),
				blockHeight: block.height,
				subnetId,
				message: result.error.message,
			});
		}
		log.debug(
			{ prices: Object.fromEntries([...prices].map(([k, v]) => [k, v.toString()])) },
			"Prices refreshed",
		);
		return prices;
	}

	private async readBalance(block: BlockNotification, log: Logger): Promise<Decimal | null> {
		const result = await this.chain.getBalance(this.context.walletAddress);
		const balance = result.ok ? result.value : null;
		if (!result.ok) {
			log.warn({ error: result.error.message }, "Balance unavailable, no orders this block");
		} else if (result.value.lte(this.minFreeBalance)) {
			log.warn(
				{ balance: result.value.toString(), minimum: this.minFreeBalance.toString() },
				"Free balance too low to stake",
			);
		} else {
			log.debug({ balance: result.value.toString() }, "Free balance");
			return balance;
		}
		this.events.emit("staking_skipped", {
			type: "staking_skipped",
			timestamp: this.clock.now(),
			blockHeight: block.height,
			balance,
		});
		return balance;
	}

	private fundsShortfall(available: Decimal | null): SkipReason | null {
		if (available === null) return SkipReason.BalanceUnavailable;
		if (available.lte(this.minFreeBalance)) return SkipReason.InsufficientBalance;
		return null;
	}

	/** Eligible → Submitted → Settled | Failed for a single rule. */
	private async stake(
		rule: Rule,
		price: Decimal,
		block: BlockNotification,
		log: Logger,
	): Promise<RuleOutcome> {
		const subnetId = rule.subnetId;
		const order = buildStakeOrder(rule, price);
		log.info(
			{
				subnetId,
				price: price.toString(),
				limitPrice: order.limitPrice.toString(),
				stakeAmount: order.stakeAmount.toString(),
				delegate: order.delegateId,
			},
			"Submitting stake order",
		);
		this.events.emit("order_submitted", {
			type: "order_submitted",
			timestamp: this.clock.now(),
			blockHeight: block.height,
			order,
		});

		const submitted = await this.chain.submit(order, this.context.signer, block.height);
		const settlement = submitted.ok
			? decodeSettlement(submitted.value, {
					subnetId,
					coldkey: this.context.walletAddress,
					submittedAtHeight: block.height,
					timestampMs: block.timestampMs ?? this.clock.now(),
				})
			: failureFromError(submitted.error);

		if (settlement.kind === SettlementKind.Failed) {
			if (settlement.reason === FailureReason.Malformed) {
				log.error({ subnetId, message: settlement.message }, "Undecodable settlement");
			} else {
				log.warn(
					{ subnetId, reason: settlement.reason, message: settlement.message },
					"Stake order failed",
				);
			}
			this.events.emit("order_failed", {
				type: "order_failed",
				timestamp: this.clock.now(),
				blockHeight: block.height,
				subnetId,
				failure: settlement,
			});
			if (settlement.permanent) {
				this.disable(subnetId, settlement.reason, log);
			}
			return { subnetId, state: RuleState.Failed, price, order, failure: settlement };
		}

		const tx = settlement.transaction;
		const committed = await commitWithRetry(this.ledger, tx, this.commitRetry);
		const position = committed.position;
		log.info(
			{
				subnetId,
				extrinsicId: tx.extrinsicId,
				commit: committed.status,
				staked: tx.stakedAmount.toString(),
				spent: tx.spentAmount.toString(),
				fee: tx.feePaid.toString(),
				executionPrice: tx.executionPrice.toString(),
				totalStaked: position.totalStakedAmount.toString(),
				averageEntryPrice: averageEntryPrice(position).toString(),
				transactions: position.transactionCount,
			},
			"Stake settled",
		);
		this.events.emit("order_settled", {
			type: "order_settled",
			timestamp: this.clock.now(),
			blockHeight: block.height,
			transaction: tx,
			commit: committed.status,
			position,
		});
		return {
			subnetId,
			state: RuleState.Settled,
			price,
			order,
			transaction: tx,
			commit: committed.status,
			position,
		};
	}

	private disable(subnetId: SubnetId, reason: FailureReason, log: Logger): void {
		this.disabled.add(subnetId);
		log.error({ subnetId, reason }, "Rule disabled for the rest of the run");
		this.events.emit("rule_disabled", {
			type: "rule_disabled",
			timestamp: this.clock.now(),
			subnetId,
			reason,
		});
	}
}
