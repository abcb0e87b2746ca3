/**
 * PaperChainClient: simulated chain for dry runs and tests.
 *
 * Prices, balances and blocks are scripted by the caller. Orders fill at the
 * current price minus a flat fee, are included `inclusionDelay` blocks after
 * the one being handled, and produce the same receipt shape a node would. No network calls;
 * fully deterministic when given a FakeClock.
 */

import type { StakeOrderRequest } from "../order/types.js";
import type { StakeReceipt } from "../settlement/types.js";
import { Decimal } from "../shared/decimal.js";
import type { AccountAddress, SubnetId } from "../shared/identifiers.js";
import { type Clock, SystemClock } from "../shared/time.js";
import { BASE_UNIT_DECIMALS, toBaseUnits } from "../shared/units.js";
import { type SigningCapability, unwrapSigningCapability } from "../wallet/signing-capability.js";
import type { BlockNotification, ChainClient, SubmitOptions } from "./types.js";

/**
 * Configuration for the paper chain.
 *
 * @example
 * ```ts
 * const chain = new PaperChainClient({ startHeight: 100, fee: Decimal.from("0.00005") });
 * chain.setPrice(subnetId(64), Decimal.from("0.0884"));
 * ```
 */
export interface PaperChainConfig {
	/** Height of the first produced block is `startHeight + 1` */
	readonly startHeight: number;
	/** Flat fee taken from every stake */
	readonly fee: Decimal;
	/** Blocks a transaction stays valid for after its era start */
	readonly eraPeriod: number;
	/** Blocks between the one being handled and the one that includes an order; 0 fills in place */
	readonly inclusionDelay: number;
	readonly clock: Clock;
	readonly maxSubmissionHistory: number;
}

/** Record of a simulated submission and what it produced. */
export interface SubmissionRecord {
	readonly order: StakeOrderRequest;
	readonly coldkey: AccountAddress;
	readonly blockHeight: number;
	readonly eraStartHeight: number;
	/** Null when the submission was refused */
	readonly receipt: StakeReceipt | null;
	readonly error: string | null;
}

type Waiter = (result: IteratorResult<BlockNotification, undefined>) => void;

export class PaperChainClient implements ChainClient {
	private readonly config: PaperChainConfig;
	private readonly prices = new Map<SubnetId, Decimal>();
	private readonly priceFailures = new Map<SubnetId, Error>();
	private readonly balances = new Map<string, Decimal>();
	private readonly scriptedRefusals: string[] = [];
	private readonly submissions: SubmissionRecord[] = [];
	private readonly pendingBlocks: BlockNotification[] = [];
	private readonly waiters: Waiter[] = [];
	private height: number;
	private extrinsicCounter = 0;
	private ended = false;

	constructor(config?: Partial<PaperChainConfig>) {
		const eraPeriod = config?.eraPeriod ?? 4;
		if (!Number.isInteger(eraPeriod) || eraPeriod <= 0) {
			throw new Error(`eraPeriod must be a positive integer, got ${eraPeriod}`);
		}
		const inclusionDelay = config?.inclusionDelay ?? 0;
		if (!Number.isInteger(inclusionDelay) || inclusionDelay < 0) {
			throw new Error(`inclusionDelay must be a non-negative integer, got ${inclusionDelay}`);
		}
		this.config = {
			startHeight: config?.startHeight ?? 0,
			fee: config?.fee ?? Decimal.zero(),
			eraPeriod,
			inclusionDelay,
			clock: config?.clock ?? SystemClock,
			maxSubmissionHistory: config?.maxSubmissionHistory ?? 10_000,
		};
		this.height = this.config.startHeight;
	}

	// ── Scripting ──────────────────────────────────────────────────

	setPrice(subnetId: SubnetId, price: Decimal): void {
		this.prices.set(subnetId, price);
		this.priceFailures.delete(subnetId);
	}

	/** Price queries for `subnetId` reject with `error` until the next setPrice. */
	failPrice(subnetId: SubnetId, error: Error = new Error("price query failed")): void {
		this.priceFailures.set(subnetId, error);
	}

	setBalance(address: AccountAddress, amount: Decimal): void {
		this.balances.set(address, amount);
	}

	/** The next submission is refused by the node with `message`. */
	refuseNextSubmission(message: string): void {
		this.scriptedRefusals.push(message);
	}

	/** Advances the chain by one block and delivers it to the subscription. */
	produceBlock(): BlockNotification {
		this.height++;
		const block: BlockNotification = {
			height: this.height,
			hash: hashFor("b", this.height),
			timestampMs: this.config.clock.now(),
		};
		const waiter = this.waiters.shift();
		if (waiter) {
			waiter({ done: false, value: block });
		} else {
			this.pendingBlocks.push(block);
		}
		return block;
	}

	/** Ends the block subscription once delivered blocks are drained. */
	end(): void {
		this.ended = true;
		for (const waiter of this.waiters.splice(0)) {
			waiter({ done: true, value: undefined });
		}
	}

	get currentHeight(): number {
		return this.height;
	}

	/** Every submission in order, refused ones included. */
	submissionHistory(): readonly SubmissionRecord[] {
		return [...this.submissions];
	}

	// ── ChainClient ────────────────────────────────────────────────

	async getPrice(subnetId: SubnetId): Promise<Decimal> {
		const failure = this.priceFailures.get(subnetId);
		if (failure) throw failure;
		const price = this.prices.get(subnetId);
		if (price === undefined) {
			throw new Error(`SubnetNotExists: no price for subnet ${subnetId}`);
		}
		return price;
	}

	async getBalance(address: AccountAddress): Promise<Decimal> {
		return this.balances.get(address) ?? Decimal.zero();
	}

	async submitStakeOrder(
		order: StakeOrderRequest,
		capability: SigningCapability,
		options: SubmitOptions,
	): Promise<unknown> {
		const signer = unwrapSigningCapability(capability);
		await signer.sign(new TextEncoder().encode(JSON.stringify(order)));

		const record = (receipt: StakeReceipt | null, error: string | null): void => {
			this.pushSubmission({
				order,
				coldkey: signer.address,
				blockHeight: this.height,
				eraStartHeight: options.eraStartHeight,
				receipt,
				error,
			});
		};
		const refuse = (message: string): Error => {
			record(null, message);
			return new Error(message);
		};

		const scripted = this.scriptedRefusals.shift();
		if (scripted !== undefined) throw refuse(scripted);
		if (options.eraStartHeight + this.config.eraPeriod <= this.height) {
			throw refuse("Transaction is outdated: ancient birth block");
		}
		const price = this.prices.get(order.subnetId);
		if (price === undefined) {
			throw refuse(`SubnetNotExists: subnet ${order.subnetId}`);
		}
		if (price.gt(order.limitPrice)) {
			throw refuse(`ZeroMaxStakeAmount: price ${price} above limit ${order.limitPrice}`);
		}
		const balance = this.balances.get(signer.address) ?? Decimal.zero();
		if (balance.lt(order.stakeAmount)) {
			throw refuse(`NotEnoughBalanceToStake: ${balance} < ${order.stakeAmount}`);
		}

		const fee = this.config.fee.gt(order.stakeAmount) ? order.stakeAmount : this.config.fee;
		const spent = order.stakeAmount.sub(fee);
		const staked = spent.div(price).truncate(BASE_UNIT_DECIMALS);
		this.balances.set(signer.address, balance.sub(order.stakeAmount));

		this.extrinsicCounter++;
		const includedAt = this.height + this.config.inclusionDelay;
		const receipt: StakeReceipt = {
			extrinsicId: hashFor("e", this.extrinsicCounter),
			blockHash: hashFor("b", includedAt),
			blockHeight: includedAt,
			success: true,
			events: [
				{
					event: {
						event_id: "StakeAdded",
						attributes: [
							signer.address,
							order.delegateId,
							toBaseUnits(spent),
							toBaseUnits(staked),
							order.subnetId,
							toBaseUnits(fee),
						],
					},
				},
				{ event: { event_id: "ExtrinsicSuccess", attributes: [] } },
			],
		};
		record(receipt, null);
		return receipt;
	}

	subscribeBlocks(): AsyncIterable<BlockNotification> {
		return {
			[Symbol.asyncIterator]: () => ({
				next: () => this.nextBlock(),
			}),
		};
	}

	// ── Internal ───────────────────────────────────────────────────

	private nextBlock(): Promise<IteratorResult<BlockNotification, undefined>> {
		const block = this.pendingBlocks.shift();
		if (block) return Promise.resolve({ done: false, value: block });
		if (this.ended) return Promise.resolve({ done: true, value: undefined });
		return new Promise((resolve) => {
			this.waiters.push(resolve);
		});
	}

	private pushSubmission(record: SubmissionRecord): void {
		if (this.submissions.length >= this.config.maxSubmissionHistory) {
			this.submissions.shift();
		}
		this.submissions.push(record);
	}
}

function hashFor(prefix: string, n: number): string {
	return `0x${prefix}${n.toString(16).padStart(63, "0")}`;
}
