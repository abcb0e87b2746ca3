/**
 * ChainGateway: Result-returning, deadline-bounded wrapper over ChainClient.
 *
 * Collaborator rejections are classified into StakingErrors; nothing the
 * client throws escapes as an exception.
 */

import { type Logger, silentLogger } from "../lib/logger/index.js";
import type { StakeOrderRequest } from "../order/types.js";
import type { Decimal } from "../shared/decimal.js";
import {
	FailureReason,
	PriceFetchError,
	type StakingError,
	SubmissionError,
	classifyError,
} from "../shared/errors.js";
import type { AccountAddress, SubnetId } from "../shared/identifiers.js";
import { type Result, mapErr, tryCatchAsync } from "../shared/result.js";
import { withDeadline } from "../shared/time.js";
import type { SigningCapability } from "../wallet/signing-capability.js";
import type { ChainClient } from "./types.js";

export interface ChainGatewayConfig {
	/** Bound on one submission including inclusion; undefined disables it */
	readonly submitTimeoutMs?: number | undefined;
	/** Bound on one price or balance query; undefined disables it */
	readonly queryTimeoutMs?: number | undefined;
	readonly logger?: Logger | undefined;
}

/** Blocks before the current one that a transaction's era starts at. */
const ERA_LAG_BLOCKS = 2;

function isStaleEra(error: StakingError): boolean {
	return error instanceof SubmissionError && error.reason === FailureReason.StaleEra;
}

export class ChainGateway {
	private readonly client: ChainClient;
	private readonly submitTimeoutMs: number | undefined;
	private readonly queryTimeoutMs: number | undefined;
	private readonly logger: Logger;

	constructor(client: ChainClient, config: ChainGatewayConfig = {}) {
		this.client = client;
		this.submitTimeoutMs = config.submitTimeoutMs;
		this.queryTimeoutMs = config.queryTimeoutMs;
		this.logger = (config.logger ?? silentLogger()).child({ component: "chain-gateway" });
	}

	async getPrice(subnetId: SubnetId): Promise<Result<Decimal, PriceFetchError>> {
		const result = await tryCatchAsync(
			() => withDeadline(this.client.getPrice(subnetId), this.queryTimeoutMs, `getPrice(${subnetId})`),
			classifyError,
		);
		return mapErr(
			result,
			(e) =>
				new PriceFetchError(`Price query for subnet ${subnetId} failed: ${e.message}`, {
					subnetId,
					cause: e,
				}),
		);
	}

	getBalance(address: AccountAddress): Promise<Result<Decimal, StakingError>> {
		return tryCatchAsync(
			() => withDeadline(this.client.getBalance(address), this.queryTimeoutMs, "getBalance"),
			classifyError,
		);
	}

	/**
	 * Submits a signed order and waits for its receipt. The era starts a couple
	 * of blocks before `blockHeight`; a stale-era refusal is retried once with
	 * the era moved one block forward.
	 */
	async submit(
		order: StakeOrderRequest,
		signer: SigningCapability,
		blockHeight: number,
	): Promise<Result<unknown, StakingError>> {
		const eraStartHeight = Math.max(0, blockHeight - ERA_LAG_BLOCKS);
		const first = await this.submitOnce(order, signer, eraStartHeight);
		if (first.ok || !isStaleEra(first.error)) {
			return first;
		}
		this.logger.info(
			{ subnetId: order.subnetId, eraStartHeight: eraStartHeight + 1 },
			"Stale era, resubmitting with a later era",
		);
		return this.submitOnce(order, signer, eraStartHeight + 1);
	}

	private submitOnce(
		order: StakeOrderRequest,
		signer: SigningCapability,
		eraStartHeight: number,
	): Promise<Result<unknown, StakingError>> {
		return tryCatchAsync(
			() =>
				withDeadline(
					this.client.submitStakeOrder(order, signer, { eraStartHeight }),
					this.submitTimeoutMs,
					`submitStakeOrder(${order.subnetId})`,
				),
			classifyError,
		);
	}
}
