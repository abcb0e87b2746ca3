/**
 * Chain client contract: the capabilities the staking core consumes.
 */

import type { StakeOrderRequest } from "../order/types.js";
import type { Decimal } from "../shared/decimal.js";
import type { AccountAddress, SubnetId } from "../shared/identifiers.js";
import type { SigningCapability } from "../wallet/signing-capability.js";

/** A new block seen by the subscription. */
export interface BlockNotification {
	readonly height: number;
	readonly hash: string;
	/** Block timestamp when the node reports one */
	readonly timestampMs?: number;
}

export interface SubmitOptions {
	/** Height the transaction's mortality era starts at */
	readonly eraStartHeight: number;
}

export interface ChainClient {
	/** Current price of a subnet's alpha, in native tokens. */
	getPrice(subnetId: SubnetId): Promise<Decimal>;
	/** Free native-token balance of an account. */
	getBalance(address: AccountAddress): Promise<Decimal>;
	/**
	 * Signs, submits and waits for inclusion of a stake order. Resolves with
	 * the raw inclusion receipt; rejects when the node refuses the extrinsic.
	 */
	submitStakeOrder(
		order: StakeOrderRequest,
		signer: SigningCapability,
		options: SubmitOptions,
	): Promise<unknown>;
	/** Lazy, infinite, single-use stream of new blocks. */
	subscribeBlocks(): AsyncIterable<BlockNotification>;
}
