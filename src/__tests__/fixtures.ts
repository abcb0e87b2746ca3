import { Decimal } from "../shared/decimal.js";
import { accountAddress, blockHash, delegateId, extrinsicId, subnetId } from "../shared/identifiers.js";
import type { Transaction } from "../ledger/types.js";

export const COLDKEY = accountAddress("5ColdkeyTestWallet");
export const HOTKEY = delegateId("5HotkeyTestDelegate");

export interface TransactionFixture {
	readonly subnet?: number;
	readonly staked?: string;
	readonly spent?: string;
	readonly fee?: string;
	readonly height?: number;
	/** Defaults to `height` */
	readonly submittedAt?: number;
	readonly timestamp?: number;
	readonly id?: string;
}

/** Settled transaction with consistent amounts; `id` defaults to one derived from subnet and height. */
export function makeTransaction(fixture: TransactionFixture = {}): Transaction {
	const subnet = fixture.subnet ?? 64;
	const height = fixture.height ?? 100;
	const stakedAmount = Decimal.from(fixture.staked ?? "0.05");
	const spentAmount = Decimal.from(fixture.spent ?? "0.0045");
	return {
		subnetId: subnetId(subnet),
		stakedAmount,
		spentAmount,
		feePaid: Decimal.from(fixture.fee ?? "0"),
		executionPrice: spentAmount.div(stakedAmount),
		extrinsicId: extrinsicId(fixture.id ?? `0xe-${subnet}-${height}`),
		blockId: blockHash(`0xb-${height}`),
		blockHeight: height,
		submittedAtHeight: fixture.submittedAt ?? height,
		timestamp: fixture.timestamp ?? 1_700_000_000_000 + height,
		delegateId: HOTKEY,
		coldkey: COLDKEY,
	};
}
