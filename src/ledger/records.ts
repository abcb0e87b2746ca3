/**
 * Transaction <-> store record mapping. Decimals travel as strings so a
 * replayed ledger aggregates to exactly the committed values.
 */

import { type ValidationError, validate, z } from "../lib/validation/index.js";
import { Decimal } from "../shared/decimal.js";
import {
	accountAddress,
	blockHash,
	delegateId,
	extrinsicId,
	subnetId,
} from "../shared/identifiers.js";
import { type Result, map } from "../shared/result.js";
import type { Transaction, TransactionRecord } from "./types.js";

const decimalString = z
	.string()
	.refine((s) => Decimal.isDecimalString(s), { message: "Expected a decimal string" });

const transactionRecordSchema = z.object({
	type: z.literal("transaction"),
	v: z.literal(1),
	subnetId: z.number().int().nonnegative(),
	stakedAmount: decimalString,
	spentAmount: decimalString,
	feePaid: decimalString,
	executionPrice: decimalString,
	extrinsicId: z.string().trim().min(1),
	blockId: z.string().trim().min(1),
	blockHeight: z.number().int().nonnegative(),
	// absent from records written before submission heights were stored
	submittedAtHeight: z.number().int().nonnegative().optional(),
	timestamp: z.number().int().nonnegative(),
	delegateId: z.string().trim().min(1),
	coldkey: z.string().trim().min(1),
});

export function toRecord(tx: Transaction): TransactionRecord {
	return {
		type: "transaction",
		v: 1,
		subnetId: tx.subnetId,
		stakedAmount: tx.stakedAmount.toString(),
		spentAmount: tx.spentAmount.toString(),
		feePaid: tx.feePaid.toString(),
		executionPrice: tx.executionPrice.toString(),
		extrinsicId: tx.extrinsicId,
		blockId: tx.blockId,
		blockHeight: tx.blockHeight,
		submittedAtHeight: tx.submittedAtHeight,
		timestamp: tx.timestamp,
		delegateId: tx.delegateId,
		coldkey: tx.coldkey,
	};
}

export function fromRecord(raw: unknown): Result<Transaction, ValidationError> {
	return map(validate(transactionRecordSchema, raw), (r) => ({
		subnetId: subnetId(r.subnetId),
		stakedAmount: Decimal.from(r.stakedAmount),
		spentAmount: Decimal.from(r.spentAmount),
		feePaid: Decimal.from(r.feePaid),
		executionPrice: Decimal.from(r.executionPrice),
		extrinsicId: extrinsicId(r.extrinsicId),
		blockId: blockHash(r.blockId),
		blockHeight: r.blockHeight,
		submittedAtHeight: r.submittedAtHeight ?? r.blockHeight,
		timestamp: r.timestamp,
		delegateId: delegateId(r.delegateId),
		coldkey: accountAddress(r.coldkey),
	}));
}
