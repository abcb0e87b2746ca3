/**
 * EventDecoder: raw confirmation payload to SettlementResult.
 *
 * Pure and total: every input, however malformed, yields a result value.
 */

import type { Transaction } from "../ledger/types.js";
import { validate, z } from "../lib/validation/index.js";
import {
	DecodeError,
	FailureReason,
	type StakingError,
	SubmissionError,
	TimeoutError,
	isPermanentFailure,
	reasonFromChainMessage,
} from "../shared/errors.js";
import { accountAddress, blockHash, delegateId, extrinsicId } from "../shared/identifiers.js";
import { fromBaseUnits } from "../shared/units.js";
import { type DecodeContext, type FailedResult, SettlementKind, type SettlementResult } from "./types.js";

const STAKE_ADDED = "StakeAdded";

const receiptSchema = z.object({
	extrinsicId: z.string().trim().min(1),
	blockHash: z.string().trim().min(1),
	blockHeight: z.number().int().nonnegative(),
	success: z.boolean(),
	errorMessage: z.string().optional(),
	events: z.array(z.unknown()),
});

const baseUnitField = z.union([z.string(), z.number(), z.bigint()]);

const stakeAddedSchema = z.object({
	event: z.object({
		event_id: z.literal(STAKE_ADDED),
		attributes: z.tuple([
			z.string(),
			z.string(),
			baseUnitField,
			baseUnitField,
			z.union([z.number(), z.string()]),
			baseUnitField,
		]),
	}),
});

type StakeAddedAttributes = z.infer<typeof stakeAddedSchema>["event"]["attributes"];

export function failed(reason: FailureReason, message: string): FailedResult {
	return {
		kind: SettlementKind.Failed,
		reason,
		message,
		permanent: isPermanentFailure(reason),
	};
}

function isStakeAddedEvent(raw: unknown): boolean {
	if (typeof raw !== "object" || raw === null || !("event" in raw)) return false;
	const event: unknown = raw.event;
	return (
		typeof event === "object" && event !== null && "event_id" in event && event.event_id === STAKE_ADDED
	);
}

/**
 * Decodes an inclusion receipt for a stake order on `context.subnetId`.
 *
 * - A failed extrinsic is classified by its chain error message.
 * - A successful one must carry a StakeAdded event for the wallet coldkey and
 *   the ordered subnet; a missing event or unreadable amounts is `malformed`.
 * - A zero staked or spent amount is `rejected`.
 */
export function decodeSettlement(raw: unknown, context: DecodeContext): SettlementResult {
	const parsed = validate(receiptSchema, raw);
	if (!parsed.ok) {
		return failed(FailureReason.Malformed, `Malformed receipt: ${parsed.error.message}`);
	}
	const receipt = parsed.value;

	if (!receipt.success) {
		const message = receipt.errorMessage ?? "Extrinsic failed";
		return failed(reasonFromChainMessage(message) ?? FailureReason.Rejected, message);
	}

	let attributes: StakeAddedAttributes | undefined;
	for (const event of receipt.events) {
		if (!isStakeAddedEvent(event)) continue;
		const stakeEvent = validate(stakeAddedSchema, event);
		if (!stakeEvent.ok) {
			return failed(FailureReason.Malformed, `Malformed StakeAdded event: ${stakeEvent.error.message}`);
		}
		const candidate = stakeEvent.value.event.attributes;
		if (candidate[0] === context.coldkey && Number(candidate[4]) === context.subnetId) {
			attributes = candidate;
			break;
		}
	}
	if (attributes === undefined) {
		return failed(
			FailureReason.Malformed,
			`No StakeAdded event for ${context.coldkey} on subnet ${context.subnetId} in ${receipt.extrinsicId}`,
		);
	}

	const [coldkey, hotkey, spentRaw, stakedRaw, , feeRaw] = attributes;
	const spentAmount = fromBaseUnits(spentRaw);
	const stakedAmount = fromBaseUnits(stakedRaw);
	const feePaid = fromBaseUnits(feeRaw);
	if (spentAmount === null || stakedAmount === null || feePaid === null) {
		return failed(
			FailureReason.Malformed,
			`Non-integer amount in StakeAdded event of ${receipt.extrinsicId}`,
		);
	}
	if (stakedAmount.isZero() || spentAmount.isZero()) {
		return failed(FailureReason.Rejected, `StakeAdded event of ${receipt.extrinsicId} reports a zero amount`);
	}
	if (hotkey.trim().length === 0) {
		return failed(FailureReason.Malformed, `Empty hotkey in StakeAdded event of ${receipt.extrinsicId}`);
	}

	const transaction: Transaction = {
		subnetId: context.subnetId,
		stakedAmount,
		spentAmount,
		feePaid,
		executionPrice: spentAmount.div(stakedAmount),
		extrinsicId: extrinsicId(receipt.extrinsicId),
		blockId: blockHash(receipt.blockHash),
		blockHeight: receipt.blockHeight,
		submittedAtHeight: context.submittedAtHeight,
		timestamp: context.timestampMs,
		delegateId: delegateId(hotkey),
		coldkey: accountAddress(coldkey),
	};
	return { kind: SettlementKind.Settled, transaction };
}

/** Failure variant for an order whose submission never produced a receipt. */
export function failureFromError(error: StakingError): FailedResult {
	if (error instanceof TimeoutError) {
		return failed(FailureReason.TimedOut, error.message);
	}
	if (error instanceof SubmissionError) {
		return failed(error.reason, error.message);
	}
	if (error instanceof DecodeError) {
		return failed(FailureReason.Malformed, error.message);
	}
	return failed(FailureReason.Unknown, error.message);
}
