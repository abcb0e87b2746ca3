import { afterEach, describe, expect, it, vi } from "vitest";
import { COLDKEY, HOTKEY } from "../__tests__/fixtures.js";
import { buildStakeOrder } from "../order/order-builder.js";
import { Decimal } from "../shared/decimal.js";
import {
	FailureReason,
	PriceFetchError,
	SubmissionError,
	SystemError,
	TimeoutError,
} from "../shared/errors.js";
import { subnetId } from "../shared/identifiers.js";
import { createSigningCapability } from "../wallet/signing-capability.js";
import { ChainGateway } from "./chain-gateway.js";
import { PaperChainClient } from "./paper-chain-client.js";
import type { BlockNotification, ChainClient } from "./types.js";

const SUBNET = subnetId(64);
const signer = createSigningCapability({ address: COLDKEY, sign: async (payload) => payload });
const order = buildStakeOrder(
	{
		subnetId: SUBNET,
		activationPrice: Decimal.from("0.09"),
		limitPrice: Decimal.from("0.09"),
		stakeAmount: Decimal.from("0.005"),
		delegateId: HOTKEY,
	},
	Decimal.from("0.05"),
);

/** Client whose every call hangs until the test's deadline fires. */
function hangingClient(): ChainClient {
	const never = <T>(): Promise<T> => new Promise<T>(() => {});
	return {
		getPrice: () => never(),
		getBalance: () => never(),
		submitStakeOrder: () => never(),
		subscribeBlocks: (): AsyncIterable<BlockNotification> => ({
			[Symbol.asyncIterator]: () => ({ next: () => never() }),
		}),
	};
}

function chainAtHeight(height: number, eraPeriod = 4): PaperChainClient {
	const chain = new PaperChainClient({ startHeight: height - 1, eraPeriod });
	chain.setPrice(SUBNET, Decimal.from("0.05"));
	chain.setBalance(COLDKEY, Decimal.from("1"));
	chain.produceBlock();
	return chain;
}

afterEach(() => {
	vi.useRealTimers();
});

describe("ChainGateway", () => {
	describe("getPrice", () => {
		it("returns the client's price", async () => {
			const gateway = new ChainGateway(chainAtHeight(10));
			const result = await gateway.getPrice(SUBNET);
			expect(result.ok && result.value.toString()).toBe("0.05");
		});

		it("wraps a rejection in a PriceFetchError for the subnet", async () => {
			const chain = chainAtHeight(10);
			chain.failPrice(SUBNET, new Error("rpc unavailable"));

			const result = await new ChainGateway(chain).getPrice(SUBNET);

			expect(result.ok).toBe(false);
			if (result.ok) return;
			expect(result.error).toBeInstanceOf(PriceFetchError);
			expect(result.error.message).toBe("Price query for subnet 64 failed: rpc unavailable");
			expect(result.error.isRetryable).toBe(true);
			expect(result.error.context).toEqual({ subnetId: 64 });
			expect(result.error.cause).toBeInstanceOf(SystemError);
		});

		it("gives up after the query timeout", async () => {
			vi.useFakeTimers();
			const gateway = new ChainGateway(hangingClient(), { queryTimeoutMs: 500 });

			const pending = gateway.getPrice(SUBNET);
			await vi.advanceTimersByTimeAsync(500);
			const result = await pending;

			expect(!result.ok && result.error.message).toBe(
				"Price query for subnet 64 failed: getPrice(64) timed out after 500ms",
			);
			expect(!result.ok && result.error.cause).toBeInstanceOf(TimeoutError);
		});
	});

	describe("getBalance", () => {
		it("returns the balance or a classified error", async () => {
			const gateway = new ChainGateway(chainAtHeight(10));
			const balance = await gateway.getBalance(COLDKEY);
			expect(balance.ok && balance.value.toString()).toBe("1");

			vi.useFakeTimers();
			const slow = new ChainGateway(hangingClient(), { queryTimeoutMs: 200 });
			const pending = slow.getBalance(COLDKEY);
			await vi.advanceTimersByTimeAsync(200);
			const result = await pending;
			expect(!result.ok && result.error).toBeInstanceOf(TimeoutError);
		});
	});

	describe("submit", () => {
		it("starts the era two blocks before the current height", async () => {
			const chain = chainAtHeight(10);
			const result = await new ChainGateway(chain).submit(order, signer, 10);

			expect(result.ok).toBe(true);
			expect(chain.submissionHistory().map((s) => s.eraStartHeight)).toEqual([8]);
		});

		it("never starts an era below zero", async () => {
			const chain = chainAtHeight(1);
			await new ChainGateway(chain).submit(order, signer, 1);
			expect(chain.submissionHistory()[0]?.eraStartHeight).toBe(0);
		});

		it("resubmits once with a later era after a stale-era refusal", async () => {
			const chain = chainAtHeight(10, 2);

			const result = await new ChainGateway(chain).submit(order, signer, 10);

			expect(result.ok).toBe(true);
			expect(chain.submissionHistory().map((s) => [s.eraStartHeight, s.error])).toEqual([
				[8, "Transaction is outdated: ancient birth block"],
				[9, null],
			]);
		});

		it("reports the second stale-era refusal without a third attempt", async () => {
			const chain = chainAtHeight(10);
			chain.refuseNextSubmission("Transaction is outdated");
			chain.refuseNextSubmission("Transaction is outdated");

			const result = await new ChainGateway(chain).submit(order, signer, 10);

			expect(chain.submissionHistory()).toHaveLength(2);
			expect(!result.ok && result.error).toBeInstanceOf(SubmissionError);
			expect(!result.ok && result.error instanceof SubmissionError && result.error.reason).toBe(
				FailureReason.StaleEra,
			);
		});

		it("classifies other refusals by the chain message", async () => {
			const chain = chainAtHeight(10);
			chain.refuseNextSubmission("SubtensorModule.HotKeyAccountNotExists");

			const result = await new ChainGateway(chain).submit(order, signer, 10);

			expect(chain.submissionHistory()).toHaveLength(1);
			expect(!result.ok && result.error instanceof SubmissionError && result.error.isPermanent).toBe(true);
		});

		it("times out a submission that never returns", async () => {
			vi.useFakeTimers();
			const gateway = new ChainGateway(hangingClient(), { submitTimeoutMs: 12_000 });

			const pending = gateway.submit(order, signer, 10);
			await vi.advanceTimersByTimeAsync(12_000);
			const result = await pending;

			expect(!result.ok && result.error.message).toBe("submitStakeOrder(64) timed out after 12000ms");
		});
	});
});
