import { describe, expect, it } from "vitest";
import {
	accountAddress,
	blockHash,
	delegateId,
	extrinsicId,
	subnetId,
} from "./identifiers.js";

describe("identifiers", () => {
	describe("subnetId", () => {
		it("accepts non-negative integers", () => {
			expect(subnetId(0)).toBe(0);
			expect(subnetId(64)).toBe(64);
		});

		it.each([-1, 1.5, Number.NaN, Number.POSITIVE_INFINITY])("rejects %s", (value) => {
			expect(() => subnetId(value)).toThrow("SubnetId must be a non-negative integer");
		});
	});

	describe("string identifiers", () => {
		it("trim surrounding whitespace", () => {
			expect(extrinsicId("  0xabc ")).toBe("0xabc");
			expect(blockHash("0xdef\n")).toBe("0xdef");
		});

		it("reject empty and whitespace-only values with the brand in the message", () => {
			expect(() => extrinsicId("")).toThrow("ExtrinsicId cannot be empty");
			expect(() => blockHash("   ")).toThrow("BlockHash cannot be empty");
			expect(() => delegateId("")).toThrow("DelegateId cannot be empty");
			expect(() => accountAddress("\t")).toThrow("AccountAddress cannot be empty");
		});

		it("compare equal to their raw string", () => {
			const raw = "5Fdelegate";
			expect(delegateId(raw) === raw).toBe(true);
		});
	});
});
