import { describe, expect, it } from "vitest";
import { LibDecimal } from "./index.js";

describe("LibDecimal", () => {
	describe("factories", () => {
		it("creates from string", () => {
			expect(LibDecimal.from("1.5").toString()).toBe("1.5");
			expect(LibDecimal.from("100").toString()).toBe("100");
			expect(LibDecimal.from("0.0884").toString()).toBe("0.0884");
		});

		it("creates from number", () => {
			expect(LibDecimal.from(1.5).toString()).toBe("1.5");
			expect(LibDecimal.from(0.005).toString()).toBe("0.005");
			expect(LibDecimal.from(0).toString()).toBe("0");
		});

		it("trims whitespace around string input", () => {
			expect(LibDecimal.from(" 0.25 ").toString()).toBe("0.25");
		});

		it("creates zero and one", () => {
			expect(LibDecimal.zero().toString()).toBe("0");
			expect(LibDecimal.one().toString()).toBe("1");
		});

		it.each(["", "abc", "1.2.3", "0x10", "1,5"])("rejects %j", (raw) => {
			expect(() => LibDecimal.from(raw)).toThrow("invalid decimal");
		});

		it("rejects NaN and Infinity", () => {
			expect(() => LibDecimal.from(Number.NaN)).toThrow("invalid number");
			expect(() => LibDecimal.from(Number.POSITIVE_INFINITY)).toThrow("invalid number");
		});

		it("isDecimalString mirrors from()", () => {
			expect(LibDecimal.isDecimalString("0.05")).toBe(true);
			expect(LibDecimal.isDecimalString("-1e-3")).toBe(true);
			expect(LibDecimal.isDecimalString(".5")).toBe(true);
			expect(LibDecimal.isDecimalString("five")).toBe(false);
		});

		it("sums an iterable, zero when empty", () => {
			expect(LibDecimal.sum([]).toString()).toBe("0");
			expect(
				LibDecimal.sum([LibDecimal.from("0.1"), LibDecimal.from("0.2"), LibDecimal.from("0.3")]).toString(),
			).toBe("0.6");
		});
	});

	describe("arithmetic precision", () => {
		it("0.1 + 0.2 = 0.3 exactly", () => {
			expect(LibDecimal.from("0.1").add(LibDecimal.from("0.2")).toString()).toBe("0.3");
		});

		it("subtracts correctly", () => {
			expect(LibDecimal.from("5.5").sub(LibDecimal.from("2.2")).toString()).toBe("3.3");
			expect(LibDecimal.from("1").sub(LibDecimal.from("1.5")).toString()).toBe("-0.5");
		});

		it("multiplies correctly", () => {
			expect(LibDecimal.from("0.1").mul(LibDecimal.from("0.2")).toString()).toBe("0.02");
		});

		it("divides correctly", () => {
			expect(LibDecimal.from("10").div(LibDecimal.from("4")).toString()).toBe("2.5");
			expect(LibDecimal.from("1").div(LibDecimal.from("3")).toFixed(6)).toBe("0.333333");
		});

		it("throws on division by zero", () => {
			expect(() => LibDecimal.one().div(LibDecimal.zero())).toThrow("division by zero");
		});
	});

	describe("truncate", () => {
		it("drops digits beyond the given places without rounding up", () => {
			expect(LibDecimal.from("0.0874999999999").truncate(9).toString()).toBe("0.087499999");
			expect(LibDecimal.from("1.99").truncate(0).toString()).toBe("1");
		});

		it("rounds toward zero for negatives", () => {
			expect(LibDecimal.from("-1.99").truncate(1).toString()).toBe("-1.9");
		});
	});

	describe("comparison", () => {
		const a = LibDecimal.from("0.049");
		const b = LibDecimal.from("0.05");

		it("orders values", () => {
			expect(a.lt(b)).toBe(true);
			expect(a.lte(b)).toBe(true);
			expect(b.gt(a)).toBe(true);
			expect(b.gte(b)).toBe(true);
			expect(b.lte(b)).toBe(true);
		});

		it("treats representations of the same value as equal", () => {
			expect(LibDecimal.from("0.050").eq(b)).toBe(true);
			expect(LibDecimal.from(0.05).eq(b)).toBe(true);
		});

		it("classifies sign and integrality", () => {
			expect(LibDecimal.zero().isZero()).toBe(true);
			expect(b.isPositive()).toBe(true);
			expect(LibDecimal.from("-0.1").isNegative()).toBe(true);
			expect(LibDecimal.from("3").isInteger()).toBe(true);
			expect(b.isInteger()).toBe(false);
		});
	});

	describe("conversion", () => {
		it("toString strips trailing zeros and never uses exponent notation", () => {
			expect(LibDecimal.from("1.500").toString()).toBe("1.5");
			expect(LibDecimal.from("1e-9").toString()).toBe("0.000000001");
			expect(LibDecimal.from("2.000").toString()).toBe("2");
		});

		it("toFixed pads to the given places", () => {
			expect(LibDecimal.from("0.5").toFixed(3)).toBe("0.500");
		});

		it("serializes to its string form in JSON", () => {
			expect(JSON.stringify({ price: LibDecimal.from("0.0884") })).toBe('{"price":"0.0884"}');
		});

		it("toNumber returns the float approximation", () => {
			expect(LibDecimal.from("0.25").toNumber()).toBe(0.25);
		});
	});
});
