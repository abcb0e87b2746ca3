/**
 * LibDecimal: domain-agnostic wrapper around decimal.js-light.
 *
 * Provides precise decimal arithmetic without IEEE 754 float errors.
 * Domain code uses this through the shared/decimal facade and never imports
 * decimal.js-light directly.
 */
import DecimalLight from "decimal.js-light";

DecimalLight.set({ precision: 40 });

/** decimal.js rounding mode 1: toward zero. */
const ROUND_DOWN = 1;

const DECIMAL_RE = /^-?(\d+(\.\d*)?|\.\d+)([eE][-+]?\d+)?$/;

export class LibDecimal {
	private readonly raw: DecimalLight;

	private constructor(raw: DecimalLight) {
		this.raw = raw;
	}

	// ── Factories ──────────────────────────────────────────────────

	/**
	 * Creates a LibDecimal from a string or number.
	 * @throws Error if value is not finite (for numbers) or not a decimal literal (for strings)
	 * @example LibDecimal.from("0.0884")
	 */
	static from(value: string | number): LibDecimal {
		if (typeof value === "number") {
			if (!Number.isFinite(value)) {
				throw new Error(`LibDecimal.from: invalid number ${value}`);
			}
			return new LibDecimal(new DecimalLight(value));
		}
		const trimmed = value.trim();
		if (!DECIMAL_RE.test(trimmed)) {
			throw new Error(`LibDecimal.from: invalid decimal "${value}"`);
		}
		return new LibDecimal(new DecimalLight(trimmed));
	}

	/** True when `value` would be accepted by `from()`. */
	static isDecimalString(value: string): boolean {
		return DECIMAL_RE.test(value.trim());
	}

	static zero(): LibDecimal {
		return new LibDecimal(new DecimalLight(0));
	}

	static one(): LibDecimal {
		return new LibDecimal(new DecimalLight(1));
	}

	/** Sum of all values; zero for an empty list. */
	static sum(values: Iterable<LibDecimal>): LibDecimal {
		let total = LibDecimal.zero();
		for (const v of values) total = total.add(v);
		return total;
	}

	// ── Arithmetic (immutable) ─────────────────────────────────────

	add(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.plus(other.raw));
	}

	sub(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.minus(other.raw));
	}

	mul(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.times(other.raw));
	}

	/**
	 * Divides this value by another LibDecimal (immutable).
	 * @throws Error if dividing by zero
	 */
	div(other: LibDecimal): LibDecimal {
		if (other.raw.isZero()) {
			throw new Error("LibDecimal.div: division by zero");
		}
		return new LibDecimal(this.raw.dividedBy(other.raw));
	}

	/** Drops digits beyond `places` decimals, rounding toward zero. */
	truncate(places: number): LibDecimal {
		return new LibDecimal(this.raw.toDecimalPlaces(places, ROUND_DOWN));
	}

	// ── Comparison ─────────────────────────────────────────────────

	eq(other: LibDecimal): boolean {
		return this.raw.equals(other.raw);
	}

	gt(other: LibDecimal): boolean {
		return this.raw.greaterThan(other.raw);
	}

	gte(other: LibDecimal): boolean {
		return this.raw.greaterThanOrEqualTo(other.raw);
	}

	lt(other: LibDecimal): boolean {
		return this.raw.lessThan(other.raw);
	}

	lte(other: LibDecimal): boolean {
		return this.raw.lessThanOrEqualTo(other.raw);
	}

	isZero(): boolean {
		return this.raw.isZero();
	}

	isPositive(): boolean {
		return this.raw.greaterThan(0);
	}

	isNegative(): boolean {
		return this.raw.lessThan(0);
	}

	isInteger(): boolean {
		return this.raw.isInteger();
	}

	// ── Conversion ─────────────────────────────────────────────────

	/**
	 * Converts to a plain (non-exponential) string without trailing zeros.
	 * @example LibDecimal.from("1.500").toString() // "1.5"
	 */
	toString(): string {
		const fixed = this.raw.toFixed();
		if (fixed.indexOf(".") === -1) {
			return fixed;
		}
		return fixed.replace(/0+$/, "").replace(/\.$/, "");
	}

	toFixed(places: number): string {
		return this.raw.toFixed(places);
	}

	/** Lossy; for logging and ratios only. */
	toNumber(): number {
		return this.raw.toNumber();
	}

	toJSON(): string {
		return this.toString();
	}
}
