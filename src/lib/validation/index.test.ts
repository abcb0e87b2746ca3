import { describe, expect, it } from "vitest";
import { StakingError } from "../../shared/errors.js";
import { isErr, isOk } from "../../shared/result.js";
import { ValidationError, formatIssues, validate, z } from "./index.js";

describe("validation wrapper", () => {
	describe("validate()", () => {
		it("returns ok(data) for valid input", () => {
			const result = validate(z.string(), "hello");

			expect(isOk(result)).toBe(true);
			if (result.ok) {
				expect(result.value).toBe("hello");
			}
		});

		it("returns err(ValidationError) for invalid input", () => {
			const result = validate(z.number(), "not a number");

			expect(isErr(result)).toBe(true);
			if (!result.ok) {
				expect(result.error).toBeInstanceOf(ValidationError);
			}
		});

		it("includes issue paths for nested objects", () => {
			const schema = z.object({
				rule: z.object({
					subnetId: z.number(),
					stakeAmount: z.string(),
				}),
			});
			const result = validate(schema, { rule: { subnetId: "64", stakeAmount: 5 } });

			expect(isErr(result)).toBe(true);
			if (!result.ok) {
				expect(result.error.issues.map((i) => i.path)).toEqual([
					["rule", "subnetId"],
					["rule", "stakeAmount"],
				]);
			}
		});

		it("returns the transformed value of a transforming schema", () => {
			const schema = z.string().transform((s) => s.length);
			const result = validate(schema, "abcd");

			expect(result.ok && result.value).toBe(4);
		});

		it("works with arrays and optionals", () => {
			const schema = z.object({
				tags: z.array(z.string()),
				description: z.string().optional(),
				count: z.number().min(0),
			});

			const valid = validate(schema, { tags: ["a", "b"], count: 5 });
			expect(valid.ok && valid.value).toEqual({ tags: ["a", "b"], count: 5 });

			const invalid = validate(schema, { tags: [1, 2], count: -1 });
			expect(isErr(invalid)).toBe(true);
			if (!invalid.ok) {
				expect(invalid.error.issues).toHaveLength(3);
			}
		});
	});

	describe("formatIssues", () => {
		it("joins dotted paths and messages", () => {
			expect(
				formatIssues([
					{ path: [0, "stakeAmount"], message: "Required" },
					{ path: [], message: "Expected array" },
				]),
			).toBe("0.stakeAmount: Required; Expected array");
		});

		it("is the message of a ValidationError from validate()", () => {
			const result = validate(z.object({ subnetId: z.number() }), {});
			expect(!result.ok && result.error.message).toBe("subnetId: Required");
		});
	});

	describe("ValidationError", () => {
		it("extends StakingError with correct code and category", () => {
			const issues = [{ path: ["field"], message: "bad" }];
			const error = new ValidationError("Validation failed", issues);

			expect(error).toBeInstanceOf(StakingError);
			expect(error).toBeInstanceOf(Error);
			expect(error.code).toBe("VALIDATION_FAILED");
			expect(error.category).toBe("non_retryable");
			expect(error.isRetryable).toBe(false);
			expect(error.issues).toBe(issues);
			expect(error.message).toBe("Validation failed");
		});
	});
});
