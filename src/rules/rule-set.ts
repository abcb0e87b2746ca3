/**
 * RuleSet: immutable, declaration-ordered collection of staking rules.
 *
 * Definitions are validated as a whole: every problem in the source is
 * reported in one ConfigError so an operator can fix the file in one pass.
 */

import { readFile } from "node:fs/promises";
import { type ValidationIssue, formatIssues, validate, z } from "../lib/validation/index.js";
import { Decimal } from "../shared/decimal.js";
import { ConfigError } from "../shared/errors.js";
import { type SubnetId, delegateId, subnetId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import type { Rule, RuleSetOptions } from "./types.js";

const decimalField = z.union([
	z.number().finite(),
	z.string().refine((s) => Decimal.isDecimalString(s), { message: "Expected a decimal string" }),
]);

/** Accepts camelCase keys and the snake_case keys used by hand-written config files. */
const ruleDefinitionSchema = z
	.object({
		subnetId: z.number().int().nonnegative().optional(),
		subnet_id: z.number().int().nonnegative().optional(),
		activationPrice: decimalField.optional(),
		activation_price: decimalField.optional(),
		limitPrice: decimalField.optional(),
		limit_price: decimalField.optional(),
		stakeAmount: decimalField.optional(),
		stake_amount: decimalField.optional(),
		delegateId: z.string().min(1).optional(),
		delegate_id: z.string().min(1).optional(),
	})
	.transform((d) => ({
		subnetId: d.subnetId ?? d.subnet_id,
		activationPrice: d.activationPrice ?? d.activation_price,
		limitPrice: d.limitPrice ?? d.limit_price,
		stakeAmount: d.stakeAmount ?? d.stake_amount,
		delegateId: d.delegateId ?? d.delegate_id,
	}));

const ruleSourceSchema = z.array(ruleDefinitionSchema);

export class RuleSet {
	private readonly ordered: readonly Rule[];
	private readonly bySubnet: ReadonlyMap<SubnetId, Rule>;

	private constructor(rules: readonly Rule[]) {
		this.ordered = Object.freeze([...rules]);
		this.bySubnet = new Map(rules.map((r): [SubnetId, Rule] => [r.subnetId, r]));
	}

	/**
	 * Parses and validates rule definitions.
	 *
	 * Rejects a definition when a required field is missing, a price or the
	 * stake amount is not positive, `limitPrice` exceeds `activationPrice`, or
	 * its subnet already has a rule.
	 */
	static load(source: unknown, options: RuleSetOptions = {}): Result<RuleSet, ConfigError> {
		const parsed = validate(ruleSourceSchema, source);
		if (!parsed.ok) {
			return err(
				new ConfigError(`Invalid rule definitions: ${parsed.error.message}`, {
					issues: parsed.error.issues,
				}),
			);
		}

		const issues: ValidationIssue[] = [];
		const rules: Rule[] = [];
		const seen = new Set<number>();

		parsed.value.forEach((def, index) => {
			const issue = (field: string, message: string): void => {
				issues.push({ path: [index, field], message });
			};

			if (def.subnetId === undefined) issue("subnetId", "Required");
			if (def.activationPrice === undefined) issue("activationPrice", "Required");
			if (def.limitPrice === undefined) issue("limitPrice", "Required");
			if (def.stakeAmount === undefined) issue("stakeAmount", "Required");
			const delegate = def.delegateId ?? options.defaultDelegate;
			if (delegate === undefined || delegate.trim().length === 0) {
				issue("delegateId", "Required when no default delegate is configured");
			}
			if (
				def.subnetId === undefined ||
				def.activationPrice === undefined ||
				def.limitPrice === undefined ||
				def.stakeAmount === undefined ||
				delegate === undefined ||
				delegate.trim().length === 0
			) {
				return;
			}

			const activationPrice = Decimal.from(def.activationPrice);
			const limitPrice = Decimal.from(def.limitPrice);
			const stakeAmount = Decimal.from(def.stakeAmount);
			let valid = true;

			if (seen.has(def.subnetId)) {
				issue("subnetId", `Duplicate rule for subnet ${def.subnetId}`);
				valid = false;
			}
			seen.add(def.subnetId);
			if (!activationPrice.isPositive()) {
				issue("activationPrice", "Must be positive");
				valid = false;
			}
			if (!limitPrice.isPositive()) {
				issue("limitPrice", "Must be positive");
				valid = false;
			}
			if (limitPrice.gt(activationPrice)) {
				issue(
					"limitPrice",
					`limitPrice (${limitPrice}) must not exceed activationPrice (${activationPrice})`,
				);
				valid = false;
			}
			if (!stakeAmount.isPositive()) {
				issue("stakeAmount", "Must be positive");
				valid = false;
			}

			if (valid) {
				rules.push(
					Object.freeze({
						subnetId: subnetId(def.subnetId),
						activationPrice,
						limitPrice,
						stakeAmount,
						delegateId: delegateId(delegate),
					}),
				);
			}
		});

		if (issues.length > 0) {
			return err(new ConfigError(`Invalid rule definitions: ${formatIssues(issues)}`, { issues }));
		}
		return ok(new RuleSet(rules));
	}

	/** Rules in declaration order. */
	rules(): readonly Rule[] {
		return this.ordered;
	}

	/** Distinct subnets referenced by the rules, in declaration order. */
	subnetIds(): readonly SubnetId[] {
		return [...this.bySubnet.keys()];
	}

	ruleFor(id: SubnetId): Rule | undefined {
		return this.bySubnet.get(id);
	}

	get size(): number {
		return this.ordered.length;
	}
}

/**
 * Reads a JSON array of rule definitions from disk and loads it.
 * Unreadable files and invalid JSON become ConfigError.
 */
export async function loadRuleFile(
	path: string,
	options: RuleSetOptions = {},
): Promise<Result<RuleSet, ConfigError>> {
	let content: string;
	try {
		content = await readFile(path, "utf-8");
	} catch (e: unknown) {
		const msg = e instanceof Error ? e.message : String(e);
		return err(new ConfigError(`Cannot read rule file ${path}: ${msg}`, { path, cause: e }));
	}

	let source: unknown;
	try {
		source = JSON.parse(content);
	} catch (e: unknown) {
		const msg = e instanceof Error ? e.message : String(e);
		return err(new ConfigError(`Rule file ${path} is not valid JSON: ${msg}`, { path, cause: e }));
	}
	return RuleSet.load(source, options);
}
