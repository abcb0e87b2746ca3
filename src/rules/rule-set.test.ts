import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError } from "../shared/errors.js";
import { subnetId } from "../shared/identifiers.js";
import { RuleSet, loadRuleFile } from "./rule-set.js";

const HOTKEY = "5HotkeyDelegate";

function rule(overrides: Record<string, unknown> = {}): Record<string, unknown> {
	return {
		subnetId: 64,
		activationPrice: "0.09",
		limitPrice: "0.0874",
		stakeAmount: "0.005",
		delegateId: HOTKEY,
		...overrides,
	};
}

function loadError(source: unknown, defaultDelegate?: string): ConfigError {
	const result = RuleSet.load(source, { defaultDelegate });
	if (result.ok) throw new Error("expected RuleSet.load to fail");
	return result.error;
}

describe("RuleSet.load", () => {
	it("builds immutable rules in declaration order", () => {
		const result = RuleSet.load([rule({ subnetId: 3 }), rule({ subnetId: 1 })]);

		expect(result.ok).toBe(true);
		if (!result.ok) return;
		const rules = result.value.rules();
		expect(rules.map((r) => r.subnetId)).toEqual([3, 1]);
		expect(result.value.subnetIds()).toEqual([3, 1]);
		expect(result.value.size).toBe(2);
		expect(rules[0]?.activationPrice.toString()).toBe("0.09");
		expect(rules[0]?.limitPrice.toString()).toBe("0.0874");
		expect(rules[0]?.stakeAmount.toString()).toBe("0.005");
		expect(rules[0]?.delegateId).toBe(HOTKEY);
		expect(Object.isFrozen(rules)).toBe(true);
		expect(Object.isFrozen(rules[0])).toBe(true);
	});

	it("accepts numeric prices and snake_case keys", () => {
		const result = RuleSet.load([
			{ subnet_id: 7, activation_price: 0.05, limit_price: 0.05, stake_amount: 1, delegate_id: HOTKEY },
		]);

		expect(result.ok).toBe(true);
		if (!result.ok) return;
		const found = result.value.ruleFor(subnetId(7));
		expect(found?.activationPrice.toString()).toBe("0.05");
		expect(found?.limitPrice.toString()).toBe("0.05");
		expect(result.value.ruleFor(subnetId(8))).toBeUndefined();
	});

	it("loads an empty rule list", () => {
		const result = RuleSet.load([]);
		expect(result.ok && result.value.size).toBe(0);
	});

	it("rejects a limit price above the activation price", () => {
		const error = loadError([rule({ activationPrice: "0.08", limitPrice: "0.09" })]);

		expect(error).toBeInstanceOf(ConfigError);
		expect(error.message).toBe(
			"Invalid rule definitions: 0.limitPrice: limitPrice (0.09) must not exceed activationPrice (0.08)",
		);
	});

	it("rejects a second rule for the same subnet", () => {
		const error = loadError([rule(), rule({ stakeAmount: "1" })]);
		expect(error.message).toBe("Invalid rule definitions: 1.subnetId: Duplicate rule for subnet 64");
	});

	it("rejects non-positive prices and amounts", () => {
		const error = loadError([rule({ activationPrice: "0", limitPrice: "-1", stakeAmount: "0" })]);
		expect(error.message).toBe(
			"Invalid rule definitions: 0.activationPrice: Must be positive; 0.limitPrice: Must be positive; 0.stakeAmount: Must be positive",
		);
	});

	it("reports every missing field of a definition", () => {
		const error = loadError([{ subnetId: 1 }]);
		expect(error.message).toBe(
			"Invalid rule definitions: 0.activationPrice: Required; 0.limitPrice: Required; 0.stakeAmount: Required; 0.delegateId: Required when no default delegate is configured",
		);
	});

	it("falls back to the default delegate", () => {
		const { delegateId: _omitted, ...withoutDelegate } = rule();
		const result = RuleSet.load([withoutDelegate], { defaultDelegate: "5Default" });

		expect(result.ok && result.value.rules()[0]?.delegateId).toBe("5Default");
	});

	it("prefers the rule's own delegate over the default", () => {
		const result = RuleSet.load([rule()], { defaultDelegate: "5Default" });
		expect(result.ok && result.value.rules()[0]?.delegateId).toBe(HOTKEY);
	});

	it("rejects a source that is not an array", () => {
		const error = loadError({ subnetId: 1 });
		expect(error.message).toBe("Invalid rule definitions: Expected array, received object");
	});

	it("rejects malformed decimal strings at the schema stage", () => {
		const error = loadError([rule({ stakeAmount: "five" })]);
		expect(error.message).toContain("0.stakeAmount");
	});

	it("attaches the issues to the error context", () => {
		const error = loadError([rule({ subnetId: 64 }), rule({ subnetId: 64 })]);
		expect(error.context.issues).toEqual([
			{ path: [1, "subnetId"], message: "Duplicate rule for subnet 64" },
		]);
	});
});

describe("loadRuleFile", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "rules-"));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("loads a JSON rule file", async () => {
		const path = join(dir, "rules.json");
		await writeFile(path, JSON.stringify([rule(), rule({ subnetId: 3 })]));

		const result = await loadRuleFile(path);

		expect(result.ok && result.value.subnetIds()).toEqual([64, 3]);
	});

	it("passes the default delegate through", async () => {
		const path = join(dir, "rules.json");
		await writeFile(path, JSON.stringify([{ subnetId: 1, activationPrice: 1, limitPrice: 1, stakeAmount: 1 }]));

		const result = await loadRuleFile(path, { defaultDelegate: "5Default" });

		expect(result.ok && result.value.rules()[0]?.delegateId).toBe("5Default");
	});

	it("reports a missing file as ConfigError", async () => {
		const path = join(dir, "missing.json");
		const result = await loadRuleFile(path);

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error).toBeInstanceOf(ConfigError);
			expect(result.error.message).toContain(`Cannot read rule file ${path}`);
		}
	});

	it("reports invalid JSON as ConfigError", async () => {
		const path = join(dir, "rules.json");
		await writeFile(path, "[{");

		const result = await loadRuleFile(path);

		expect(!result.ok && result.error.message).toContain(`Rule file ${path} is not valid JSON`);
	});
});
