export { RuleSet, loadRuleFile } from "./rule-set.js";
export type { Rule, RuleSetOptions } from "./types.js";
