import { RULE_LABELS, type RuleName } from "../violation.types.js";
import { coverageRule } from "./coverage.js";
import { diversityRule } from "./diversity.js";
import { floaterExemptionRule } from "./floater-exemption.js";
import { floaterFairnessRule } from "./floater-fairness.js";
import type { ValidationRule } from "./rules.types.js";
import { stabilityRule } from "./stability.js";

export const builtInValidationRules: { readonly [K in RuleName]: ValidationRule } = {
  stability: stabilityRule,
  "floater-exemption": floaterExemptionRule,
  "floater-fairness": floaterFairnessRule,
  coverage: coverageRule,
  diversity: diversityRule,
};

/** Rule check order; also the order violations are reported in. */
export const RULE_ORDER: readonly RuleName[] = [
  "stability",
  "floater-exemption",
  "floater-fairness",
  "coverage",
  "diversity",
];

/**
 * Resolves rule names to rules, in {@link RULE_ORDER}.
 */
export function resolveRules(names: readonly RuleName[] = RULE_ORDER): ValidationRule[] {
  const wanted = new Set(names);
  return RULE_ORDER.filter((name) => wanted.has(name)).map((name) => builtInValidationRules[name]);
}

/**
 * Plain-language rules, one per line and labelled the way violation messages
 * are, for reviewers that read prose (such as the advisory rule oracle).
 */
export function describeRules(names: readonly RuleName[] = RULE_ORDER): string {
  return resolveRules(names)
    .map((rule) => `${RULE_LABELS[rule.name]}: ${rule.description}`)
    .join("\n");
}
