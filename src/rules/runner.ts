import { errorMessage } from "../shared/errors.js";
import type {
  Fingerprint,
  NumericTable,
  Rule,
  RuleEnvironment,
  RuleValue,
  RuleViolation,
} from "../shared/types.js";
import { summarizeColumn } from "../analytics/fingerprint.js";
import { evaluateExpression } from "./evaluator.js";

/** Statistic prefixes exposed to rules, one variable per column each. */
export const STAT_KEYS = ["mean", "std", "min", "max", "median", "mad"] as const;

/**
 * Flattened per-column statistics (`mean_<col>`, `std_<col>` ...) of a
 * numeric table, in column order.
 */
export function windowStats(table: NumericTable): Record<string, number> {
  const stats: Record<string, number> = {};
  for (const [col, values] of Object.entries(table)) {
    const summary = summarizeColumn(values);
    for (const key of STAT_KEYS) stats[`${key}_${col}`] = summary[key];
  }
  return stats;
}

export function environmentFromStats(
  count: number,
  missingRate: number,
  stats: Record<string, number>
): RuleEnvironment {
  const env = new Map<string, RuleValue>([
    ["count", count],
    ["missing_rate", missingRate],
  ]);
  for (const [name, value] of Object.entries(stats)) env.set(name, value);
  return env;
}

export function environmentFromFingerprint(fp: Fingerprint): RuleEnvironment {
  const stats: Record<string, number> = {};
  for (const [col, summary] of Object.entries(fp.columns)) {
    for (const key of STAT_KEYS) stats[`${key}_${col}`] = summary[key];
  }
  return environmentFromStats(fp.row_count, fp.missing_rate, stats);
}

/** Evaluate one rule; null when it holds. */
export function evaluateRule(rule: Rule, env: RuleEnvironment): RuleViolation | null {
  try {
    if (evaluateExpression(rule.expression, env)) return null;
    return { rule: rule.name, expression: rule.expression, result: false };
  } catch (err) {
    return { rule: rule.name, expression: rule.expression, error: errorMessage(err) };
  }
}

/** Evaluate every rule in order, collecting failures without stopping. */
export function evaluateRules(rules: readonly Rule[], env: RuleEnvironment): RuleViolation[] {
  const violations: RuleViolation[] = [];
  for (const rule of rules) {
    const violation = evaluateRule(rule, env);
    if (violation) violations.push(violation);
  }
  return violations;
}
