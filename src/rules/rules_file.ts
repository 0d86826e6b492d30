import { existsSync, readFileSync } from "fs";
import { InputError, errorMessage } from "../shared/errors.js";
import type { Rule } from "../shared/types.js";

/**
 * Parse `name: expression` lines. Blank lines, `#` comments and lines
 * without a colon are skipped. A repeated name keeps its first position
 * and takes the later expression.
 */
export function parseRules(text: string): Rule[] {
  const rules = new Map<string, string>();

  for (const line of text.split(/\r?\n/)) {
    const s = line.trim();
    if (!s || s.startsWith("#")) continue;
    const colon = s.indexOf(":");
    if (colon < 0) continue;

    const name = s.slice(0, colon).trim();
    const expression = s.slice(colon + 1).trim();
    if (name && expression) rules.set(name, expression);
  }

  return [...rules].map(([name, expression]) => ({ name, expression }));
}

/** Load rules from disk; a missing file yields no rules. */
export function loadRules(filePath: string): Rule[] {
  if (!existsSync(filePath)) return [];
  try {
    return parseRules(readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new InputError(`cannot read rules file ${filePath}: ${errorMessage(err)}`);
  }
}
