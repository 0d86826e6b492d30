/**
 * Run Configuration Module
 *
 * Resolves configuration primitives in priority order:
 * CLI argument → environment variable → default.
 * Malformed mode and weighting strings raise ConfigError.
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { CoherenceMode } from "./types.js";

export const COHERENCE_MODES: readonly CoherenceMode[] = ["corr", "causal"];

/**
 * Parse the coherence mode from CLI argument and/or environment variable.
 * Defaults to "corr" when neither is provided.
 */
export function parseCoherenceMode(cliArg?: string, envVar?: string): CoherenceMode {
  const raw = (cliArg ?? envVar ?? "corr").trim().toLowerCase();
  const mode = COHERENCE_MODES.find((m) => m === raw);
  if (!mode) {
    throw new ConfigError(`unknown coherence mode "${raw}" (expected ${COHERENCE_MODES.join(" | ")})`);
  }
  return mode;
}

/**
 * Parse a comma-separated list of finite numbers with an exact arity.
 */
export function parseNumberList(raw: string, arity: number, label: string): number[] {
  const parts = raw.split(",").map((p) => p.trim());
  const values = parts.map((p) => (p === "" ? NaN : Number(p)));
  if (parts.length !== arity || values.some((v) => !Number.isFinite(v))) {
    throw new ConfigError(`${label} must be ${arity} comma-separated numbers, got "${raw}"`);
  }
  return values;
}

/**
 * Parse a non-empty comma-separated list of finite numbers.
 */
export function parseNumberSeries(raw: string, label: string): number[] {
  const parts = raw.split(",").map((p) => p.trim());
  return parseNumberList(raw, Math.max(1, parts.length), label);
}

/**
 * Resolve the KS significance level. Must lie strictly between 0 and 1.
 */
export function resolveAlpha(cliArg?: string, envVar?: string, fallback = 0.05): number {
  const raw = cliArg ?? envVar;
  if (raw === undefined || raw.trim() === "") return fallback;
  const parsed = z.coerce.number().gt(0).lt(1).safeParse(raw.trim());
  if (!parsed.success) {
    throw new ConfigError(`alpha must be a number in (0, 1), got "${raw}"`);
  }
  return parsed.data;
}

/**
 * Resolve the stress/soak seed. "0" and absence both mean "derive from content".
 */
export function resolveSeed(cliArg?: string, envVar?: string): number {
  const raw = cliArg ?? envVar;
  if (raw === undefined || raw.trim() === "") return 0;
  const parsed = z.coerce.number().int().nonnegative().max(0xffffffff).safeParse(raw.trim());
  if (!parsed.success) {
    throw new ConfigError(`seed must be an integer in [0, 4294967295], got "${raw}"`);
  }
  return parsed.data;
}

/**
 * Validate a value against a zod schema, converting failures to ConfigError.
 */
export function parseConfig<S extends z.ZodTypeAny>(schema: S, value: unknown, label: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || label}: ${issue.message}`
    );
    throw new ConfigError(`invalid ${label}: ${issues.join("; ")}`);
  }
  return result.data;
}
