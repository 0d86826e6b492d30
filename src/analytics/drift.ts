/**
 * Drift Signal Composer: per-column deltas between two fingerprints plus
 * optional KS tests over the raw samples.
 */

import { existsSync, readFileSync } from "fs";
import { z } from "zod";
import type { DriftSignals, Fingerprint, NumericTable } from "../shared/types.js";
import { readNumericTable } from "../table/loader.js";
import { ksTwoSample } from "./ks.js";
import { round } from "./stats.js";

export const DEFAULT_ALPHA = 0.05;

/**
 * Absolute mean shift that flags drift. Applied identically to every column
 * whatever its scale or unit.
 */
export const MEAN_DELTA_LIMIT = 0.05;

export interface DriftOptions {
  alpha?: number;
  /** Raw samples for KS; only columns present in both are tested. */
  samples?: { baseline: NumericTable; current: NumericTable };
}

export function emptyDriftSignals(): DriftSignals {
  return { flag_drift: false, checks: {} };
}

export function composeDriftSignals(
  current: Fingerprint,
  baseline: Fingerprint,
  options: DriftOptions = {}
): DriftSignals {
  const alpha = options.alpha ?? DEFAULT_ALPHA;
  const signals = emptyDriftSignals();

  for (const [col, cur] of Object.entries(current.columns)) {
    if (!Object.hasOwn(baseline.columns, col)) continue;
    const base = baseline.columns[col];
    signals.checks[`delta_mean_${col}`] = round(cur.mean - base.mean);
    signals.checks[`delta_median_${col}`] = round(cur.median - base.median);
    signals.checks[`delta_mad_${col}`] = round(cur.mad - base.mad);
  }

  if (options.samples) {
    const { baseline: rawBase, current: rawCur } = options.samples;
    const shared = Object.keys(rawBase)
      .filter((col) => Object.hasOwn(rawCur, col))
      .sort();
    for (const col of shared) {
      const ks = ksTwoSample(rawBase[col], rawCur[col]);
      signals.checks[`ks_pvalue_${col}`] = ks.p_value;
      signals.checks[`ks_D_${col}`] = ks.D;
      if (ks.p_value < alpha) signals.flag_drift = true;
    }
  }

  for (const [name, value] of Object.entries(signals.checks)) {
    if (name.startsWith("delta_mean_") && Math.abs(value) > MEAN_DELTA_LIMIT) {
      signals.flag_drift = true;
    }
  }

  return signals;
}

// ── Baseline marks ───────────────────────────────────────────────────

const ColumnSummarySchema = z.object({
  count: z.number(),
  mean: z.number(),
  std: z.number(),
  min: z.number(),
  max: z.number(),
  median: z.number(),
  q05: z.number(),
  q95: z.number(),
  mad: z.number(),
});

export const FingerprintSchema = z.object({
  row_count: z.number().int().nonnegative(),
  missing_cell_count: z.number().int().nonnegative(),
  missing_rate: z.number(),
  columns: z.record(ColumnSummarySchema),
});

const BaselineMarkSchema = z.object({
  fingerprint: FingerprintSchema,
  fingerprint_source: z.string().optional(),
});

export type BaselineMark = z.infer<typeof BaselineMarkSchema>;

/**
 * Load the fingerprint block of a previously written stress mark.
 * Returns null when the file is absent, is not JSON, or carries no valid
 * fingerprint. Read failures propagate.
 */
export function loadBaselineMark(markPath: string): BaselineMark | null {
  if (!existsSync(markPath)) return null;
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(markPath, "utf-8"));
  } catch (err) {
    if (err instanceof SyntaxError) return null;
    throw err;
  }
  const parsed = BaselineMarkSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

/**
 * Compare a current fingerprint against a baseline mark. KS runs when the
 * mark's source CSV is still on disk.
 */
export function compareWithBaselineMark(
  current: Fingerprint,
  currentCsv: string,
  markPath: string | undefined,
  alpha: number = DEFAULT_ALPHA
): DriftSignals {
  const mark = markPath ? loadBaselineMark(markPath) : null;
  if (!mark) return emptyDriftSignals();

  const source = mark.fingerprint_source;
  const samples =
    source && existsSync(source)
      ? { baseline: readNumericTable(source), current: readNumericTable(currentCsv) }
      : undefined;

  return composeDriftSignals(current, mark.fingerprint, { alpha, samples });
}
