/**
 * Integrity gate
 *
 * Folds the soak summary, the stress-test entropy variance and a mean-shift
 * drift measure into one weighted incoherence score:
 *
 *   score = w_null * v_null + w_drift * v_drift + w_void * v_void
 *
 * Every violation is non-negative. A score above the threshold is a BLOCK.
 */

import path from "path";
import { existsSync, readFileSync } from "fs";
import { z } from "zod";
import { ConfigError, InputError, errorMessage } from "../shared/errors.js";
import { parseNumberList } from "../shared/run_config.js";
import { writeStableJson } from "../shared/report.js";
import type { NumericTable } from "../shared/types.js";
import { mean, stdDev } from "../analytics/stats.js";
import { readNumericTable } from "../table/loader.js";

// ── Types ────────────────────────────────────────────────────────────

export const NULL_MODES = ["p05", "p01", "p50", "mean_score", "min_score", "failed_ratio", "auto"] as const;
export type NullMode = (typeof NULL_MODES)[number];
export type ScoreKey = Exclude<NullMode, "failed_ratio" | "auto">;

const NULL_MODE_ALIASES: Record<string, NullMode> = {
  mean: "mean_score",
  median: "p50",
  p10: "p05",
};

const AUTO_ORDER: readonly ScoreKey[] = ["p05", "mean_score", "p50", "min_score"];

export interface GateWeights {
  w_null: number;
  w_drift: number;
  w_void: number;
}

const SoakScoresSchema = z.object({
  runs: z.number().int().nonnegative(),
  failed_runs: z.number().int().nonnegative(),
  min_score: z.number().optional(),
  mean_score: z.number().optional(),
  p01: z.number().optional(),
  p05: z.number().optional(),
  p50: z.number().optional(),
  max_score: z.number().optional(),
});

export type SoakScores = z.infer<typeof SoakScoresSchema>;

const StressMarkSummarySchema = z.object({
  summary: z.object({ var: z.number() }),
});

export interface GateInputs {
  soak?: { source: string; scores: SoakScores };
  stress?: { source: string; entropyVar: number };
  drift?: { baselineCsv: string; currentCsv: string; zmax: number };
}

export interface GateOptions {
  threshold: number;
  weights: GateWeights;
  nullTarget: number;
  nullMode: NullMode;
  voidVarLimit: number;
  driftZLimit: number;
}

export const DEFAULT_GATE_OPTIONS: GateOptions = {
  threshold: 0.25,
  weights: { w_null: 0.3, w_drift: 0.4, w_void: 0.3 },
  nullTarget: 0.1,
  nullMode: "p05",
  voidVarLimit: 0.01,
  driftZLimit: 3.0,
};

export type GateDecision = "OK" | "BLOCK";

export interface IncoherenceReport {
  threshold: number;
  weights: GateWeights;
  violations: { v_null: number; v_drift: number; v_void: number };
  incoherence_score: number;
  components: {
    soak: Record<string, string | number | null>;
    stress: Record<string, string | number | null>;
    drift: Record<string, string | number | null>;
  };
  decision: GateDecision;
}

// ── Parsing ──────────────────────────────────────────────────────────

/** Parse "w_null,w_drift,w_void". */
export function parseWeights(raw: string): GateWeights {
  const [w_null, w_drift, w_void] = parseNumberList(raw, 3, "weights (w_null,w_drift,w_void)");
  return { w_null, w_drift, w_void };
}

export function parseNullMode(raw: string): NullMode {
  const key = raw.trim().toLowerCase();
  const mode = NULL_MODE_ALIASES[key] ?? NULL_MODES.find((m) => m === key);
  if (!mode) {
    throw new ConfigError(`unknown null mode "${raw}" (expected ${NULL_MODES.join(" | ")})`);
  }
  return mode;
}

// ── Components ───────────────────────────────────────────────────────

function safeDiv(num: number, den: number): number {
  return den === 0 ? 0 : num / den;
}

/**
 * Resolve the soak score a mode refers to. A null score means the caller
 * falls back to the failed-run ratio.
 */
export function pickNullScore(
  scores: SoakScores,
  mode: NullMode
): { score: number | null; mode: NullMode } {
  if (mode === "failed_ratio") return { score: null, mode };

  if (mode === "auto") {
    for (const key of AUTO_ORDER) {
      const value = scores[key];
      if (value !== undefined) return { score: value, mode: key };
    }
    return { score: null, mode: "failed_ratio" };
  }

  const value = scores[mode];
  if (value !== undefined) return { score: value, mode };
  if (scores.min_score !== undefined) return { score: scores.min_score, mode: "min_score" };
  return { score: null, mode: "failed_ratio" };
}

/**
 * Largest |mean_cur − mean_base| / std_base over columns present in both
 * tables whose baseline std is positive. 0 when no column qualifies.
 */
export function meanShiftZmax(baseline: NumericTable, current: NumericTable): number {
  let zmax = 0;
  for (const [col, base] of Object.entries(baseline)) {
    if (!Object.hasOwn(current, col)) continue;
    const sd = stdDev(base);
    if (sd <= 0) continue;
    const z = Math.abs(mean(current[col]) - mean(base)) / sd;
    if (Number.isFinite(z) && z > zmax) zmax = z;
  }
  return zmax;
}

export function computeIncoherence(
  inputs: GateInputs,
  options: GateOptions = DEFAULT_GATE_OPTIONS
): IncoherenceReport {
  // Soak
  let v_null = 0;
  let soak: Record<string, string | number | null>;
  if (inputs.soak) {
    const { scores } = inputs.soak;
    const picked = pickNullScore(scores, options.nullMode);
    soak = {
      source: inputs.soak.source,
      runs: scores.runs,
      failed_runs: scores.failed_runs,
      null_mode: picked.mode,
      target: options.nullTarget,
      score: picked.score,
    };
    if (picked.score === null) {
      v_null = scores.runs > 0 ? safeDiv(scores.failed_runs, scores.runs) : 0;
      soak.computed_from = "failed_runs/runs";
    } else {
      v_null = Math.max(0, safeDiv(options.nullTarget - picked.score, options.nullTarget));
      soak.computed_from = picked.mode;
    }
    for (const key of ["min_score", "mean_score", "p01", "p05", "p50", "max_score"] as const) {
      const value = scores[key];
      if (value !== undefined) soak[key] = value;
    }
  } else {
    soak = { source: null, error: "soak summary not found" };
  }

  // Stress
  let v_void = 0;
  let stress: Record<string, string | number | null>;
  if (inputs.stress) {
    v_void = Math.max(0, safeDiv(inputs.stress.entropyVar - options.voidVarLimit, options.voidVarLimit));
    stress = {
      source: inputs.stress.source,
      var_entropy_bits: inputs.stress.entropyVar,
      limit_var_entropy_bits: options.voidVarLimit,
    };
  } else {
    stress = { source: null, error: "stress mark not found" };
  }

  // Drift
  let v_drift = 0;
  let drift: Record<string, string | number | null>;
  if (inputs.drift) {
    v_drift = Math.max(0, safeDiv(inputs.drift.zmax - options.driftZLimit, options.driftZLimit));
    drift = {
      baseline_csv: inputs.drift.baselineCsv,
      current_csv: inputs.drift.currentCsv,
      zmax_mean_shift: inputs.drift.zmax,
      drift_z_limit: options.driftZLimit,
    };
  } else {
    drift = {
      note: "no baseline/current csv provided, drift set to 0",
      drift_z_limit: options.driftZLimit,
    };
  }

  const { w_null, w_drift, w_void } = options.weights;
  const score = w_null * v_null + w_drift * v_drift + w_void * v_void;

  return {
    threshold: options.threshold,
    weights: { ...options.weights },
    violations: { v_null, v_drift, v_void },
    incoherence_score: score,
    components: { soak, stress, drift },
    decision: score > options.threshold ? "BLOCK" : "OK",
  };
}

// ── File-backed gate ─────────────────────────────────────────────────

export const GATE_REPORT_FILE = "integrity_incoherence.json";

export interface GatePaths {
  soakSummary?: string;
  stressMark?: string;
  baselineCsv?: string;
  currentCsv?: string;
}

function readJsonFile<S extends z.ZodTypeAny>(filePath: string, schema: S, label: string): z.output<S> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new InputError(`cannot read ${label} ${filePath}: ${errorMessage(err)}`);
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new InputError(`${label} ${filePath} is malformed: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }
  return parsed.data;
}

/** Gather gate inputs from disk. Absent files leave their component empty. */
export function loadGateInputs(paths: GatePaths): GateInputs {
  const inputs: GateInputs = {};

  if (paths.soakSummary && existsSync(paths.soakSummary)) {
    inputs.soak = {
      source: paths.soakSummary,
      scores: readJsonFile(paths.soakSummary, SoakScoresSchema, "soak summary"),
    };
  }

  if (paths.stressMark && existsSync(paths.stressMark)) {
    const mark = readJsonFile(paths.stressMark, StressMarkSummarySchema, "stress mark");
    inputs.stress = { source: paths.stressMark, entropyVar: mark.summary.var };
  }

  const { baselineCsv, currentCsv } = paths;
  if (baselineCsv && currentCsv && existsSync(baselineCsv) && existsSync(currentCsv)) {
    inputs.drift = {
      baselineCsv,
      currentCsv,
      zmax: meanShiftZmax(readNumericTable(baselineCsv), readNumericTable(currentCsv)),
    };
  }

  return inputs;
}

export function runIntegrityGate(
  paths: GatePaths,
  outputDir: string,
  options: GateOptions = DEFAULT_GATE_OPTIONS
): { report: IncoherenceReport; reportPath: string } {
  const report = computeIncoherence(loadGateInputs(paths), options);
  const reportPath = path.join(outputDir, GATE_REPORT_FILE);
  writeStableJson(reportPath, report);
  return { report, reportPath };
}
