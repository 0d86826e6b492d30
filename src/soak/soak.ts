/**
 * Data-aware soak runner.
 *
 * Draws one pass/fail score per run from a seeded stream. In data-aware mode
 * each run also samples a contiguous window of the input table and checks the
 * quality rules against that window's statistics. Score and window draws
 * share one generator, so the interleaving is part of the output.
 */

import path from "path";
import { existsSync, readFileSync } from "fs";
import type { NumericTable, Rule, RuleViolation } from "../shared/types.js";
import { sha256Bytes } from "../shared/hash.js";
import { runFileName, writeStableJson } from "../shared/report.js";
import { maxOf, mean, minOf, quantile, sortedAscending } from "../analytics/stats.js";
import { readNumericTable, tableLength } from "../table/loader.js";
import { SeededRng } from "../stress/rng.js";
import { loadRules } from "../rules/rules_file.js";
import { environmentFromStats, evaluateRules, windowStats } from "../rules/runner.js";

/** A draw below this score fails the run. */
export const PASS_SCORE = 0.01;
export const MAX_ANOMALIES = 1000;
export const DEFAULT_SAMPLE_ROWS = 50;
export const SOAK_SUMMARY_FILE = "soak_summary.json";

const ABSENT_CONSTRAINTS_HASH = "0".repeat(64);

export interface WindowCheck {
  ok: boolean;
  window: { start: number; end: number };
  stats: Record<string, number>;
  violations: RuleViolation[];
}

export interface SoakRecord {
  run_index: number;
  passed: boolean;
  score: number;
  data_checks?: WindowCheck;
}

export interface SoakAnomaly {
  run: number;
  violations: RuleViolation[];
}

export interface SoakSummary {
  runs: number;
  ok_runs: number;
  failed_runs: number;
  seed: number;
  constraints_path: string;
  constraints_sha256: string;
  min_score: number;
  mean_score: number;
  p01: number;
  p05: number;
  p50: number;
  max_score: number;
  data_aware?: true;
  input_csv?: string;
  rules_path?: string | null;
  sample_rows?: number;
  anomalies?: SoakAnomaly[];
}

export interface DataAwareOptions {
  inputCsv: string;
  rulesPath?: string;
  sampleRows?: number;
}

export interface SoakOptions {
  runs: number;
  outputDir: string;
  constraintsPath: string;
  /** 0 or absent derives the seed from the constraints hash. */
  seed?: number;
  dataAware?: DataAwareOptions;
}

export interface SoakResult {
  summary: SoakSummary;
  summaryPath: string;
}

/** SHA-256 of the constraints file, or 64 zeros when it does not exist. */
export function constraintsHash(constraintsPath: string): string {
  if (!existsSync(constraintsPath)) return ABSENT_CONSTRAINTS_HASH;
  return sha256Bytes(readFileSync(constraintsPath));
}

/**
 * Sample one window of `sampleRows` rows (clamped to [2, length]) and
 * evaluate `rules` against its statistics.
 */
export function sampleWindowCheck(
  table: NumericTable,
  rng: SeededRng,
  sampleRows: number,
  rules: readonly Rule[]
): WindowCheck {
  const length = tableLength(table);
  const rows = Math.max(2, Math.min(Math.trunc(sampleRows), length));
  const start = rng.nextInt(Math.max(1, length - rows + 1));
  const end = start + rows;

  const sample: NumericTable = Object.fromEntries(
    Object.entries(table).map(([col, values]) => [col, values.slice(start, end)])
  );
  const stats = windowStats(sample);
  const violations = evaluateRules(rules, environmentFromStats(rows, 0, stats));

  return { ok: violations.length === 0, window: { start, end }, stats, violations };
}

function scoreSummary(scores: readonly number[]) {
  const sorted = sortedAscending(scores);
  return {
    min_score: minOf(scores),
    mean_score: mean(scores),
    p01: quantile(sorted, 0.01),
    p05: quantile(sorted, 0.05),
    p50: quantile(sorted, 0.5),
    max_score: maxOf(scores),
  };
}

export function runSoak(options: SoakOptions): SoakResult {
  const constraintsSha = constraintsHash(options.constraintsPath);
  const seed =
    options.seed !== undefined && options.seed >>> 0 !== 0
      ? options.seed >>> 0
      : parseInt(constraintsSha.slice(0, 8), 16);
  const rng = new SeededRng(seed);

  const dataAware = options.dataAware;
  const table = dataAware ? readNumericTable(dataAware.inputCsv) : null;
  const rules = dataAware?.rulesPath ? loadRules(dataAware.rulesPath) : [];
  const sampleRows = dataAware?.sampleRows ?? DEFAULT_SAMPLE_ROWS;

  const scores: number[] = [];
  const anomalies: SoakAnomaly[] = [];
  let ok = 0;

  for (let i = 0; i < options.runs; i++) {
    const score = rng.next();
    const passed = score >= PASS_SCORE;
    const record: SoakRecord = { run_index: i, passed, score };

    if (table) {
      const check = sampleWindowCheck(table, rng, sampleRows, rules);
      record.data_checks = check;
      if (!check.ok) anomalies.push({ run: i, violations: check.violations });
    }

    writeStableJson(path.join(options.outputDir, "runs", runFileName(i)), record);
    scores.push(score);
    if (passed) ok++;
  }

  const summary: SoakSummary = {
    runs: options.runs,
    ok_runs: ok,
    failed_runs: options.runs - ok,
    seed: rng.seed,
    constraints_path: options.constraintsPath,
    constraints_sha256: constraintsSha,
    ...scoreSummary(scores),
  };
  if (dataAware) {
    summary.data_aware = true;
    summary.input_csv = dataAware.inputCsv;
    summary.rules_path = dataAware.rulesPath ?? null;
    summary.sample_rows = sampleRows;
    summary.anomalies = anomalies.slice(0, MAX_ANOMALIES);
  }

  const summaryPath = path.join(options.outputDir, SOAK_SUMMARY_FILE);
  writeStableJson(summaryPath, summary);
  return { summary, summaryPath };
}
