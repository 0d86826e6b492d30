import path from "path";
import { existsSync } from "fs";
import { runFileName, writeStableJson } from "../shared/report.js";
import type { StressMark } from "../shared/types.js";
import { fingerprintCsv } from "../analytics/fingerprint.js";
import { compareWithBaselineMark, DEFAULT_ALPHA } from "../analytics/drift.js";
import { appendLedgerEntry, type LedgerAppendResult } from "../ledger/version_ledger.js";
import { readTargetBytes } from "./target.js";
import { runStressTest } from "./stress_test.js";

export interface StressMarkOptions {
  runs: number;
  noise: number;
  seed?: number;
  outputDir: string;
  /** Write one JSON record per trial under runs/. */
  writeRuns?: boolean;
  fingerprintCsv?: string;
  baselineMark?: string;
  alpha?: number;
  ledgerPath?: string;
}

export interface StressMarkResult {
  markPath: string;
  mark: StressMark;
  ledger?: LedgerAppendResult;
}

export const MARK_FILE = path.join("vault", "stress_mark.json");

/**
 * Stress a file or directory target and persist the resulting mark.
 */
export function runStressMark(target: string, options: StressMarkOptions): StressMarkResult {
  const base = readTargetBytes(target);
  const result = runStressTest(base, {
    runs: options.runs,
    noise: options.noise,
    seed: options.seed,
  });

  if (options.writeRuns) {
    for (const record of result.records) {
      writeStableJson(path.join(options.outputDir, "runs", runFileName(record.run_index)), record);
    }
  }

  const mark: StressMark = {
    target,
    base_hash: result.base_hash,
    seed: result.seed,
    noise: options.noise,
    runs: options.runs,
    summary: result.summary,
  };

  if (options.fingerprintCsv && existsSync(options.fingerprintCsv)) {
    const fingerprint = fingerprintCsv(options.fingerprintCsv);
    mark.fingerprint = fingerprint;
    mark.drift_signals = compareWithBaselineMark(
      fingerprint,
      options.fingerprintCsv,
      options.baselineMark,
      options.alpha ?? DEFAULT_ALPHA
    );
    mark.fingerprint_source = options.fingerprintCsv;
  }

  const markPath = path.join(options.outputDir, MARK_FILE);
  writeStableJson(markPath, mark);

  const out: StressMarkResult = { markPath, mark };
  if (options.ledgerPath) {
    out.ledger = appendLedgerEntry(options.ledgerPath, {
      base_hash: result.base_hash,
      fingerprint_reference: markPath,
      source_reference: mark.fingerprint_source ?? null,
      drift_flag: mark.drift_signals?.flag_drift ?? false,
    });
  }
  return out;
}
