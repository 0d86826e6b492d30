/**
 * Coherence report: correlation graph plus the optional rupture and
 * lagged-causal sub-blocks, one report per threshold.
 */

import path from "path";
import { readNumericTable } from "../table/loader.js";
import { writeStableJson } from "../shared/report.js";
import type { CoherenceMode, CoherenceReport, NumericTable } from "../shared/types.js";
import { buildCoherenceGraph } from "./coherence.js";
import { localRuptures, type RuptureOptions } from "./ruptures.js";
import { laggedDirectedEdges } from "./causal.js";

export interface CoherenceOptions {
  mode: CoherenceMode;
  /** When set, attach the windowed rupture block. */
  ruptures?: RuptureOptions;
  maxLag: number;
}

export const DEFAULT_COHERENCE_OPTIONS: CoherenceOptions = {
  mode: "corr",
  maxLag: 3,
};

export function buildCoherenceReport(
  table: NumericTable,
  threshold: number,
  options: CoherenceOptions = DEFAULT_COHERENCE_OPTIONS
): CoherenceReport {
  const report: CoherenceReport = buildCoherenceGraph(table, threshold);

  if (options.ruptures) {
    report.local_ruptures = localRuptures(table, threshold, options.ruptures);
  }

  if (options.mode === "causal") {
    report.causal_edges = laggedDirectedEdges(table, threshold, options.maxLag);
    report.causal_mode = { type: "lagged_corr_lite", max_lag: Math.max(1, Math.floor(options.maxLag)) };
  }

  return report;
}

export function reportFileName(threshold: number): string {
  return `coherence_report_thr_${threshold.toFixed(2)}.json`;
}

export interface CoherenceRunResult {
  input: string;
  reports: Array<{ threshold: number; report: string; edges: number }>;
}

/**
 * Load a CSV once and write one coherence report per threshold.
 */
export function runCoherence(
  inputCsv: string,
  thresholds: readonly number[],
  outputDir: string,
  options: CoherenceOptions = DEFAULT_COHERENCE_OPTIONS
): CoherenceRunResult {
  const table = readNumericTable(inputCsv);
  const reports: CoherenceRunResult["reports"] = [];

  for (const threshold of thresholds) {
    const report = buildCoherenceReport(table, threshold, options);
    const outPath = path.join(outputDir, reportFileName(threshold));
    writeStableJson(outPath, report);
    reports.push({ threshold, report: outPath, edges: report.edges.length });
  }

  return { input: inputCsv, reports };
}
