import type { ColumnSummary, Fingerprint, ParsedTable } from "../shared/types.js";
import { loadTable, toNumericTable } from "../table/loader.js";
import {
  maxOf,
  mean,
  medianAbsoluteDeviation,
  minOf,
  quantile,
  round,
  sortedAscending,
  stdDev,
} from "./stats.js";

/**
 * Per-column summary: moments, extrema and interpolated quantiles.
 * All values are rounded for serialization.
 */
export function summarizeColumn(values: readonly number[]): ColumnSummary {
  const sorted = sortedAscending(values);
  const median = quantile(sorted, 0.5);
  return {
    count: values.length,
    mean: round(mean(values)),
    std: round(stdDev(values)),
    min: round(minOf(values)),
    max: round(maxOf(values)),
    median: round(median),
    q05: round(quantile(sorted, 0.05)),
    q95: round(quantile(sorted, 0.95)),
    mad: round(medianAbsoluteDeviation(values, median)),
  };
}

/**
 * Fingerprint a parsed table.
 *
 * missing_rate divides by every header-declared column, including the
 * ones dropped as non-numeric. Downstream drift decisions depend on this.
 */
export function fingerprintTable(parsed: ParsedTable): Fingerprint {
  const numeric = toNumericTable(parsed);
  const columns: Record<string, ColumnSummary> = Object.fromEntries(
    Object.entries(numeric).map(([name, values]) => [name, summarizeColumn(values)])
  );
  const cells = Math.max(1, parsed.rowCount * parsed.header.length);
  return {
    row_count: parsed.rowCount,
    missing_cell_count: parsed.missingCells,
    missing_rate: round(parsed.missingCells / cells),
    columns,
  };
}

export function fingerprintCsv(filePath: string): Fingerprint {
  return fingerprintTable(loadTable(filePath));
}
