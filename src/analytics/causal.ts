import type { CausalEdge, NumericTable } from "../shared/types.js";
import { sortedColumns, tableLength } from "../table/loader.js";
import { pearson, round } from "./stats.js";

/**
 * Lagged cross-correlation edges ("src leads dst by lag rows").
 *
 * For every ordered pair the lag in 1..maxLag with the largest absolute
 * correlation is kept; the strict comparison leaves ties on the lowest lag.
 * Tables shorter than 3 rows produce no edges.
 */
export function laggedDirectedEdges(
  table: NumericTable,
  threshold: number,
  maxLag: number
): CausalEdge[] {
  const length = tableLength(table);
  if (length < 3) return [];

  const lagBound = Math.max(1, Math.floor(maxLag));
  const keys = sortedColumns(table);
  const edges: CausalEdge[] = [];

  for (const src of keys) {
    for (const dst of keys) {
      if (src === dst) continue;
      let best = 0;
      let bestLag = 1;
      for (let lag = 1; lag <= lagBound; lag++) {
        const r = pearson(table[src].slice(0, length - lag), table[dst].slice(lag, length));
        if (Math.abs(r) > Math.abs(best)) {
          best = r;
          bestLag = lag;
        }
      }
      if (Math.abs(best) >= threshold) {
        edges.push({ from: src, to: dst, lag: bestLag, corr: round(best) });
      }
    }
  }
  return edges;
}
