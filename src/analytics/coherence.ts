import type { CoherenceEdge, CoherenceGraph, NumericTable } from "../shared/types.js";
import { sortedColumns } from "../table/loader.js";
import { pearson, round } from "./stats.js";

/**
 * Threshold pairwise Pearson correlations into edges.
 * Pairs are enumerated over lexicographically sorted names so `a < b`
 * always holds and each unordered pair appears at most once.
 */
export function correlationEdges(
  table: NumericTable,
  threshold: number,
  start = 0,
  end?: number
): CoherenceEdge[] {
  const keys = sortedColumns(table);
  const edges: CoherenceEdge[] = [];
  for (let i = 0; i < keys.length; i++) {
    for (let j = i + 1; j < keys.length; j++) {
      const a = keys[i];
      const b = keys[j];
      const raw = pearson(table[a].slice(start, end), table[b].slice(start, end));
      if (Math.abs(raw) >= threshold) {
        edges.push({ a, b, corr: round(raw) });
      }
    }
  }
  return edges;
}

export function buildCoherenceGraph(table: NumericTable, threshold: number): CoherenceGraph {
  return {
    nodes: sortedColumns(table),
    edges: correlationEdges(table, threshold),
    threshold,
  };
}
