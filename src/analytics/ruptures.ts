import type { LocalRuptures, NumericTable, WindowSlice } from "../shared/types.js";
import { tableLength } from "../table/loader.js";
import { correlationEdges } from "./coherence.js";

export interface WindowOptions {
  window: number;
  step: number;
}

export interface RuptureOptions extends WindowOptions {
  deltaEdgesThreshold: number;
}

/**
 * Resolve window/step defaults against the table length:
 * window < 2 → min(50, length), step < 1 → window.
 */
export function resolveWindow(length: number, options: WindowOptions): WindowOptions {
  const window = options.window < 2 ? Math.min(50, length) : Math.floor(options.window);
  const step = options.step < 1 ? window : Math.floor(options.step);
  return { window, step };
}

/**
 * Rebuild the correlation edge set over sliding row windows.
 * A window longer than the table still yields one slice starting at 0.
 */
export function windowedEdges(
  table: NumericTable,
  threshold: number,
  options: WindowOptions
): WindowSlice[] {
  const length = tableLength(table);
  if (length < 2) return [];

  const { window, step } = resolveWindow(length, options);
  const lastStart = Math.max(1, length - window + 1);
  const slices: WindowSlice[] = [];

  for (let start = 0; start < lastStart; start += step) {
    const end = start + window;
    const edges = correlationEdges(table, threshold, start, end);
    slices.push({
      start,
      end: Math.min(end, length),
      edges_count: edges.length,
      edges,
    });
  }
  return slices;
}

/**
 * Window starts whose edge count moved by at least `deltaEdgesThreshold`
 * relative to the preceding window. Sorted ascending, no duplicates.
 */
export function detectRuptures(
  slices: readonly Pick<WindowSlice, "start" | "edges_count">[],
  deltaEdgesThreshold = 1
): number[] {
  const points = new Set<number>();
  for (let w = 1; w < slices.length; w++) {
    const delta = Math.abs(slices[w].edges_count - slices[w - 1].edges_count);
    if (delta >= deltaEdgesThreshold) points.add(slices[w].start);
  }
  return [...points].sort((a, b) => a - b);
}

export function localRuptures(
  table: NumericTable,
  threshold: number,
  options: RuptureOptions
): LocalRuptures {
  const slices = windowedEdges(table, threshold, options);
  const resolved = resolveWindow(tableLength(table), options);
  return {
    window: resolved.window,
    step: resolved.step,
    delta_edges_threshold: options.deltaEdgesThreshold,
    rupture_points: detectRuptures(slices, options.deltaEdgesThreshold),
    per_window_edges: slices.map(({ start, end, edges_count }) => ({ start, end, edges_count })),
  };
}
