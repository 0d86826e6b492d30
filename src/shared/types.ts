/** Column name → ordered numeric values. */
export type NumericTable = Record<string, number[]>;

/** Raw result of parsing a delimited table, before column filtering. */
export interface ParsedTable {
  header: string[];
  rowCount: number;
  missingCells: number;
  /** Numeric cells per header column, including columns that end up dropped. */
  columns: Record<string, number[]>;
}

// ── Coherence graph ──────────────────────────────────────────────────

export interface CoherenceEdge {
  a: string;
  b: string;
  corr: number;
}

export interface CoherenceGraph {
  nodes: string[];
  edges: CoherenceEdge[];
  threshold: number;
}

export interface WindowSlice {
  start: number;
  end: number;
  edges_count: number;
  edges: CoherenceEdge[];
}

export interface WindowEdgeCount {
  start: number;
  end: number;
  edges_count: number;
}

export interface LocalRuptures {
  window: number;
  step: number;
  delta_edges_threshold: number;
  rupture_points: number[];
  per_window_edges: WindowEdgeCount[];
}

export interface CausalEdge {
  from: string;
  to: string;
  lag: number;
  corr: number;
}

export type CoherenceMode = "corr" | "causal";

export interface CoherenceReport extends CoherenceGraph {
  local_ruptures?: LocalRuptures;
  causal_edges?: CausalEdge[];
  causal_mode?: { type: "lagged_corr_lite"; max_lag: number };
}

// ── Fingerprint / drift ──────────────────────────────────────────────

export interface ColumnSummary {
  count: number;
  mean: number;
  std: number;
  min: number;
  max: number;
  median: number;
  q05: number;
  q95: number;
  mad: number;
}

export interface Fingerprint {
  row_count: number;
  missing_cell_count: number;
  missing_rate: number;
  columns: Record<string, ColumnSummary>;
}

export interface KsResult {
  D: number;
  p_value: number;
}

export interface DriftSignals {
  flag_drift: boolean;
  checks: Record<string, number>;
}

// ── Stress test ──────────────────────────────────────────────────────

export interface StressRecord {
  run_index: number;
  hash: string;
  entropy_bits: number;
}

/** Population statistics of hash-output entropy across trials. */
export interface EntropySummary {
  count: number;
  mean: number;
  var: number;
  min: number;
  max: number;
}

export interface StressMark {
  target: string;
  base_hash: string;
  seed: number;
  noise: number;
  runs: number;
  summary: EntropySummary;
  fingerprint?: Fingerprint;
  drift_signals?: DriftSignals;
  fingerprint_source?: string;
}

// ── Ledger ───────────────────────────────────────────────────────────

export interface VersionLedgerEntry {
  base_hash: string;
  fingerprint_reference: string;
  source_reference: string | null;
  drift_flag: boolean;
}

// ── Rules ────────────────────────────────────────────────────────────

export interface Rule {
  name: string;
  expression: string;
}

export type RuleViolation =
  | { rule: string; expression: string; error: string }
  | { rule: string; expression: string; result: false };

export type RuleValue = number | string | boolean;

/** Fixed, read-only variable bindings visible to rule expressions. */
export type RuleEnvironment = ReadonlyMap<string, RuleValue>;
