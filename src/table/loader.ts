/**
 * Numeric Table Loader: parses a header-tagged CSV into column-oriented
 * numeric sequences.
 *
 * Cells are classified as missing (short row or blank), numeric (finite
 * decimal literal) or other. Only numeric cells are kept; columns with fewer
 * than two numeric values are dropped.
 */

import { readFileSync } from "fs";
import { parse } from "csv-parse/sync";
import { InputError, errorMessage } from "../shared/errors.js";
import type { NumericTable, ParsedTable } from "../shared/types.js";

const NUMERIC_CELL_RE = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/** Parse a trimmed cell as a finite number, or null when it is not numeric. */
export function parseNumericCell(cell: string): number | null {
  if (!NUMERIC_CELL_RE.test(cell)) return null;
  const value = Number(cell);
  return Number.isFinite(value) ? value : null;
}

/**
 * Parse CSV text. The first non-empty line is the header.
 */
export function parseTable(text: string): ParsedTable {
  const rows = parse(text, {
    bom: true,
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
    relax_quotes: true,
  }) as string[][];

  if (rows.length === 0 || rows[0].every((name) => name === "")) {
    throw new InputError("table has no header row");
  }

  const header = rows[0];
  // A repeated header name reads from its last column.
  const sourceIndex = new Map<string, number>();
  header.forEach((name, k) => sourceIndex.set(name, k));

  const values = new Map<string, number[]>();
  for (const name of sourceIndex.keys()) values.set(name, []);

  let missingCells = 0;
  for (const row of rows.slice(1)) {
    for (let k = 0; k < header.length; k++) {
      const cell = row[k];
      if (cell === undefined || cell === "") missingCells++;
    }
    for (const [name, k] of sourceIndex) {
      const cell = row[k];
      if (cell === undefined || cell === "") continue;
      const value = parseNumericCell(cell);
      if (value !== null) values.get(name)?.push(value);
    }
  }

  return { header, rowCount: rows.length - 1, missingCells, columns: Object.fromEntries(values) };
}

export function loadTable(filePath: string): ParsedTable {
  let text: string;
  try {
    text = readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new InputError(`cannot read table ${filePath}: ${errorMessage(err)}`);
  }
  return parseTable(text);
}

/**
 * Keep only columns with more than one parsed value.
 * Throws InputError when nothing qualifies.
 */
export function toNumericTable(parsed: ParsedTable): NumericTable {
  const table: NumericTable = Object.fromEntries(
    Object.entries(parsed.columns).filter(([, values]) => values.length > 1)
  );
  if (Object.keys(table).length === 0) {
    throw new InputError("no usable numeric column");
  }
  return table;
}

export function readNumericTable(filePath: string): NumericTable {
  return toNumericTable(loadTable(filePath));
}

/** Shortest column length; 0 for an empty table. */
export function tableLength(table: NumericTable): number {
  const lengths = Object.values(table).map((v) => v.length);
  return lengths.length === 0 ? 0 : Math.min(...lengths);
}

/** Column names in lexicographic order. */
export function sortedColumns(table: NumericTable): string[] {
  return Object.keys(table).sort();
}
