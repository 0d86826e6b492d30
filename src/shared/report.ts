/**
 * Stable report writer.
 *
 * Every report leaves the engine through here: floats are quantized to
 * REPORT_DECIMALS, keys are deep-sorted and the file ends with a newline,
 * so two runs over the same inputs produce byte-identical files.
 */

import { mkdirSync, writeFileSync } from "fs";
import path from "path";
import { canonicalJsonStringify, sha256String } from "./hash.js";
import { REPORT_DECIMALS, round } from "../analytics/stats.js";

export function quantizeFloats(value: unknown, decimals: number = REPORT_DECIMALS): unknown {
  if (typeof value === "number") {
    return Number.isInteger(value) ? value : round(value, decimals);
  }
  if (Array.isArray(value)) return value.map((v) => quantizeFloats(v, decimals));
  if (value !== null && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, quantizeFloats(v, decimals)])
    );
  }
  return value;
}

export function stableJsonStringify(data: unknown, decimals: number = REPORT_DECIMALS): string {
  return canonicalJsonStringify(quantizeFloats(data, decimals), 2) + "\n";
}

/**
 * Write stable JSON to disk, creating parent directories.
 * Returns the SHA-256 of the bytes written.
 */
export function writeStableJson(filePath: string, data: unknown): string {
  const raw = stableJsonStringify(data);
  mkdirSync(path.dirname(filePath), { recursive: true });
  writeFileSync(filePath, raw, "utf-8");
  return sha256String(raw);
}

/** Per-run record file name, zero-padded so directory listings sort by index. */
export function runFileName(index: number): string {
  return `run_${String(index).padStart(5, "0")}.json`;
}
