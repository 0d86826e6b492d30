/**
 * Versioned Fingerprint Ledger
 *
 * Append-only JSON list of fingerprint/drift outcomes. Every append rewrites
 * the whole file with deep-sorted keys. There is no locking: callers must
 * guarantee a single writer per ledger path.
 *
 * Recovery policy: a file that cannot be read, does not parse, or is not a
 * list of objects is treated as an empty history. That path is reported as
 * the "empty-on-corruption" variant so callers can audit it.
 */

import { existsSync, readFileSync } from "fs";
import { z } from "zod";
import { errorMessage } from "../shared/errors.js";
import { writeStableJson } from "../shared/report.js";
import type { VersionLedgerEntry } from "../shared/types.js";

export type LedgerRecord = Record<string, unknown>;

export type LedgerHistory =
  | { kind: "loaded"; entries: LedgerRecord[] }
  | { kind: "missing" }
  | { kind: "empty-on-corruption"; reason: string };

const LedgerFileSchema = z.array(z.record(z.unknown()));

export function readLedger(ledgerPath: string): LedgerHistory {
  if (!existsSync(ledgerPath)) return { kind: "missing" };

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(ledgerPath, "utf-8"));
  } catch (err) {
    return { kind: "empty-on-corruption", reason: errorMessage(err) };
  }

  const parsed = LedgerFileSchema.safeParse(raw);
  if (!parsed.success) {
    return { kind: "empty-on-corruption", reason: "ledger content is not a list of records" };
  }
  return { kind: "loaded", entries: parsed.data };
}

export function historyEntries(history: LedgerHistory): LedgerRecord[] {
  return history.kind === "loaded" ? history.entries : [];
}

export interface LedgerAppendResult {
  history: LedgerHistory["kind"];
  /** Recovery detail when the prior content was discarded. */
  reason?: string;
  size: number;
}

export function appendLedgerEntry(
  ledgerPath: string,
  entry: VersionLedgerEntry
): LedgerAppendResult {
  const history = readLedger(ledgerPath);
  const entries: LedgerRecord[] = [...historyEntries(history), { ...entry }];
  writeStableJson(ledgerPath, entries);

  const result: LedgerAppendResult = { history: history.kind, size: entries.length };
  if (history.kind === "empty-on-corruption") result.reason = history.reason;
  return result;
}
