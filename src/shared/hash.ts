import { createHash } from "crypto";

/** SHA-256 hash of raw bytes. */
export function sha256Bytes(data: Uint8Array): string {
  return createHash("sha256").update(data).digest("hex");
}

/** SHA-256 of a UTF-8 string. */
export function sha256String(data: string): string {
  return createHash("sha256").update(data, "utf8").digest("hex");
}

/**
 * Canonical JSON stringify with deep-sorted keys.
 * Used for deterministic hashing of nested objects.
 */
export function canonicalJsonStringify(obj: unknown, indent?: number): string {
  return JSON.stringify(sortKeysDeep(obj), null, indent);
}

function sortKeysDeep(obj: unknown): unknown {
  if (obj === null || typeof obj !== "object") return obj;
  if (Array.isArray(obj)) return obj.map(sortKeysDeep);
  // fromEntries defines own properties, so a "__proto__" key survives
  return Object.fromEntries(
    Object.entries(obj)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, value]) => [key, sortKeysDeep(value)])
  );
}
