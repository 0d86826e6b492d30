import { readFileSync, statSync, type Stats } from "fs";
import path from "path";
import { globSync } from "glob";
import { InputError, errorMessage } from "../shared/errors.js";
import { sha256Bytes } from "../shared/hash.js";

/**
 * Relative, `/`-separated paths of every file under `dir`, sorted.
 */
export function listTargetFiles(dir: string): string[] {
  return globSync("**/*", { cwd: dir, nodir: true, dot: true, posix: true }).sort();
}

/**
 * Canonical bytes of a stress target.
 *
 * A file contributes its raw bytes. A directory contributes the UTF-8
 * encoding of `relpath:sha256` lines, sorted by path and joined by "\n",
 * so enumeration order never changes the result.
 */
export function readTargetBytes(target: string): Buffer {
  let stats: Stats;
  try {
    stats = statSync(target);
  } catch (err) {
    throw new InputError(`cannot stat target ${target}: ${errorMessage(err)}`);
  }

  if (stats.isFile()) return readFileSync(target);

  if (stats.isDirectory()) {
    const lines = listTargetFiles(target).map(
      (rel) => `${rel}:${sha256Bytes(readFileSync(path.join(target, rel)))}`
    );
    return Buffer.from(lines.join("\n"), "utf-8");
  }

  throw new InputError(`target must be a file or a directory: ${target}`);
}
