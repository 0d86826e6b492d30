import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import os from "os";
import path from "path";
import {
  loadTable,
  parseNumericCell,
  parseTable,
  readNumericTable,
  sortedColumns,
  tableLength,
  toNumericTable,
} from "../src/table/loader.js";
import { InputError } from "../src/shared/errors.js";

const tmpDirs: string[] = [];

afterEach(() => {
  for (const dir of tmpDirs.splice(0)) rmSync(dir, { recursive: true, force: true });
});

function writeCsv(text: string): string {
  const dir = mkdtempSync(path.join(os.tmpdir(), "driftgate-loader-"));
  tmpDirs.push(dir);
  const file = path.join(dir, "data.csv");
  writeFileSync(file, text, "utf-8");
  return file;
}

describe("parseNumericCell", () => {
  it("accepts decimal literals", () => {
    expect(parseNumericCell("1.5")).toBe(1.5);
    expect(parseNumericCell("-2e3")).toBe(-2000);
    expect(parseNumericCell(".5")).toBe(0.5);
    expect(parseNumericCell("+7")).toBe(7);
  });

  it("rejects words, special values and hex", () => {
    expect(parseNumericCell("abc")).toBeNull();
    expect(parseNumericCell("nan")).toBeNull();
    expect(parseNumericCell("Infinity")).toBeNull();
    expect(parseNumericCell("0x10")).toBeNull();
  });

  it("rejects literals that overflow to infinity", () => {
    expect(parseNumericCell("1e400")).toBeNull();
  });
});

describe("parseTable", () => {
  it("counts blank cells as missing and keeps only numeric ones", () => {
    const parsed = parseTable("a,b,c\n1,x,\n2,3,4\n");
    expect(parsed.header).toEqual(["a", "b", "c"]);
    expect(parsed.rowCount).toBe(2);
    expect(parsed.missingCells).toBe(1);
    expect(parsed.columns).toEqual({ a: [1, 2], b: [3], c: [4] });
  });

  it("counts cells absent from short rows as missing", () => {
    const parsed = parseTable("a,b\n1\n2,3\n");
    expect(parsed.missingCells).toBe(1);
    expect(parsed.columns).toEqual({ a: [1, 2], b: [3] });
  });

  it("strips a byte-order mark from the header", () => {
    expect(parseTable("\ufeffa,b\n1,2\n3,4\n").header).toEqual(["a", "b"]);
  });

  it("trims whitespace around cells", () => {
    expect(parseTable("a\n 1 \n2\n").columns.a).toEqual([1, 2]);
  });

  it("reads a repeated header name from its last column", () => {
    const parsed = parseTable("a,a,b\n1,100,1\n2,200,2\n3,300,3\n");
    expect(parsed.header).toEqual(["a", "a", "b"]);
    expect(parsed.columns).toEqual({ a: [100, 200, 300], b: [1, 2, 3] });
  });

  it("counts missing cells under every repeated header position", () => {
    const parsed = parseTable("a,a\n1,\n2,5\n");
    expect(parsed.missingCells).toBe(1);
    expect(parsed.columns).toEqual({ a: [5] });
  });

  it("keeps a __proto__ header as an ordinary column", () => {
    const parsed = parseTable("__proto__,b\n1,1\n2,2\n3,3\n");
    expect(Object.keys(parsed.columns)).toEqual(["__proto__", "b"]);
    expect(Object.getPrototypeOf(parsed.columns)).toBe(Object.prototype);
  });

  it("throws InputError when there is no header", () => {
    expect(() => parseTable("")).toThrow(InputError);
    expect(() => parseTable(",,\n1,2,3\n")).toThrow("table has no header row");
  });
});

describe("toNumericTable", () => {
  it("drops columns with fewer than two numeric values", () => {
    const table = toNumericTable(parseTable("a,b,label\n1,2,x\n3,,y\n"));
    expect(table).toEqual({ a: [1, 3] });
  });

  it("keeps the last of two same-named columns", () => {
    expect(toNumericTable(parseTable("a,a,b\n1,100,1\n2,200,2\n3,300,3\n"))).toEqual({
      a: [100, 200, 300],
      b: [1, 2, 3],
    });
  });

  it("keeps a __proto__ column alongside the others", () => {
    const table = toNumericTable(parseTable("__proto__,b\n1,4\n2,5\n3,6\n"));
    expect(Object.entries(table)).toEqual([
      ["__proto__", [1, 2, 3]],
      ["b", [4, 5, 6]],
    ]);
    expect(sortedColumns(table)).toEqual(["__proto__", "b"]);
  });

  it("throws InputError when no column qualifies", () => {
    expect(() => toNumericTable(parseTable("a,b\n1,x\n"))).toThrow("no usable numeric column");
  });
});

describe("loadTable / readNumericTable", () => {
  it("reads a table from disk", () => {
    const file = writeCsv("x,y\n1,2\n3,4\n5,6\n");
    expect(loadTable(file).rowCount).toBe(3);
    expect(readNumericTable(file)).toEqual({ x: [1, 3, 5], y: [2, 4, 6] });
  });

  it("wraps read failures in InputError", () => {
    const missing = path.join(os.tmpdir(), "driftgate-does-not-exist", "nope.csv");
    expect(() => loadTable(missing)).toThrow(InputError);
    expect(() => loadTable(missing)).toThrow(/cannot read table/);
  });
});

describe("table helpers", () => {
  it("tableLength is the shortest column", () => {
    expect(tableLength({ a: [1, 2, 3], b: [1, 2] })).toBe(2);
    expect(tableLength({})).toBe(0);
  });

  it("sortedColumns orders names lexicographically", () => {
    expect(sortedColumns({ b: [1], a: [2], C: [3] })).toEqual(["C", "a", "b"]);
  });
});
