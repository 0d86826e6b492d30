import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import os from "os";
import path from "path";
import {
  computeIncoherence,
  DEFAULT_GATE_OPTIONS,
  GATE_REPORT_FILE,
  loadGateInputs,
  meanShiftZmax,
  parseNullMode,
  parseWeights,
  pickNullScore,
  runIntegrityGate,
} from "../src/gate/integrity.js";
import { ConfigError, InputError } from "../src/shared/errors.js";

const tmpDirs: string[] = [];

function tmpDir(): string {
  const dir = mkdtempSync(path.join(os.tmpdir(), "driftgate-gate-"));
  tmpDirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of tmpDirs.splice(0)) rmSync(dir, { recursive: true, force: true });
});

describe("parseWeights", () => {
  it("reads w_null, w_drift, w_void in order", () => {
    expect(parseWeights("0.2, 0.5,0.3")).toEqual({ w_null: 0.2, w_drift: 0.5, w_void: 0.3 });
  });

  it("rejects the wrong arity and non-numbers", () => {
    expect(() => parseWeights("0.5,0.5")).toThrow(ConfigError);
    expect(() => parseWeights("a,b,c")).toThrow(ConfigError);
  });
});

describe("parseNullMode", () => {
  it("accepts modes and aliases case-insensitively", () => {
    expect(parseNullMode("P05")).toBe("p05");
    expect(parseNullMode("mean")).toBe("mean_score");
    expect(parseNullMode("median")).toBe("p50");
    expect(parseNullMode("p10")).toBe("p05");
    expect(parseNullMode("failed_ratio")).toBe("failed_ratio");
  });

  it("rejects unknown modes", () => {
    expect(() => parseNullMode("p99")).toThrow(ConfigError);
  });
});

describe("pickNullScore", () => {
  const base = { runs: 10, failed_runs: 1 };

  it("uses the requested score when present", () => {
    expect(pickNullScore({ ...base, p05: 0.07 }, "p05")).toEqual({ score: 0.07, mode: "p05" });
  });

  it("falls back to min_score, then to the failed ratio", () => {
    expect(pickNullScore({ ...base, min_score: 0.02 }, "p50")).toEqual({ score: 0.02, mode: "min_score" });
    expect(pickNullScore(base, "p50")).toEqual({ score: null, mode: "failed_ratio" });
  });

  it("walks the auto order", () => {
    expect(pickNullScore({ ...base, mean_score: 0.4, p50: 0.5 }, "auto")).toEqual({
      score: 0.4,
      mode: "mean_score",
    });
    expect(pickNullScore(base, "auto")).toEqual({ score: null, mode: "failed_ratio" });
  });
});

describe("meanShiftZmax", () => {
  it("divides the mean shift by the baseline population std", () => {
    // baseline [1, 3]: mean 2, std 1; current mean 5
    expect(meanShiftZmax({ a: [1, 3] }, { a: [4, 6] })).toBe(3);
  });

  it("skips constant baselines and unmatched columns", () => {
    expect(meanShiftZmax({ a: [2, 2], b: [1, 3] }, { a: [9, 9], c: [0, 0] })).toBe(0);
  });

  it("keeps the largest shift across columns", () => {
    expect(meanShiftZmax({ a: [1, 3], b: [1, 3] }, { a: [2, 4], b: [5, 7] })).toBe(4);
  });
});

describe("computeIncoherence", () => {
  it("is OK with zero score when nothing is provided", () => {
    const report = computeIncoherence({});
    expect(report.incoherence_score).toBe(0);
    expect(report.decision).toBe("OK");
    expect(report.components.soak).toEqual({ source: null, error: "soak summary not found" });
    expect(report.components.stress).toEqual({ source: null, error: "stress mark not found" });
    expect(report.components.drift).toEqual({
      note: "no baseline/current csv provided, drift set to 0",
      drift_z_limit: 3,
    });
  });

  it("weights every violation and blocks above the threshold", () => {
    const report = computeIncoherence({
      soak: { source: "soak.json", scores: { runs: 100, failed_runs: 3, p05: 0.05 } },
      stress: { source: "mark.json", entropyVar: 0.02 },
      drift: { baselineCsv: "b.csv", currentCsv: "c.csv", zmax: 6 },
    });
    expect(report.violations.v_null).toBeCloseTo(0.5, 12);
    expect(report.violations.v_void).toBeCloseTo(1, 12);
    expect(report.violations.v_drift).toBe(1);
    expect(report.incoherence_score).toBeCloseTo(0.85, 12);
    expect(report.decision).toBe("BLOCK");
    expect(report.components.soak.computed_from).toBe("p05");
  });

  it("clamps violations at zero when every measure is within limits", () => {
    const report = computeIncoherence({
      soak: { source: "soak.json", scores: { runs: 10, failed_runs: 0, p05: 0.5 } },
      stress: { source: "mark.json", entropyVar: 0.001 },
      drift: { baselineCsv: "b.csv", currentCsv: "c.csv", zmax: 1 },
    });
    expect(report.violations).toEqual({ v_null: 0, v_drift: 0, v_void: 0 });
    expect(report.decision).toBe("OK");
  });

  it("uses the failed-run ratio in failed_ratio mode", () => {
    const report = computeIncoherence(
      { soak: { source: "soak.json", scores: { runs: 10, failed_runs: 2, p05: 0.9 } } },
      { ...DEFAULT_GATE_OPTIONS, nullMode: "failed_ratio" }
    );
    expect(report.violations.v_null).toBe(0.2);
    expect(report.components.soak.computed_from).toBe("failed_runs/runs");
    expect(report.components.soak.p05).toBe(0.9);
  });

  it("treats a score equal to the threshold as OK", () => {
    const report = computeIncoherence(
      { drift: { baselineCsv: "b.csv", currentCsv: "c.csv", zmax: 6 } },
      { ...DEFAULT_GATE_OPTIONS, threshold: 0.4 }
    );
    expect(report.incoherence_score).toBe(0.4);
    expect(report.decision).toBe("OK");
  });

  it("does not divide by a zero limit", () => {
    const report = computeIncoherence(
      { stress: { source: "mark.json", entropyVar: 5 } },
      { ...DEFAULT_GATE_OPTIONS, voidVarLimit: 0 }
    );
    expect(report.violations.v_void).toBe(0);
  });
});

describe("file-backed gate", () => {
  it("leaves components empty for missing files", () => {
    const dir = tmpDir();
    expect(
      loadGateInputs({
        soakSummary: path.join(dir, "none.json"),
        stressMark: path.join(dir, "none.json"),
        baselineCsv: path.join(dir, "b.csv"),
      })
    ).toEqual({});
  });

  it("rejects a malformed soak summary", () => {
    const dir = tmpDir();
    const soakSummary = path.join(dir, "soak_summary.json");
    writeFileSync(soakSummary, JSON.stringify({ runs: "ten" }), "utf-8");
    expect(() => loadGateInputs({ soakSummary })).toThrow(InputError);
  });

  it("writes the incoherence report", () => {
    const dir = tmpDir();
    const soakSummary = path.join(dir, "soak_summary.json");
    const stressMark = path.join(dir, "stress_mark.json");
    const baselineCsv = path.join(dir, "base.csv");
    const currentCsv = path.join(dir, "curr.csv");
    writeFileSync(soakSummary, JSON.stringify({ runs: 10, failed_runs: 0, p05: 0.2 }), "utf-8");
    writeFileSync(stressMark, JSON.stringify({ summary: { var: 0 } }), "utf-8");
    writeFileSync(baselineCsv, "a\n1\n3\n", "utf-8");
    writeFileSync(currentCsv, "a\n4\n6\n", "utf-8");

    const out = path.join(dir, "out");
    const { report, reportPath } = runIntegrityGate(
      { soakSummary, stressMark, baselineCsv, currentCsv },
      out
    );

    expect(reportPath).toBe(path.join(out, GATE_REPORT_FILE));
    expect(report.components.drift.zmax_mean_shift).toBe(3);
    expect(report.violations).toEqual({ v_null: 0, v_drift: 0, v_void: 0 });
    expect(report.decision).toBe("OK");

    const written = JSON.parse(readFileSync(reportPath, "utf-8"));
    expect(written.decision).toBe("OK");
    expect(written.components.soak.source).toBe(soakSummary);
  });
});
