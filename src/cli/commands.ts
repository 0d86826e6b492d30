/**
 * CLI command handlers. Each handler validates its own flags, runs one
 * engine operation, writes its reports under the output directory and
 * returns a JSON-serializable result for the run summary.
 */

import path from "path";
import { z } from "zod";
import { ConfigError } from "../shared/errors.js";
import { writeStableJson } from "../shared/report.js";
import { sha256Bytes } from "../shared/hash.js";
import {
  parseCoherenceMode,
  parseConfig,
  parseNumberSeries,
  resolveAlpha,
  resolveSeed,
} from "../shared/run_config.js";
import type { DriftSignals } from "../shared/types.js";
import { readNumericTable } from "../table/loader.js";
import { runCoherence } from "../analytics/coherence_report.js";
import { fingerprintCsv } from "../analytics/fingerprint.js";
import { composeDriftSignals, emptyDriftSignals } from "../analytics/drift.js";
import { runStressMark } from "../stress/mark.js";
import { readTargetBytes } from "../stress/target.js";
import { runSoak } from "../soak/soak.js";
import { loadRules } from "../rules/rules_file.js";
import { environmentFromFingerprint, evaluateRules } from "../rules/runner.js";
import { appendLedgerEntry } from "../ledger/version_ledger.js";
import { parseNullMode, parseWeights, runIntegrityGate } from "../gate/integrity.js";
import type { FlagValue } from "./args.js";

export type StepLogger = (step: string, msg: string) => void;

export interface CommandContext {
  outputDir: string;
  env: Readonly<Record<string, string | undefined>>;
  log: StepLogger;
}

export interface CommandOutcome {
  result: Record<string, unknown>;
  /** 0 ok, 3 gate BLOCK. */
  exitCode: 0 | 3;
}

type Flags = Record<string, FlagValue>;
type CommandHandler = (flags: Flags, ctx: CommandContext) => CommandOutcome;

const pathArg = z.string().min(1);
const toggle = z.literal(true).optional();

// ── coherence ────────────────────────────────────────────────────────

const CoherenceFlags = z
  .object({
    input: pathArg,
    thresholds: z.string().default("0.25,0.5,0.7,0.8"),
    mode: z.string().optional(),
    localRuptures: toggle,
    window: z.coerce.number().int().default(100),
    step: z.coerce.number().int().default(100),
    deltaEdges: z.coerce.number().int().nonnegative().default(1),
    maxLag: z.coerce.number().int().positive().default(3),
  })
  .strict();

function coherence(flags: Flags, ctx: CommandContext): CommandOutcome {
  const opts = parseConfig(CoherenceFlags, flags, "coherence flags");
  const thresholds = parseNumberSeries(opts.thresholds, "thresholds");
  const mode = parseCoherenceMode(opts.mode, ctx.env.DRIFTGATE_COHERENCE_MODE);

  ctx.log("COHERENCE", `Input: ${opts.input}`);
  ctx.log("COHERENCE", `Thresholds: ${thresholds.join(", ")} | mode: ${mode}`);

  const run = runCoherence(opts.input, thresholds, ctx.outputDir, {
    mode,
    maxLag: opts.maxLag,
    ruptures: opts.localRuptures
      ? { window: opts.window, step: opts.step, deltaEdgesThreshold: opts.deltaEdges }
      : undefined,
  });

  for (const r of run.reports) {
    ctx.log("COHERENCE", `thr=${r.threshold.toFixed(2)} → ${r.edges} edges (${path.basename(r.report)})`);
  }
  return { result: { ...run, mode }, exitCode: 0 };
}

// ── fingerprint ──────────────────────────────────────────────────────

const FingerprintFlags = z
  .object({
    input: pathArg,
    baseline: pathArg.optional(),
    statTests: toggle,
    alpha: z.string().optional(),
    ledger: pathArg.optional(),
  })
  .strict();

export const FINGERPRINT_REPORT_FILE = "fingerprint_report.json";

function fingerprint(flags: Flags, ctx: CommandContext): CommandOutcome {
  const opts = parseConfig(FingerprintFlags, flags, "fingerprint flags");
  const alpha = resolveAlpha(opts.alpha, ctx.env.DRIFTGATE_ALPHA);

  ctx.log("FINGERPRINT", `Input: ${opts.input}`);
  const fp = fingerprintCsv(opts.input);
  ctx.log("FINGERPRINT", `${fp.row_count} rows, ${Object.keys(fp.columns).length} numeric columns`);

  let drift: DriftSignals = emptyDriftSignals();
  if (opts.baseline) {
    ctx.log("DRIFT", `Baseline: ${opts.baseline}${opts.statTests ? " (KS enabled)" : ""}`);
    drift = composeDriftSignals(fp, fingerprintCsv(opts.baseline), {
      alpha,
      samples: opts.statTests
        ? { baseline: readNumericTable(opts.baseline), current: readNumericTable(opts.input) }
        : undefined,
    });
    ctx.log("DRIFT", `flag_drift=${drift.flag_drift}`);
  }

  const reportPath = path.join(ctx.outputDir, FINGERPRINT_REPORT_FILE);
  const reportSha = writeStableJson(reportPath, {
    input: opts.input,
    baseline: opts.baseline ?? null,
    fingerprint: fp,
    drift_signals: drift,
  });

  const result: Record<string, unknown> = {
    report: reportPath,
    report_sha256: reportSha,
    flag_drift: drift.flag_drift,
  };

  if (opts.ledger) {
    const appended = appendLedgerEntry(opts.ledger, {
      base_hash: sha256Bytes(readTargetBytes(opts.input)),
      fingerprint_reference: reportPath,
      source_reference: opts.input,
      drift_flag: drift.flag_drift,
    });
    ctx.log("LEDGER", `${opts.ledger}: ${appended.size} entries (${appended.history})`);
    result.ledger = appended;
  }

  return { result, exitCode: 0 };
}

// ── stress ───────────────────────────────────────────────────────────

const StressFlags = z
  .object({
    input: pathArg,
    runs: z.coerce.number().int().nonnegative().default(200),
    noise: z.coerce.number().min(0).max(1).default(0.05),
    seed: z.string().optional(),
    writeRuns: toggle,
    fingerprint: pathArg.optional(),
    baselineMark: pathArg.optional(),
    alpha: z.string().optional(),
    ledger: pathArg.optional(),
  })
  .strict();

function stress(flags: Flags, ctx: CommandContext): CommandOutcome {
  const opts = parseConfig(StressFlags, flags, "stress flags");
  const seed = resolveSeed(opts.seed, ctx.env.DRIFTGATE_SEED);

  ctx.log("STRESS", `Target: ${opts.input} | runs=${opts.runs} noise=${opts.noise}`);
  const out = runStressMark(opts.input, {
    runs: opts.runs,
    noise: opts.noise,
    seed,
    outputDir: ctx.outputDir,
    writeRuns: opts.writeRuns === true,
    fingerprintCsv: opts.fingerprint,
    baselineMark: opts.baselineMark,
    alpha: resolveAlpha(opts.alpha, ctx.env.DRIFTGATE_ALPHA),
    ledgerPath: opts.ledger,
  });

  const { mark } = out;
  ctx.log("STRESS", `seed=${mark.seed} mean entropy ${mark.summary.mean.toFixed(3)} bits (var ${mark.summary.var})`);
  if (out.ledger) ctx.log("LEDGER", `${opts.ledger}: ${out.ledger.size} entries (${out.ledger.history})`);

  const result: Record<string, unknown> = {
    mark: out.markPath,
    base_hash: mark.base_hash,
    seed: mark.seed,
    summary: mark.summary,
  };
  if (mark.drift_signals) result.drift_signals = mark.drift_signals;
  if (out.ledger) result.ledger = out.ledger;
  return { result, exitCode: 0 };
}

// ── soak ─────────────────────────────────────────────────────────────

const SoakFlags = z
  .object({
    runs: z.coerce.number().int().nonnegative().default(100),
    seed: z.string().optional(),
    constraints: pathArg.default("constraints.txt"),
    dataAware: toggle,
    input: pathArg.optional(),
    rules: pathArg.optional(),
    sampleRows: z.coerce.number().int().positive().default(50),
  })
  .strict();

function soak(flags: Flags, ctx: CommandContext): CommandOutcome {
  const opts = parseConfig(SoakFlags, flags, "soak flags");
  if (opts.dataAware && !opts.input) {
    throw new ConfigError("--data-aware requires --input");
  }
  const seed = resolveSeed(opts.seed, ctx.env.DRIFTGATE_SEED);

  ctx.log("SOAK", `runs=${opts.runs} constraints=${opts.constraints}${opts.dataAware ? " (data-aware)" : ""}`);
  const { summary, summaryPath } = runSoak({
    runs: opts.runs,
    outputDir: ctx.outputDir,
    constraintsPath: opts.constraints,
    seed,
    dataAware:
      opts.dataAware && opts.input
        ? { inputCsv: opts.input, rulesPath: opts.rules, sampleRows: opts.sampleRows }
        : undefined,
  });

  ctx.log("SOAK", `${summary.ok_runs}/${summary.runs} OK (seed ${summary.seed})`);
  if (summary.anomalies) ctx.log("SOAK", `${summary.anomalies.length} runs with rule violations`);
  return { result: { summary: summaryPath, ...summary }, exitCode: 0 };
}

// ── rules ────────────────────────────────────────────────────────────

const RulesFlags = z.object({ input: pathArg, rules: pathArg }).strict();

export const RULES_REPORT_FILE = "rules_report.json";

function rules(flags: Flags, ctx: CommandContext): CommandOutcome {
  const opts = parseConfig(RulesFlags, flags, "rules flags");
  const loaded = loadRules(opts.rules);
  const violations = evaluateRules(loaded, environmentFromFingerprint(fingerprintCsv(opts.input)));

  ctx.log("RULES", `${loaded.length} rules, ${violations.length} violations`);
  for (const v of violations) {
    ctx.log("RULES", `  ${v.rule}: ${"error" in v ? v.error : "false"}`);
  }

  const reportPath = path.join(ctx.outputDir, RULES_REPORT_FILE);
  writeStableJson(reportPath, {
    input: opts.input,
    rules_path: opts.rules,
    evaluated: loaded.length,
    violations,
  });
  return {
    result: { report: reportPath, evaluated: loaded.length, violations: violations.length },
    exitCode: 0,
  };
}

// ── gate ─────────────────────────────────────────────────────────────

const GateFlags = z
  .object({
    soakSummary: pathArg.optional(),
    stressMark: pathArg.optional(),
    baselineCsv: pathArg.optional(),
    currentCsv: pathArg.optional(),
    threshold: z.coerce.number().finite().default(0.25),
    weights: z.string().default("0.3,0.4,0.3"),
    nullTarget: z.coerce.number().finite().default(0.1),
    nullMode: z.string().default("p05"),
    voidVarLimit: z.coerce.number().finite().default(0.01),
    driftZLimit: z.coerce.number().finite().default(3.0),
  })
  .strict();

function gate(flags: Flags, ctx: CommandContext): CommandOutcome {
  const opts = parseConfig(GateFlags, flags, "gate flags");
  const { report, reportPath } = runIntegrityGate(
    {
      soakSummary: opts.soakSummary,
      stressMark: opts.stressMark,
      baselineCsv: opts.baselineCsv,
      currentCsv: opts.currentCsv,
    },
    ctx.outputDir,
    {
      threshold: opts.threshold,
      weights: parseWeights(opts.weights),
      nullTarget: opts.nullTarget,
      nullMode: parseNullMode(opts.nullMode),
      voidVarLimit: opts.voidVarLimit,
      driftZLimit: opts.driftZLimit,
    }
  );

  const { v_null, v_drift, v_void } = report.violations;
  ctx.log("GATE", `v_null=${v_null.toFixed(6)} v_drift=${v_drift.toFixed(6)} v_void=${v_void.toFixed(6)}`);
  ctx.log(
    "GATE",
    `incoherence_score=${report.incoherence_score.toFixed(6)} (threshold=${report.threshold.toFixed(6)}) → ${report.decision}`
  );

  return {
    result: { report: reportPath, ...report },
    exitCode: report.decision === "BLOCK" ? 3 : 0,
  };
}

export const COMMANDS: Record<string, CommandHandler> = {
  coherence,
  fingerprint,
  stress,
  soak,
  rules,
  gate,
};
