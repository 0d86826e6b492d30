#!/usr/bin/env node
/**
 * CLI: driftgate
 *
 * Usage: driftgate <command> [--flags] [--output-dir <dir>]
 *
 *   coherence   --input <csv> [--thresholds 0.25,0.5] [--mode corr|causal] [--max-lag 3]
 *               [--local-ruptures --window 100 --step 100 --delta-edges 1]
 *   fingerprint --input <csv> [--baseline <csv> --stat-tests --alpha 0.05] [--ledger <json>]
 *   stress      --input <file|dir> [--runs 200 --noise 0.05 --seed 0 --write-runs]
 *               [--fingerprint <csv> --baseline-mark <json>] [--ledger <json>]
 *   soak        [--runs 100 --seed 0 --constraints <file>] [--data-aware --input <csv> --rules <file>]
 *   rules       --input <csv> --rules <file>
 *   gate        [--soak-summary <json>] [--stress-mark <json>] [--baseline-csv <csv> --current-csv <csv>]
 *               [--threshold 0.25 --weights 0.3,0.4,0.3 --null-mode p05]
 *
 * Every command writes driftgate_summary.json in its output directory.
 * Exit codes: 0 ok, 2 error, 3 gate BLOCK.
 */

import "dotenv/config";
import path from "path";
import { existsSync, realpathSync } from "fs";
import { fileURLToPath } from "url";
import { ConfigError, errorMessage } from "../shared/errors.js";
import { writeStableJson } from "../shared/report.js";
import { parseArgv, type ParsedArgs } from "./args.js";
import { COMMANDS, type StepLogger } from "./commands.js";

export const SUMMARY_FILE = "driftgate_summary.json";
export const DEFAULT_OUTPUT_ROOT = "_driftgate_out";

type Env = Readonly<Record<string, string | undefined>>;

export interface CliRun {
  exitCode: 0 | 2 | 3;
  summary: Record<string, unknown>;
  summaryPath: string | null;
}

/** ISO-8601 UTC timestamp, pinned by SOURCE_DATE_EPOCH when it is set. */
export function utcTimestamp(env: Env, now: Date = new Date()): string {
  const sde = env.SOURCE_DATE_EPOCH?.trim();
  let date = now;
  if (sde) {
    const seconds = Number(sde);
    if (!Number.isInteger(seconds)) {
      throw new ConfigError(`SOURCE_DATE_EPOCH must be an integer, got "${sde}"`);
    }
    date = new Date(seconds * 1000);
  }
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

export function consoleStepLogger(startTime: number = Date.now()): StepLogger {
  return (step, msg) => {
    const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
    console.log(`  [${elapsed}s] [${step}] ${msg}`);
  };
}

function resolveOutputDir(parsed: ParsedArgs, env: Env): string {
  const flag = parsed.flags.outputDir;
  if (flag === true) throw new ConfigError("--output-dir needs a value");
  return flag ?? env.DRIFTGATE_OUTPUT_DIR ?? path.join(DEFAULT_OUTPUT_ROOT, parsed.command);
}

/**
 * Run one command and write its summary. Never throws for command failures:
 * they are recorded in the summary and mapped to exit code 2.
 */
export function runCli(argv: readonly string[], env: Env, log: StepLogger = consoleStepLogger()): CliRun {
  let parsed: ParsedArgs;
  let outputDir: string;
  try {
    parsed = parseArgv(argv);
    outputDir = resolveOutputDir(parsed, env);
  } catch (err) {
    console.error(`  ✗ ${errorMessage(err)}`);
    console.error(`  Commands: ${Object.keys(COMMANDS).join(", ")}`);
    return {
      exitCode: 2,
      summary: { status: "error", error: { type: errorType(err), message: errorMessage(err) } },
      summaryPath: null,
    };
  }

  const { command } = parsed;
  const summary: Record<string, unknown> = { command, status: "ok" };
  let exitCode: CliRun["exitCode"] = 0;

  try {
    summary.generated_at_utc = utcTimestamp(env);
    if (!Object.hasOwn(COMMANDS, command)) {
      throw new ConfigError(`unknown command "${command}" (expected ${Object.keys(COMMANDS).join(" | ")})`);
    }
    const flags = { ...parsed.flags };
    delete flags.outputDir;
    const outcome = COMMANDS[command](flags, { outputDir, env, log });
    summary[command] = outcome.result;
    exitCode = outcome.exitCode;
    if (exitCode === 3) summary.status = "block";
  } catch (err) {
    summary.status = "error";
    summary.error = { type: errorType(err), message: errorMessage(err) };
    exitCode = 2;
    console.error(`  ✗ ${command} failed: ${errorMessage(err)}`);
  }

  const summaryPath = path.join(outputDir, SUMMARY_FILE);
  try {
    writeStableJson(summaryPath, summary);
  } catch (err) {
    console.error(`  ✗ cannot write summary: ${errorMessage(err)}`);
    return { exitCode: 2, summary, summaryPath: null };
  }
  log("SUMMARY", `Written to ${summaryPath}`);
  return { exitCode, summary, summaryPath };
}

function errorType(err: unknown): string {
  return err instanceof Error ? err.name : typeof err;
}

// ── CLI entry point ──────────────────────────────────────────────────
function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script || !existsSync(script)) return false;
  return realpathSync(path.resolve(script)) === realpathSync(fileURLToPath(import.meta.url));
}

if (isEntryPoint()) {
  console.log("driftgate: drift, coherence and integrity gate");
  console.log();
  const { exitCode } = runCli(process.argv.slice(2), process.env);
  process.exit(exitCode);
}
