#!/usr/bin/env node
/**
 * CLI: report:generate
 *
 * Usage: npm run report:generate -- (--notes <file> | --manual <json file>) [--out <dir>] [--mode offline|live] [--clean]
 *
 * Builds one record from field notes (through the extractor) or from a
 * manual-entry JSON file, then writes every report in every format,
 * record.json, audit/trace.jsonl and report_bundle.zip to the output dir
 * (default: out/<sessionId>/).
 */

import "dotenv/config";
import { existsSync, mkdirSync, readFileSync, realpathSync, writeFileSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { cleanOutputDir } from "./out_clean.js";
import { createAnthropicExtractor } from "../generation/llm_client.js";
import { ManualEntrySchema } from "../manual/manual_entry.js";
import { ReportPipeline } from "../pipeline/report_pipeline.js";
import { serializeRecord } from "../record/validator.js";
import { ReportSession } from "../session/report_session.js";
import { errorMessage } from "../shared/errors.js";
import { extractorEnabled, loadRunConfig } from "../shared/run_config.js";
import { logStep, warnStep } from "../shared/log.js";
import { exportJSONL } from "../trace/decision_trace.js";
import type { NoteExtractor } from "../generation/llm_client.js";

export const USAGE =
  "Usage: npm run report:generate -- (--notes <file> | --manual <json file>) [--out <dir>] [--mode offline|live] [--clean]";

export interface CliArgs {
  source: { kind: "notes"; file: string } | { kind: "manual"; file: string };
  outDir: string | null;
  mode: string | undefined;
  clean: boolean;
}

export type CliParse = { ok: true; args: CliArgs } | { ok: false; error: string };

export function parseCliArgs(argv: readonly string[]): CliParse {
  let notesFile = "";
  let manualFile = "";
  let outDir: string | null = null;
  let mode: string | undefined;
  let clean = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = i + 1 < argv.length ? argv[i + 1] : undefined;
    if (arg === "--clean") {
      clean = true;
      continue;
    }
    if (arg !== "--notes" && arg !== "--manual" && arg !== "--out" && arg !== "--mode") {
      return { ok: false, error: `Unknown argument: ${arg}` };
    }
    if (next === undefined || next.startsWith("--")) {
      return { ok: false, error: `${arg} needs a value` };
    }
    i++;
    if (arg === "--notes") notesFile = next;
    if (arg === "--manual") manualFile = next;
    if (arg === "--out") outDir = next;
    if (arg === "--mode") mode = next;
  }

  if (notesFile && manualFile) return { ok: false, error: "Use either --notes or --manual, not both" };
  if (!notesFile && !manualFile) return { ok: false, error: "One of --notes or --manual is required" };
  if (mode !== undefined && mode !== "offline" && mode !== "live") {
    return { ok: false, error: `--mode must be offline or live (got "${mode}")` };
  }

  const source = notesFile
    ? { kind: "notes" as const, file: notesFile }
    : { kind: "manual" as const, file: manualFile };
  return { ok: true, args: { source, outDir, mode, clean } };
}

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  /** Overrides the Anthropic extractor built from the run config. */
  extractor?: NoteExtractor | null;
  clock?: () => Date;
  cwd?: string;
}

/** Returns the process exit code. */
export async function runReportCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (!parsed.ok) {
    console.error(parsed.error);
    console.error(USAGE);
    return 1;
  }
  const { source, clean, mode } = parsed.args;
  const cwd = deps.cwd ?? process.cwd();
  const outRoot = path.join(cwd, "out");

  const config = loadRunConfig(deps.env ?? process.env, mode);
  const extractor =
    deps.extractor !== undefined
      ? deps.extractor
      : extractorEnabled(config)
        ? createAnthropicExtractor(config)
        : null;
  const pipeline = new ReportPipeline({ extractor, clock: deps.clock });
  const session = new ReportSession();
  const outDir = path.resolve(cwd, parsed.args.outDir ?? path.join(outRoot, session.id));

  if (clean) {
    const { removed } = cleanOutputDir(outRoot);
    logStep("CLEAN", `${outRoot}: removed ${removed.length} earlier run(s)`);
  }

  logStep("PIPELINE", `Run mode: ${config.mode}${extractor ? "" : " (extractor unavailable)"}`);
  logStep("PIPELINE", `Output: ${outDir}`);

  let input: string;
  try {
    input = readFileSync(path.resolve(cwd, source.file), "utf-8");
  } catch (err) {
    console.error(`Cannot read ${source.file}: ${errorMessage(err)}`);
    return 1;
  }

  if (source.kind === "notes") {
    const outcome = await pipeline.normalize(session, input);
    if (outcome.status === "failure") {
      console.error(`  ✗ ${outcome.message}`);
      return 1;
    }
    logStep("NORMALIZE", `Record built from notes${outcome.customerDerived ? " (customer report derived)" : ""}`);
    for (const warning of outcome.warnings) warnStep("CONSISTENCY", warning);
  } else {
    let body: unknown;
    try {
      body = JSON.parse(input);
    } catch (err) {
      console.error(`${source.file} is not valid JSON: ${errorMessage(err)}`);
      return 1;
    }
    const manual = ManualEntrySchema.safeParse(body);
    if (!manual.success) {
      console.error(`${source.file}: ${manual.error.issues.map((issue) => issue.message).join("; ")}`);
      return 1;
    }
    pipeline.enterManual(session, manual.data);
    logStep("MANUAL", "Record built from manual entry");
  }

  const record = session.record;
  if (!record) {
    console.error("  ✗ No record was produced.");
    return 1;
  }
  logStep("RECORD", `Severity ${record.internal_report.severity}, urgency ${record.internal_report.urgency}`);

  const bundle = await pipeline.bundle(session);
  for (const warning of bundle.warnings) warnStep("EXPORT", warning);

  mkdirSync(path.join(outDir, "reports"), { recursive: true });
  mkdirSync(path.join(outDir, "audit"), { recursive: true });
  for (const file of bundle.files) {
    writeFileSync(path.join(outDir, "reports", file.filename), file.content);
  }
  writeFileSync(path.join(outDir, "record.json"), serializeRecord(record));
  writeFileSync(path.join(outDir, "audit", "trace.jsonl"), exportJSONL(session.trace.getChain()));
  writeFileSync(path.join(outDir, "report_bundle.zip"), bundle.zip);

  const chainValidation = session.trace.validateChain();
  logStep("AUDIT", `Trace chain: ${session.trace.length} records, ${chainValidation.valid ? "VALID" : "INVALID"}`);
  logStep("OUTPUT", `${bundle.files.length} report files, record.json, audit/trace.jsonl, report_bundle.zip`);
  return 0;
}

// ── CLI entry point ──────────────────────────────────────────────────
if (
  process.argv[1] &&
  existsSync(process.argv[1]) &&
  realpathSync(path.resolve(process.argv[1])) === realpathSync(fileURLToPath(import.meta.url))
) {
  runReportCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      console.error(`\n  ✗ Generation failed: ${errorMessage(err)}`);
      process.exitCode = 1;
    });
}
