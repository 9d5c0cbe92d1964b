import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import os from "os";
import path from "path";
import { parseCliArgs, runReportCli } from "../src/cli/generate_report.js";
import { MESSAGES } from "../src/extraction/orchestrator.js";
import { StructuredRecordSchema } from "../src/record/schema.js";
import { FIXED_CLOCK, PONDING_INTERNAL, jsonExtractor } from "./fixtures.js";

describe("parseCliArgs", () => {
  it("accepts a notes run with options", () => {
    expect(parseCliArgs(["--notes", "visit.txt", "--out", "result", "--mode", "live", "--clean"])).toEqual({
      ok: true,
      args: { source: { kind: "notes", file: "visit.txt" }, outDir: "result", mode: "live", clean: true },
    });
  });

  it("accepts a manual run with defaults", () => {
    expect(parseCliArgs(["--manual", "entry.json"])).toEqual({
      ok: true,
      args: { source: { kind: "manual", file: "entry.json" }, outDir: null, mode: undefined, clean: false },
    });
  });

  it.each([
    [["--bogus"], "Unknown argument: --bogus"],
    [["--notes"], "--notes needs a value"],
    [["--out", "--clean"], "--out needs a value"],
    [["--notes", "a.txt", "--manual", "b.json"], "Use either --notes or --manual, not both"],
    [["--clean"], "One of --notes or --manual is required"],
    [["--manual", "b.json", "--mode", "turbo"], '--mode must be offline or live (got "turbo")'],
  ])("rejects %j", (argv, error) => {
    expect(parseCliArgs(argv)).toEqual({ ok: false, error });
  });
});

describe("runReportCli", () => {
  let cwd: string;
  let errors: string[];

  beforeEach(() => {
    cwd = mkdtempSync(path.join(os.tmpdir(), "roof-notes-cli-"));
    errors = [];
    vi.spyOn(console, "error").mockImplementation((msg: unknown) => {
      errors.push(String(msg));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(cwd, { recursive: true, force: true });
  });

  function readRecord(dir: string) {
    return StructuredRecordSchema.parse(JSON.parse(readFileSync(path.join(cwd, dir, "record.json"), "utf-8")));
  }

  it("writes every artifact for a manual entry file", async () => {
    writeFileSync(
      path.join(cwd, "manual.json"),
      JSON.stringify({ primaryIssue: "Ponding", observations: "- Standing water\n- Soft insulation" }),
    );

    const code = await runReportCli(["--manual", "manual.json", "--out", "result"], {
      cwd,
      env: {},
      extractor: null,
      clock: FIXED_CLOCK,
    });

    expect(code).toBe(0);
    for (const stem of ["internal_service_report", "customer_summary", "roof_service_report"]) {
      for (const format of ["txt", "docx", "pdf"]) {
        expect(existsSync(path.join(cwd, "result", "reports", `${stem}.${format}`))).toBe(true);
      }
    }
    expect(existsSync(path.join(cwd, "result", "audit", "trace.jsonl"))).toBe(true);
    expect(existsSync(path.join(cwd, "result", "report_bundle.zip"))).toBe(true);

    const record = readRecord("result");
    expect(record.internal_report.observations).toEqual(["Standing water", "Soft insulation"]);
    expect(record.internal_report.severity).toBe("Moderate");
    expect(record.internal_report.urgency).toBe("Soon");

    const field = readFileSync(path.join(cwd, "result", "reports", "roof_service_report.txt"), "utf-8");
    expect(field).toContain("\nGenerated on: 2026-03-14 09:30 UTC\n");
  });

  it("normalizes a notes file through the extractor", async () => {
    writeFileSync(path.join(cwd, "visit.txt"), "Standing water at rear drain, membrane looks tired.");

    const code = await runReportCli(["--notes", "visit.txt", "--out", "result"], {
      cwd,
      env: {},
      extractor: jsonExtractor({ internal_report: PONDING_INTERNAL }),
      clock: FIXED_CLOCK,
    });

    expect(code).toBe(0);
    const record = readRecord("result");
    expect(record.internal_report.primary_issue).toBe("Ponding");
    expect(record.customer_report.what_we_found).toBe("During the service visit, we found: Ponding.");
  });

  it("fails a notes run when no extractor is available", async () => {
    writeFileSync(path.join(cwd, "visit.txt"), "Ponding at rear drain.");

    const code = await runReportCli(["--notes", "visit.txt", "--out", "result"], { cwd, env: {}, extractor: null });

    expect(code).toBe(1);
    expect(errors).toEqual([`  ✗ ${MESSAGES.noExtractor}`]);
    expect(existsSync(path.join(cwd, "result"))).toBe(false);
  });

  it("fails when the input file is missing", async () => {
    const code = await runReportCli(["--manual", "missing.json"], { cwd, env: {}, extractor: null });

    expect(code).toBe(1);
    expect(errors).toHaveLength(1);
    expect(errors[0].startsWith("Cannot read missing.json: ")).toBe(true);
  });

  it("rejects a manual file that is not valid JSON", async () => {
    writeFileSync(path.join(cwd, "manual.json"), "{ primaryIssue: ");

    const code = await runReportCli(["--manual", "manual.json"], { cwd, env: {}, extractor: null });

    expect(code).toBe(1);
    expect(errors[0].startsWith("manual.json is not valid JSON: ")).toBe(true);
  });

  it("prints usage for bad arguments", async () => {
    const code = await runReportCli(["--notes"], { cwd, env: {}, extractor: null });

    expect(code).toBe(1);
    expect(errors[0]).toBe("--notes needs a value");
    expect(errors[1].startsWith("Usage: ")).toBe(true);
  });

  it("empties out/ before generating when --clean is given", async () => {
    mkdirSync(path.join(cwd, "out"));
    writeFileSync(path.join(cwd, "out", "stale.txt"), "old run");
    writeFileSync(path.join(cwd, "manual.json"), JSON.stringify({ primaryIssue: "Debris" }));

    const code = await runReportCli(["--manual", "manual.json", "--clean"], { cwd, env: {}, extractor: null });

    expect(code).toBe(0);
    expect(existsSync(path.join(cwd, "out", "stale.txt"))).toBe(false);
  });
});
