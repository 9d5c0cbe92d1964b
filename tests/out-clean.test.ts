import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, readdirSync, rmSync, writeFileSync } from "fs";
import os from "os";
import path from "path";
import { cleanOutputDir } from "../src/cli/out_clean.js";

describe("cleanOutputDir", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(path.join(os.tmpdir(), "roof-notes-clean-"));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("creates out/ when it does not exist", () => {
    const outDir = path.join(root, "out");

    expect(cleanOutputDir(outDir)).toEqual({ outDir, removed: [] });
    expect(existsSync(outDir)).toBe(true);
  });

  it("removes earlier session runs and reports their names", () => {
    const outDir = path.join(root, "out");
    mkdirSync(path.join(outDir, "session-b", "reports"), { recursive: true });
    writeFileSync(path.join(outDir, "session-b", "reports", "customer_summary.pdf"), "pdf-bytes");
    mkdirSync(path.join(outDir, "session-a", "audit"), { recursive: true });
    writeFileSync(path.join(outDir, "session-a", "audit", "trace.jsonl"), "{}\n");

    expect(cleanOutputDir(outDir).removed).toEqual(["session-a", "session-b"]);
    expect(readdirSync(outDir)).toEqual([]);
  });

  it("refuses directories not named out", () => {
    const reports = path.join(root, "reports");
    mkdirSync(reports);
    writeFileSync(path.join(reports, "keep.txt"), "keep");

    expect(() => cleanOutputDir(reports)).toThrow(/^Refusing to clean /);
    expect(existsSync(path.join(reports, "keep.txt"))).toBe(true);
  });
});
