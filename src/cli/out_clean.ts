#!/usr/bin/env tsx
/**
 * out:clean: removes earlier CLI runs.
 *
 * `report:generate` writes each run to out/<sessionId>/ (reports/,
 * audit/trace.jsonl, record.json, report_bundle.zip). This empties out/
 * under the current directory, or under the directory given as the
 * first argument.
 *
 * Usage:
 *   npm run out:clean [-- <project dir>]
 *   npm run report:generate -- --clean ...
 */

import { existsSync, mkdirSync, readdirSync, rmSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { logStep } from "../shared/log.js";

export interface CleanResult {
  outDir: string;
  /** Top-level entries that were removed, usually one per session run. */
  removed: string[];
}

/** Empty a directory named "out", creating it when missing. Any other target throws. */
export function cleanOutputDir(outDir: string): CleanResult {
  const resolved = path.resolve(outDir);
  if (path.basename(resolved) !== "out") {
    throw new Error(`Refusing to clean "${resolved}": report runs only live under a directory named "out".`);
  }

  const removed = existsSync(resolved) ? readdirSync(resolved).sort() : [];
  for (const entry of removed) {
    rmSync(path.join(resolved, entry), { recursive: true, force: true });
  }
  mkdirSync(resolved, { recursive: true });
  return { outDir: resolved, removed };
}

if (process.argv[1] && path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url))) {
  const { outDir, removed } = cleanOutputDir(path.join(path.resolve(process.argv[2] ?? "."), "out"));
  logStep("CLEAN", `${outDir}: removed ${removed.length} entr${removed.length === 1 ? "y" : "ies"}`);
}
