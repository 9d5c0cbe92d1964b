/**
 * Run Configuration Module
 *
 * Controls whether the note extractor is available:
 * - OFFLINE: manual entry only; no LLM calls.
 * - LIVE:    notes are normalized through the LLM extractor when a key is configured.
 */

import type { RunMode } from "./types.js";

export interface RunConfig {
  mode: RunMode;
  apiKey: string | null;
  model: string;
  maxTokens: number;
  port: number;
  /** Idle lifetime of an HTTP session. */
  sessionTtlMinutes: number;
}

export const DEFAULT_MODEL = "claude-sonnet-4-5-20250929";
const DEFAULT_MAX_TOKENS = 2000;
const DEFAULT_PORT = 3000;
const DEFAULT_SESSION_TTL_MINUTES = 120;
const PLACEHOLDER_KEYS = new Set(["sk-ant-xxxxx", "changeme"]);

/**
 * Parse run mode from CLI argument and/or environment variable.
 * CLI argument takes priority over environment variable.
 * Defaults to "offline" when neither is provided.
 */
export function parseRunMode(cliArg?: string, envVar?: string): RunMode {
  const raw = (cliArg ?? envVar ?? "offline").trim().toLowerCase();
  if (raw === "live") return "live";
  return "offline";
}

/** Returns the key only when it looks usable. */
export function usableApiKey(key: string | undefined): string | null {
  if (!key) return null;
  const trimmed = key.trim();
  if (trimmed.length < 10 || PLACEHOLDER_KEYS.has(trimmed)) return null;
  return trimmed;
}

function parsePositiveInt(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const n = Number.parseInt(raw, 10);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

export function loadRunConfig(
  env: NodeJS.ProcessEnv = process.env,
  cliMode?: string,
): RunConfig {
  return {
    mode: parseRunMode(cliMode, env.ROOF_NOTES_MODE),
    apiKey: usableApiKey(env.ANTHROPIC_API_KEY),
    model: env.ROOF_NOTES_MODEL?.trim() || DEFAULT_MODEL,
    maxTokens: parsePositiveInt(env.ROOF_NOTES_MAX_TOKENS, DEFAULT_MAX_TOKENS),
    port: parsePositiveInt(env.PORT, DEFAULT_PORT),
    sessionTtlMinutes: parsePositiveInt(env.ROOF_NOTES_SESSION_TTL_MINUTES, DEFAULT_SESSION_TTL_MINUTES),
  };
}

/** The extractor is only wired up in live mode with a usable key. */
export function extractorEnabled(config: RunConfig): boolean {
  return config.mode === "live" && config.apiKey !== null;
}
