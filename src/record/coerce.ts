/**
 * Field coercers. Each one is total: any input yields a value of the target type.
 */

import { NOT_SPECIFIED } from "../shared/types.js";

const TRUE_WORDS = new Set(["true", "yes", "y"]);

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Scalar → trimmed string, or null when there is nothing usable. */
function scalarText(value: unknown): string | null {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  if (typeof value === "boolean") return String(value);
  return null;
}

export function asText(value: unknown): string {
  if (Array.isArray(value)) {
    const parts = value.map(scalarText).filter((p): p is string => p !== null);
    return parts.length > 0 ? parts.join("; ") : NOT_SPECIFIED;
  }
  return scalarText(value) ?? NOT_SPECIFIED;
}

export function asList(value: unknown): string[] {
  if (value === null || value === undefined) return [];
  if (Array.isArray(value)) {
    return value.map(scalarText).filter((p): p is string => p !== null);
  }
  if (isPlainObject(value)) return [];
  const single = scalarText(value);
  return single === null ? [] : [single];
}

/** Only explicit affirmatives count; anything unrecognized is false. */
export function asBool(value: unknown): boolean {
  if (typeof value === "boolean") return value;
  if (typeof value === "string") return TRUE_WORDS.has(value.trim().toLowerCase());
  return false;
}

/** "very HIGH" → "Very High" */
export function titleCase(value: string): string {
  return value
    .toLowerCase()
    .replace(/(^|[^a-z])([a-z])/g, (_m, before: string, letter: string) => before + letter.toUpperCase());
}

/** Title-cases and matches against the allowed set; null when still invalid. */
export function asChoice<T extends string>(value: unknown, allowed: readonly T[]): T | null {
  if (typeof value !== "string") return null;
  const candidate = titleCase(value.trim());
  return allowed.find((option) => option === candidate) ?? null;
}
