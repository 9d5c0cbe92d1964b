/**
 * Record Validator — repairs untrusted extractor output into a StructuredRecord.
 *
 * `validate` is total for any object input: every field is coerced from the
 * descriptor table in schema.ts, so unknown keys are ignored and invalid
 * values fall back to their defaults. Only a non-object top level is rejected.
 */

import { ParseError, SchemaError } from "../shared/errors.js";
import { asBool, asChoice, asList, asText, isPlainObject } from "./coerce.js";
import {
  CUSTOMER_REPORT_FIELDS,
  INTERNAL_REPORT_FIELDS,
  RECORD_FIELDS,
  StructuredRecordSchema,
} from "./schema.js";
import type { FieldDescriptor, StructuredRecord } from "./schema.js";

function readField(section: Record<string, unknown>, field: FieldDescriptor): unknown {
  const direct = section[field.key];
  if (direct !== undefined && direct !== null) return direct;
  for (const alias of field.aliases ?? []) {
    const aliased = section[alias];
    if (aliased !== undefined && aliased !== null) return aliased;
  }
  return direct;
}

function coerceField(
  raw: unknown,
  field: FieldDescriptor,
  inherited: Record<string, unknown>,
): unknown {
  switch (field.kind) {
    case "text":
      return asText(raw);
    case "list":
      return asList(raw);
    case "flag":
      return asBool(raw);
    case "choice": {
      const chosen = asChoice(raw, field.allowed);
      if (chosen !== null) return chosen;
      if (field.inheritFrom) {
        const fromInternal = asChoice(inherited[field.inheritFrom], field.allowed);
        if (fromInternal !== null) return fromInternal;
      }
      return field.fallback;
    }
  }
}

function coerceSection(
  section: Record<string, unknown>,
  fields: readonly FieldDescriptor[],
  inherited: Record<string, unknown> = {},
): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const field of fields) {
    out[field.key] = coerceField(readField(section, field), field, inherited);
  }
  return out;
}

function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

/**
 * Normalize an arbitrary value into a StructuredRecord.
 *
 * Accepts the dual-report shape, and the flat single-report shape when
 * `internal_report` is absent.
 *
 * @throws SchemaError when `input` is not a plain object
 */
export function validate(input: unknown): StructuredRecord {
  if (!isPlainObject(input)) {
    throw new SchemaError(`Expected a JSON object at the top level, got ${describeValue(input)}.`);
  }

  let internalSource: Record<string, unknown>;
  if (isPlainObject(input.internal_report)) {
    internalSource = input.internal_report;
  } else if ("internal_report" in input) {
    internalSource = {};
  } else {
    internalSource = input;
  }
  const customerSource = isPlainObject(input.customer_report) ? input.customer_report : {};

  const internal = coerceSection(internalSource, INTERNAL_REPORT_FIELDS);
  const customer = coerceSection(customerSource, CUSTOMER_REPORT_FIELDS, internal);
  const top = coerceSection(input, RECORD_FIELDS);

  return StructuredRecordSchema.parse({
    internal_report: internal,
    customer_report: customer,
    clarifying_questions: top.clarifying_questions,
  });
}

/**
 * Parse extractor text as JSON, salvaging the span between the first "{"
 * and the last "}" when the text carries chatter around the object.
 *
 * @throws ParseError when neither attempt yields JSON
 */
export function parseJsonish(text: string): unknown {
  const strict = tryParse(text);
  if (strict.ok) return strict.value;

  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end <= start) {
    throw new ParseError("Output contains no JSON object.");
  }

  const salvaged = tryParse(text.slice(start, end + 1));
  if (!salvaged.ok) {
    throw new ParseError(`Output is not valid JSON: ${salvaged.reason}`);
  }
  return salvaged.value;
}

type ParseAttempt = { ok: true; value: unknown } | { ok: false; reason: string };

function tryParse(text: string): ParseAttempt {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (err) {
    return { ok: false, reason: err instanceof Error ? err.message : String(err) };
  }
}

/** Canonical serialization; `validate(JSON.parse(serializeRecord(r)))` equals `r`. */
export function serializeRecord(record: StructuredRecord): string {
  return JSON.stringify(record, null, 2);
}
