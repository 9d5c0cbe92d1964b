import { describe, it, expect } from "vitest";
import { asBool, asChoice, asList, asText, titleCase } from "../src/record/coerce.js";
import { parseJsonish, serializeRecord, validate } from "../src/record/validator.js";
import { ParseError, SchemaError } from "../src/shared/errors.js";
import { NOT_SPECIFIED, SEVERITIES, URGENCIES } from "../src/shared/types.js";
import { PONDING_INTERNAL, makeRecord } from "./fixtures.js";

describe("field coercers", () => {
  it("asText joins sequences and drops unusable parts", () => {
    expect(asText([" a ", 3, null, { x: 1 }])).toBe("a; 3");
    expect(asText({ nested: "value" })).toBe(NOT_SPECIFIED);
    expect(asText("   ")).toBe(NOT_SPECIFIED);
    expect(asText(true)).toBe("true");
    expect(asText(undefined)).toBe(NOT_SPECIFIED);
  });

  it("asList wraps scalars and drops objects and nulls", () => {
    expect(asList("single")).toEqual(["single"]);
    expect(asList({ a: 1 })).toEqual([]);
    expect(asList([1, " x ", null, {}, true, ""])).toEqual(["1", "x", "true"]);
    expect(asList(undefined)).toEqual([]);
  });

  it.each([
    [true, true],
    ["true", true],
    ["YES", true],
    [" y ", true],
    [false, false],
    ["no", false],
    ["1", false],
    [1, false],
    ["on", false],
    [null, false],
    [undefined, false],
  ])("asBool(%j) is %s", (input, expected) => {
    expect(asBool(input)).toBe(expected);
  });

  it("title-cases enum candidates", () => {
    expect(titleCase("very HIGH")).toBe("Very High");
    expect(asChoice("high", SEVERITIES)).toBe("High");
    expect(asChoice(" IMMEDIATE ", URGENCIES)).toBe("Immediate");
    expect(asChoice("urgent", URGENCIES)).toBeNull();
    expect(asChoice(3, URGENCIES)).toBeNull();
  });
});

describe("validate", () => {
  it("fills every field of an empty object with its default", () => {
    expect(validate({})).toEqual({
      internal_report: {
        service_summary: NOT_SPECIFIED,
        roof_system: NOT_SPECIFIED,
        primary_issue: NOT_SPECIFIED,
        location: NOT_SPECIFIED,
        active_leak_reported: false,
        observations: [],
        installation_site_conditions: [],
        potential_concerns: [],
        recommended_next_steps: [],
        severity: "Moderate",
        urgency: "Soon",
      },
      customer_report: {
        what_we_found: NOT_SPECIFIED,
        why_this_matters: NOT_SPECIFIED,
        what_this_could_lead_to: [],
        recommended_next_steps: [],
        priority: "Soon",
      },
      clarifying_questions: [],
    });
  });

  it("rejects non-object top levels", () => {
    expect(() => validate(null)).toThrow(SchemaError);
    expect(() => validate([1, 2])).toThrow("Expected a JSON object at the top level, got array.");
    expect(() => validate("text")).toThrow("Expected a JSON object at the top level, got string.");
  });

  it("coerces enum casing and falls back for unknown values", () => {
    const record = makeRecord({ severity: "high", urgency: "IMMEDIATE" });
    expect(record.internal_report.severity).toBe("High");
    expect(record.internal_report.urgency).toBe("Immediate");

    const fallback = makeRecord({ severity: "critical", urgency: "asap" });
    expect(fallback.internal_report.severity).toBe("Moderate");
    expect(fallback.internal_report.urgency).toBe("Soon");
  });

  it("inherits customer priority from urgency when missing or invalid", () => {
    expect(makeRecord({ urgency: "immediate" }).customer_report.priority).toBe("Immediate");
    expect(makeRecord({ urgency: "immediate" }, { customer: { priority: "whenever" } }).customer_report.priority).toBe(
      "Immediate",
    );
    expect(makeRecord({ urgency: "immediate" }, { customer: { priority: "routine" } }).customer_report.priority).toBe(
      "Routine",
    );
  });

  it("ignores unknown keys", () => {
    const record = validate({ internal_report: { service_summary: "Checked roof", crew_size: 3 }, extra: true });
    expect(Object.keys(record)).toEqual(["internal_report", "customer_report", "clarifying_questions"]);
    expect(record.internal_report).not.toHaveProperty("crew_size");
    expect(record.internal_report.service_summary).toBe("Checked roof");
  });

  it("treats a non-object internal_report as empty", () => {
    const record = validate({ internal_report: "oops", primary_issue: "Ponding" });
    expect(record.internal_report.primary_issue).toBe(NOT_SPECIFIED);
  });

  it("reads the flat single-report payload through legacy aliases", () => {
    const record = validate({
      job_summary: "Checked roof after storm",
      primary_issue: "Ponding",
      constraints_or_unknowns: ["No roof access after 5pm"],
      active_leak_reported: "yes",
      clarifying_questions: "Was the drain cleared?",
    });
    expect(record.internal_report.service_summary).toBe("Checked roof after storm");
    expect(record.internal_report.primary_issue).toBe("Ponding");
    expect(record.internal_report.installation_site_conditions).toEqual(["No roof access after 5pm"]);
    expect(record.internal_report.active_leak_reported).toBe(true);
    expect(record.clarifying_questions).toEqual(["Was the drain cleared?"]);
  });

  it("prefers the current key over its alias", () => {
    const record = makeRecord({ service_summary: "Current", job_summary: "Legacy" });
    expect(record.internal_report.service_summary).toBe("Current");
  });

  it("is idempotent", () => {
    const once = makeRecord(PONDING_INTERNAL, { clarifying: ["Is the strainer intact?"] });
    expect(validate(once)).toEqual(once);
  });

  it("round-trips through its canonical serialization", () => {
    const record = makeRecord(PONDING_INTERNAL, { customer: { what_we_found: "Ponding at the drain." } });
    expect(validate(JSON.parse(serializeRecord(record)))).toEqual(record);
  });
});

describe("parseJsonish", () => {
  it("parses clean JSON", () => {
    expect(parseJsonish('{"a":1}')).toEqual({ a: 1 });
  });

  it("salvages an object wrapped in chatter", () => {
    const text = 'Here is the record:\n```json\n{"internal_report": {"severity": "High"}}\n```\nLet me know!';
    expect(parseJsonish(text)).toEqual({ internal_report: { severity: "High" } });
  });

  it("returns non-object JSON as parsed", () => {
    expect(parseJsonish("[1,2]")).toEqual([1, 2]);
  });

  it("fails when there is no object span", () => {
    expect(() => parseJsonish("I could not read these notes.")).toThrow(ParseError);
    expect(() => parseJsonish("{broken")).toThrow("Output contains no JSON object.");
  });

  it("fails when the salvaged span is not JSON", () => {
    expect(() => parseJsonish("result: { not: valid }")).toThrow(/^Output is not valid JSON: /);
  });
});
