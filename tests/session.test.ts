import { describe, it, expect } from "vitest";
import { ReportSession, SessionRegistry } from "../src/session/report_session.js";
import { contentHash } from "../src/shared/hash.js";
import { PONDING_INTERNAL, makeDerivedRecord } from "./fixtures.js";

describe("ReportSession", () => {
  it("starts without a record", () => {
    const session = new ReportSession("session-1");
    expect(session.snapshot()).toEqual({
      sessionId: "session-1",
      record: null,
      origin: null,
      rawPayload: null,
      recordHash: null,
      updatedAt: null,
      lastFailure: null,
    });
  });

  it("stores a frozen copy on replace", () => {
    const session = new ReportSession();
    const record = makeDerivedRecord(PONDING_INTERNAL);
    session.replace(record, "extraction", '{"internal_report":{}}');

    const stored = session.record;
    expect(stored).toEqual(record);
    expect(stored).not.toBe(record);
    expect(Object.isFrozen(stored)).toBe(true);
    expect(() => stored?.internal_report.observations.push("edited")).toThrow(TypeError);
    expect(session.origin).toBe("extraction");
    expect(session.rawPayload).toBe('{"internal_report":{}}');
    expect(session.snapshot().recordHash).toBe(contentHash(record));
  });

  it("swaps the whole record on a second replace", () => {
    const session = new ReportSession();
    session.replace(makeDerivedRecord(PONDING_INTERNAL), "extraction", "raw");
    const manual = makeDerivedRecord({ primary_issue: "Debris" });
    session.replace(manual, "manual");

    expect(session.record).toEqual(manual);
    expect(session.origin).toBe("manual");
    expect(session.rawPayload).toBeNull();
  });

  it("keeps the record when a normalize attempt fails", () => {
    const session = new ReportSession();
    const record = makeDerivedRecord(PONDING_INTERNAL);
    session.replace(record, "manual");
    session.noteFailure("AI returned invalid output.", "not json");

    expect(session.record).toEqual(record);
    expect(session.snapshot().lastFailure).toBe("AI returned invalid output.");
    expect(session.rawPayload).toBe("not json");

    session.replace(record, "manual");
    expect(session.snapshot().lastFailure).toBeNull();
  });

  it("discards everything on clear", () => {
    const session = new ReportSession();
    session.replace(makeDerivedRecord(PONDING_INTERNAL), "extraction", "raw");
    session.clear();
    expect(session.record).toBeNull();
    expect(session.origin).toBeNull();
    expect(session.rawPayload).toBeNull();
  });
});

describe("SessionRegistry", () => {
  it("creates, finds and deletes sessions", () => {
    const registry = new SessionRegistry();
    const session = registry.create();
    expect(registry.get(session.id)).toBe(session);
    expect(registry.size).toBe(1);

    expect(registry.delete(session.id)).toBe(true);
    expect(registry.get(session.id)).toBeUndefined();
    expect(registry.delete(session.id)).toBe(false);
    expect(registry.size).toBe(0);
  });

  it("drops sessions left idle past the TTL", () => {
    let now = 0;
    const registry = new SessionRegistry({ idleTtlMs: 1000, clock: () => now });
    const idle = registry.create();
    now = 500;
    const active = registry.create();

    now = 1200;
    expect(registry.get(active.id)).toBe(active);
    expect(registry.get(idle.id)).toBeUndefined();
    expect(registry.size).toBe(1);

    now = 2100;
    expect(registry.get(active.id)).toBe(active);
    now = 3200;
    expect(registry.get(active.id)).toBeUndefined();
    expect(registry.size).toBe(0);
  });

  it("evicts the least recently used session past the cap", () => {
    let now = 0;
    const registry = new SessionRegistry({ maxSessions: 2, clock: () => now });
    const first = registry.create();
    now = 1;
    const second = registry.create();
    now = 2;
    registry.get(first.id);
    now = 3;
    const third = registry.create();

    expect(registry.size).toBe(2);
    expect(registry.get(second.id)).toBeUndefined();
    expect(registry.get(first.id)).toBe(first);
    expect(registry.get(third.id)).toBe(third);
  });
});
