/**
 * ReportSession
 *
 * Session-scoped state: the current record and the last raw extractor
 * payload. Records are only ever swapped whole (replace) or dropped (clear);
 * the stored copy is frozen so nothing can edit it field by field.
 */

import { v4 as uuidv4 } from "uuid";
import { contentHash } from "../shared/hash.js";
import { DecisionTraceRecorder } from "../trace/decision_trace.js";
import type { StructuredRecord } from "../record/schema.js";

export type RecordOrigin = "extraction" | "manual";

export interface SessionSnapshot {
  sessionId: string;
  record: StructuredRecord | null;
  origin: RecordOrigin | null;
  rawPayload: string | null;
  recordHash: string | null;
  updatedAt: string | null;
  lastFailure: string | null;
}

interface CurrentRecord {
  record: StructuredRecord;
  origin: RecordOrigin;
  hash: string;
  updatedAt: Date;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object") {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

export class ReportSession {
  readonly id: string;
  readonly trace: DecisionTraceRecorder;
  private current: CurrentRecord | null = null;
  private lastRawPayload: string | null = null;
  private lastFailure: string | null = null;

  constructor(id: string = uuidv4()) {
    this.id = id;
    this.trace = new DecisionTraceRecorder(id);
  }

  get record(): StructuredRecord | null {
    return this.current?.record ?? null;
  }

  get origin(): RecordOrigin | null {
    return this.current?.origin ?? null;
  }

  get rawPayload(): string | null {
    return this.lastRawPayload;
  }

  /** Swap in a new record. The previous record is discarded, not merged. */
  replace(record: StructuredRecord, origin: RecordOrigin, rawPayload: string | null = null): void {
    const frozen = deepFreeze(structuredClone(record));
    this.current = { record: frozen, origin, hash: contentHash(frozen), updatedAt: new Date() };
    this.lastRawPayload = rawPayload;
    this.lastFailure = null;
  }

  /**
   * Remember a failed normalize attempt. The current record is kept; the raw
   * payload (if the extractor returned one) is kept for diagnostics.
   */
  noteFailure(message: string, rawPayload: string | null): void {
    this.lastFailure = message;
    this.lastRawPayload = rawPayload;
  }

  clear(): void {
    this.current = null;
    this.lastRawPayload = null;
    this.lastFailure = null;
  }

  snapshot(): SessionSnapshot {
    return {
      sessionId: this.id,
      record: this.record,
      origin: this.origin,
      rawPayload: this.lastRawPayload,
      recordHash: this.current?.hash ?? null,
      updatedAt: this.current?.updatedAt.toISOString() ?? null,
      lastFailure: this.lastFailure,
    };
  }
}

export const DEFAULT_SESSION_TTL_MS = 2 * 60 * 60 * 1000;
export const DEFAULT_MAX_SESSIONS = 1000;

export interface SessionRegistryOptions {
  /** Sessions untouched for this long are dropped. */
  idleTtlMs?: number;
  /** Oldest-touched sessions are dropped past this count. */
  maxSessions?: number;
  clock?: () => number;
}

/**
 * In-memory sessions for the HTTP surface. Nothing is written to disk.
 * Expired sessions are swept on every create and lookup, so no timer keeps
 * the process alive.
 */
export class SessionRegistry {
  private sessions = new Map<string, { session: ReportSession; touchedAt: number }>();
  private readonly idleTtlMs: number;
  private readonly maxSessions: number;
  private readonly clock: () => number;

  constructor(options: SessionRegistryOptions = {}) {
    this.idleTtlMs = options.idleTtlMs ?? DEFAULT_SESSION_TTL_MS;
    this.maxSessions = options.maxSessions ?? DEFAULT_MAX_SESSIONS;
    this.clock = options.clock ?? Date.now;
  }

  create(): ReportSession {
    const now = this.clock();
    this.sweep(now);
    const session = new ReportSession();
    this.sessions.set(session.id, { session, touchedAt: now });
    // Map order is touch order: the first key is the least recently used.
    while (this.sessions.size > this.maxSessions) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) break;
      this.sessions.delete(oldest.value);
    }
    return session;
  }

  get(id: string): ReportSession | undefined {
    const now = this.clock();
    this.sweep(now);
    const entry = this.sessions.get(id);
    if (!entry) return undefined;
    this.sessions.delete(id);
    this.sessions.set(id, { session: entry.session, touchedAt: now });
    return entry.session;
  }

  delete(id: string): boolean {
    return this.sessions.delete(id);
  }

  get size(): number {
    return this.sessions.size;
  }

  private sweep(now: number): void {
    for (const [id, entry] of this.sessions) {
      if (now - entry.touchedAt < this.idleTtlMs) break;
      this.sessions.delete(id);
    }
  }
}
