/**
 * Extraction Orchestrator
 *
 * Idle → Requesting → {Success | Failure} → Idle
 *
 * Calls the note extractor once per normalize action, parses and validates
 * the text it returns, and converts every failure into a classified outcome.
 * Nothing thrown below this class reaches the caller. There is no automatic
 * retry: the user re-triggers normalize or switches to manual entry.
 */

import { checkCustomerConsistency, describeViolation } from "../derivation/consistency_gate.js";
import { deriveCustomerNarrative } from "../derivation/customer_narrative.js";
import { isPlainObject } from "../record/coerce.js";
import { parseJsonish, validate } from "../record/validator.js";
import {
  ExtractorError,
  ParseError,
  PreconditionError,
  SchemaError,
  errorMessage,
} from "../shared/errors.js";
import { logStep, warnStep } from "../shared/log.js";
import type { LLMCallMetadata, NoteExtractor } from "../generation/llm_client.js";
import type { StructuredRecord } from "../record/schema.js";

export type OrchestratorState = "idle" | "requesting" | "success" | "failure";

export type FailureKind =
  | "precondition"
  | "rate_limited"
  | "service_error"
  | "invalid_output"
  | "unexpected";

export interface ExtractionSuccess {
  status: "success";
  record: StructuredRecord;
  /** Extractor text as received, kept for diagnostic display. */
  rawPayload: string;
  /** True when the payload had no customer_report and it was derived locally. */
  customerDerived: boolean;
  warnings: string[];
  metadata?: LLMCallMetadata;
}

export interface ExtractionFailure {
  status: "failure";
  record: null;
  kind: FailureKind;
  message: string;
  rawPayload: string | null;
}

export type ExtractionOutcome = ExtractionSuccess | ExtractionFailure;

export const MESSAGES = {
  blankNotes: "Paste some notes first.",
  noExtractor: "AI not available. Set ANTHROPIC_API_KEY and run in live mode, or use the manual entry path.",
  rateLimited: "AI temporarily unavailable (rate limited). Use the manual entry path or retry later.",
  invalidOutput: "AI returned invalid output. Retry or use the manual entry path.",
} as const;

function classify(err: unknown): { kind: FailureKind; message: string } {
  if (err instanceof PreconditionError) {
    return { kind: "precondition", message: err.message };
  }
  if (err instanceof ExtractorError) {
    switch (err.kind) {
      case "rate_limit":
        return { kind: "rate_limited", message: MESSAGES.rateLimited };
      case "timeout":
      case "service":
        return { kind: "service_error", message: `AI service error: ${err.message}` };
      case "malformed_output":
        return { kind: "invalid_output", message: MESSAGES.invalidOutput };
    }
  }
  if (err instanceof ParseError || err instanceof SchemaError) {
    return { kind: "invalid_output", message: MESSAGES.invalidOutput };
  }
  return {
    kind: "unexpected",
    message: `Unexpected error during normalization: ${errorMessage(err)}`,
  };
}

export class ExtractionOrchestrator {
  private extractor: NoteExtractor | null;
  private _state: OrchestratorState = "idle";
  private _lastOutcome: ExtractionOutcome | null = null;

  constructor(extractor: NoteExtractor | null) {
    this.extractor = extractor;
  }

  get state(): OrchestratorState {
    return this._state;
  }

  get lastOutcome(): ExtractionOutcome | null {
    return this._lastOutcome;
  }

  get available(): boolean {
    return this.extractor !== null;
  }

  async normalize(notes: string): Promise<ExtractionOutcome> {
    let outcome: ExtractionOutcome;
    let rawPayload: string | null = null;

    try {
      const extractor = this.checkPreconditions(notes);
      this.transition("requesting");

      const response = await extractor(notes);
      rawPayload = response.text;
      outcome = this.buildSuccess(response.text, response.metadata);
      this.transition("success");
    } catch (err) {
      const { kind, message } = classify(err);
      outcome = { status: "failure", record: null, kind, message, rawPayload };
      if (kind !== "precondition") this.transition("failure");
      warnStep("EXTRACT", `${kind}: ${errorMessage(err)}`);
    }

    this._lastOutcome = outcome;
    this.transition("idle");
    return outcome;
  }

  private checkPreconditions(notes: string): NoteExtractor {
    if (!notes.trim()) throw new PreconditionError(MESSAGES.blankNotes);
    if (!this.extractor) throw new PreconditionError(MESSAGES.noExtractor);
    return this.extractor;
  }

  private buildSuccess(text: string, metadata?: LLMCallMetadata): ExtractionSuccess {
    const parsed = parseJsonish(text);
    const validated = validate(parsed);

    const customerDerived = !(isPlainObject(parsed) && isPlainObject(parsed.customer_report));
    const record: StructuredRecord = customerDerived
      ? { ...validated, customer_report: deriveCustomerNarrative(validated.internal_report) }
      : validated;

    const warnings = customerDerived
      ? []
      : checkCustomerConsistency(record).violations.map(describeViolation);

    return { status: "success", record, rawPayload: text, customerDerived, warnings, metadata };
  }

  private transition(to: OrchestratorState): void {
    if (this._state === to) return;
    logStep("EXTRACT", `${this._state} → ${to}`);
    this._state = to;
  }
}
