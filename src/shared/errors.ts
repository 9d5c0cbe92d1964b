/**
 * Error taxonomy for the notes pipeline.
 *
 * None of these escape the extraction orchestrator; they are converted into
 * a classified failure result there.
 */

/** Caller must supply usable notes and a configured extractor before retrying. */
export class PreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PreconditionError";
  }
}

/** Extractor output could not be recovered as a JSON object. */
export class ParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ParseError";
  }
}

/** Top-level input is not an object, so no record can be built from it. */
export class SchemaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SchemaError";
  }
}

export type ExtractorFailureKind = "timeout" | "rate_limit" | "service" | "malformed_output";

/** Failure raised by a note extractor implementation. */
export class ExtractorError extends Error {
  readonly kind: ExtractorFailureKind;

  constructor(kind: ExtractorFailureKind, message: string) {
    super(message);
    this.name = "ExtractorError";
    this.kind = kind;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
