import { v4 as uuidv4 } from "uuid";
import { contentHash, merkleRoot } from "../shared/hash.js";
import type { TraceRecord, TraceType } from "../shared/types.js";

/**
 * Decision trace recorder: a hash-chained log of what each pipeline step
 * did with a session's record (which rules fired, which gate flagged what).
 */
export class DecisionTraceRecorder {
  private chain: TraceRecord[] = [];
  private sessionId: string;

  constructor(sessionId: string) {
    this.sessionId = sessionId;
  }

  /**
   * Record a new trace step. Automatically chains hashes.
   */
  record(params: {
    traceType: TraceType;
    initiatedAt: Date;
    completedAt: Date;
    inputHash?: string | null;
    steps?: Array<{ action: string; detail: string }>;
    outputContent?: Record<string, unknown>;
    validationResults?: TraceRecord["validationResults"];
  }): TraceRecord {
    const chainPosition = this.chain.length;
    const previousHash =
      chainPosition > 0 ? this.chain[chainPosition - 1].hashChain.contentHash : null;

    const recordContent = {
      traceId: uuidv4(),
      sessionId: this.sessionId,
      traceType: params.traceType,
      chainPosition,
      initiatedAt: params.initiatedAt.toISOString(),
      completedAt: params.completedAt.toISOString(),
      durationMs: params.completedAt.getTime() - params.initiatedAt.getTime(),
      inputHash: params.inputHash ?? null,
      reasoningChain: {
        steps: (params.steps ?? []).map((s, i) => ({ stepNumber: i + 1, ...s })),
      },
      outputContent: params.outputContent ?? {},
      validationResults: params.validationResults ?? { pass: true, messages: [] },
    };

    const cHash = contentHash(recordContent);
    const allHashes = [...this.chain.map((r) => r.hashChain.contentHash), cHash];

    const record: TraceRecord = {
      ...recordContent,
      hashChain: {
        contentHash: cHash,
        previousHash,
        merkleRoot: merkleRoot(allHashes),
      },
    };

    this.chain.push(record);
    return record;
  }

  /** Get the full chain. */
  getChain(): TraceRecord[] {
    return [...this.chain];
  }

  get length(): number {
    return this.chain.length;
  }

  /** Validate the chain integrity. */
  validateChain(): { valid: boolean; errors: string[] } {
    return validateTraceChain(this.chain);
  }
}

export function validateTraceChain(chain: readonly TraceRecord[]): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  for (let i = 0; i < chain.length; i++) {
    const record = chain[i];

    if (record.chainPosition !== i) {
      errors.push(`Trace ${i}: chain position mismatch (expected ${i}, got ${record.chainPosition})`);
    }
    if (i === 0 && record.hashChain.previousHash !== null) {
      errors.push(`Trace 0: previous hash should be null`);
    }
    if (i > 0 && record.hashChain.previousHash !== chain[i - 1].hashChain.contentHash) {
      errors.push(`Trace ${i}: previous hash does not match prior trace content hash`);
    }

    const { hashChain, ...contentWithoutHash } = record;
    if (hashChain.contentHash !== contentHash(contentWithoutHash)) {
      errors.push(`Trace ${i}: content hash mismatch`);
    }
  }

  return { valid: errors.length === 0, errors };
}

/** One JSON object per line. */
export function exportJSONL(chain: readonly TraceRecord[]): string {
  return chain.map((r) => JSON.stringify(r)).join("\n") + (chain.length > 0 ? "\n" : "");
}
