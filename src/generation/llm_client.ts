/**
 * LLM Client Module
 *
 * Wraps the Anthropic SDK behind the NoteExtractor contract used by the
 * extraction orchestrator. SDK failures are mapped onto ExtractorError kinds
 * so the orchestrator can classify them without knowing the provider.
 */

import Anthropic from "@anthropic-ai/sdk";
import { v4 as uuidv4 } from "uuid";
import { ExtractorError, errorMessage } from "../shared/errors.js";
import { NORMALIZE_SYSTEM_PROMPT } from "./prompts.js";
import type { RunConfig } from "../shared/run_config.js";

/** Structured metadata returned from every LLM call. */
export interface LLMCallMetadata {
  provider: string;
  model: string;
  correlationId: string;
  providerRequestId: string;
  inputTokens: number;
  outputTokens: number;
  latencyMs: number;
  costEstimate: number;
}

/** What a note extractor hands back: raw text, plus call metadata when known. */
export interface ExtractorResponse {
  text: string;
  metadata?: LLMCallMetadata;
}

/**
 * Turns raw notes into JSON-like text. Implementations signal failures with
 * ExtractorError (timeout, rate_limit, service, malformed_output).
 */
export type NoteExtractor = (notes: string) => Promise<ExtractorResponse>;

const INPUT_COST_PER_MTOK = 3;
const OUTPUT_COST_PER_MTOK = 15;

/** Map an SDK error onto the extractor failure taxonomy. */
export function toExtractorError(err: unknown): ExtractorError {
  if (err instanceof ExtractorError) return err;
  if (err instanceof Anthropic.RateLimitError) {
    return new ExtractorError("rate_limit", err.message);
  }
  if (err instanceof Anthropic.APIConnectionTimeoutError) {
    return new ExtractorError("timeout", err.message);
  }
  if (err instanceof Anthropic.APIError) {
    return new ExtractorError("service", err.message);
  }
  return new ExtractorError("service", errorMessage(err));
}

/**
 * Call the LLM with structured metadata tracking.
 */
export async function callLLM(
  client: Anthropic,
  params: {
    model: string;
    systemPrompt: string;
    userPrompt: string;
    maxTokens: number;
  },
): Promise<ExtractorResponse> {
  const correlationId = uuidv4();
  const t0 = Date.now();

  let response: Anthropic.Message;
  try {
    response = await client.messages.create({
      model: params.model,
      max_tokens: params.maxTokens,
      temperature: 0.2,
      system: params.systemPrompt,
      messages: [{ role: "user", content: params.userPrompt }],
    });
  } catch (err) {
    throw toExtractorError(err);
  }

  const latencyMs = Date.now() - t0;
  const textBlock = response.content.find(
    (block): block is Anthropic.TextBlock => block.type === "text",
  );
  const text = textBlock?.text ?? "";
  if (!text.trim()) {
    throw new ExtractorError("malformed_output", "Model returned no text content.");
  }

  const inputTokens = response.usage.input_tokens;
  const outputTokens = response.usage.output_tokens;
  const costEstimate =
    (inputTokens * INPUT_COST_PER_MTOK + outputTokens * OUTPUT_COST_PER_MTOK) / 1_000_000;

  return {
    text,
    metadata: {
      provider: "anthropic",
      model: params.model,
      correlationId,
      providerRequestId: response.id,
      inputTokens,
      outputTokens,
      latencyMs,
      costEstimate,
    },
  };
}

/**
 * Build the Anthropic-backed note extractor, or null when the run config
 * has no usable key (the orchestrator then rejects normalize requests).
 */
export function createAnthropicExtractor(config: RunConfig): NoteExtractor | null {
  if (!config.apiKey) return null;
  const client = new Anthropic({ apiKey: config.apiKey });

  return (notes: string) =>
    callLLM(client, {
      model: config.model,
      systemPrompt: NORMALIZE_SYSTEM_PROMPT,
      userPrompt: notes,
      maxTokens: config.maxTokens,
    });
}
