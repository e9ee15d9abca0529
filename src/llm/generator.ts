/**
 * Text generation contract
 * Providers sit behind one interface so the engine never imports an SDK.
 */

import { GenerationError } from "../core/errors.js";

export interface GenerationRequest {
  systemPrompt: string;
  userPrompt: string;
  maxTokens: number;
  temperature: number;
  /** Aborted by the caller when its time budget runs out */
  signal?: AbortSignal;
}

export interface TextGenerator {
  readonly provider: string;
  readonly model: string;
  /**
   * Generated text, or null when the provider answered with nothing usable
   */
  generate(request: GenerationRequest): Promise<string | null>;
}

/**
 * HTTP status carried by SDK errors, when there is one
 */
export function statusOf(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return undefined;
}

export function toGenerationError(error: unknown, provider: string, model: string): GenerationError {
  if (error instanceof GenerationError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new GenerationError(`${provider} generation failed: ${message}`, provider, {
    cause: error,
    statusCode: statusOf(error),
    context: { model },
  });
}
