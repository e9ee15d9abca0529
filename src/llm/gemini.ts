import { GoogleGenAI } from "@google/genai";
import { logger } from "../core/logger.js";
import type { ProviderSettings } from "./anthropic.js";
import { statusOf, toGenerationError, type GenerationRequest, type TextGenerator } from "./generator.js";

/**
 * Tried in order after the configured model, when a model is missing,
 * rate-limited or overloaded
 */
export const GEMINI_FALLBACK_MODELS = ["gemini-2.5-flash-lite", "gemini-2.0-flash", "gemini-1.5-flash"];

/**
 * Errors worth retrying on another model rather than giving up
 */
export function isModelUnavailable(error: unknown): boolean {
  const status = statusOf(error);
  if (status === 404 || status === 429 || status === 503) {
    return true;
  }
  const message = error instanceof Error ? error.message.toLowerCase() : String(error).toLowerCase();
  return ["404", "not found", "429", "resource_exhausted", "503", "unavailable", "overloaded"].some((marker) =>
    message.includes(marker)
  );
}

export class GeminiGenerator implements TextGenerator {
  readonly provider = "gemini";
  readonly model: string;
  private client: GoogleGenAI;
  private candidates: string[];
  private log = logger.child({ component: "llm", provider: "gemini" });

  constructor(settings: ProviderSettings) {
    this.model = settings.model;
    this.client = new GoogleGenAI({
      apiKey: settings.apiKey,
      httpOptions: { timeout: settings.timeoutMs },
    });
    this.candidates = [settings.model, ...GEMINI_FALLBACK_MODELS.filter((m) => m !== settings.model)];
  }

  async generate(request: GenerationRequest): Promise<string | null> {
    let lastError: unknown;

    for (const model of this.candidates) {
      if (request.signal?.aborted) break;
      try {
        const response = await this.client.models.generateContent({
          model,
          contents: request.userPrompt,
          config: {
            systemInstruction: request.systemPrompt,
            temperature: request.temperature,
            maxOutputTokens: request.maxTokens,
            abortSignal: request.signal,
          },
        });
        return response.text?.trim() || null;
      } catch (error) {
        lastError = error;
        if (!isModelUnavailable(error)) break;
        this.log.warn("Gemini model unavailable, trying next candidate", { model });
      }
    }

    throw toGenerationError(lastError ?? new Error("request aborted"), this.provider, this.model);
  }
}
