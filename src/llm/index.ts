/**
 * Text generator factory
 */

import type { LlmSettings } from "../core/config.js";
import { AnthropicGenerator } from "./anthropic.js";
import { GeminiGenerator } from "./gemini.js";
import type { TextGenerator } from "./generator.js";
import { OpenAIGenerator } from "./openai.js";

/**
 * Generator for the configured provider, or null when none is configured
 */
export function createTextGenerator(settings: LlmSettings | null): TextGenerator | null {
  if (!settings) {
    return null;
  }

  const providerSettings = {
    apiKey: settings.apiKey,
    model: settings.model,
    timeoutMs: settings.timeoutMs,
  };

  switch (settings.provider) {
    case "anthropic":
      return new AnthropicGenerator(providerSettings);
    case "openai":
      return new OpenAIGenerator(providerSettings);
    case "gemini":
      return new GeminiGenerator(providerSettings);
  }
}

export type { GenerationRequest, TextGenerator } from "./generator.js";
export { Paraphraser, SYSTEM_PROMPT, acceptParaphrase, buildUserPrompt } from "./paraphraser.js";
