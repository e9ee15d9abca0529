import OpenAI from "openai";
import type { ProviderSettings } from "./anthropic.js";
import { toGenerationError, type GenerationRequest, type TextGenerator } from "./generator.js";

/**
 * OpenAI chat completions
 */
export class OpenAIGenerator implements TextGenerator {
  readonly provider = "openai";
  readonly model: string;
  private client: OpenAI;

  constructor(settings: ProviderSettings) {
    this.model = settings.model;
    this.client = new OpenAI({
      apiKey: settings.apiKey,
      timeout: settings.timeoutMs,
      maxRetries: 0,
    });
  }

  async generate(request: GenerationRequest): Promise<string | null> {
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: "system", content: request.systemPrompt },
            { role: "user", content: request.userPrompt },
          ],
          max_tokens: request.maxTokens,
          temperature: request.temperature,
        },
        { signal: request.signal }
      );

      const content = response.choices[0]?.message?.content;
      return content?.trim() || null;
    } catch (error) {
      throw toGenerationError(error, this.provider, this.model);
    }
  }
}
