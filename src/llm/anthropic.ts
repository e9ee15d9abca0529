import Anthropic from "@anthropic-ai/sdk";
import { toGenerationError, type GenerationRequest, type TextGenerator } from "./generator.js";

export interface ProviderSettings {
  apiKey: string;
  model: string;
  timeoutMs: number;
}

/**
 * Claude through the Messages API
 */
export class AnthropicGenerator implements TextGenerator {
  readonly provider = "anthropic";
  readonly model: string;
  private client: Anthropic;

  constructor(settings: ProviderSettings) {
    this.model = settings.model;
    this.client = new Anthropic({
      apiKey: settings.apiKey,
      timeout: settings.timeoutMs,
      maxRetries: 0,
    });
  }

  async generate(request: GenerationRequest): Promise<string | null> {
    try {
      const response = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: request.maxTokens,
          temperature: request.temperature,
          system: request.systemPrompt,
          messages: [{ role: "user", content: request.userPrompt }],
        },
        { signal: request.signal }
      );

      const text = response.content
        .flatMap((block) => (block.type === "text" ? [block.text] : []))
        .join("\n")
        .trim();
      return text || null;
    } catch (error) {
      throw toGenerationError(error, this.provider, this.model);
    }
  }
}
