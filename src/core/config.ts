import { z } from "zod";
import "dotenv/config";
import { ConfigError } from "./errors.js";

/**
 * Configuration Management
 * Loads and validates all config from environment variables
 */

const optionalKey = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const envSchema = z.object({
  // Text generation (all optional: the engine answers without a provider)
  LLM_PROVIDER: z.enum(["gemini", "anthropic", "openai", "none"]).optional(),
  GEMINI_API_KEY: optionalKey,
  ANTHROPIC_API_KEY: optionalKey,
  OPENAI_API_KEY: optionalKey,
  LLM_MODEL: optionalKey,
  LLM_TIMEOUT_SEC: z.coerce.number().positive("LLM_TIMEOUT_SEC must be > 0").default(12),

  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  DATA_DIR: z.string().default("./data"),
  DEFAULT_PERIOD: z.string().min(1).default("30 derniers jours"),
});

export type Env = z.infer<typeof envSchema>;

export type LlmProvider = "gemini" | "anthropic" | "openai";

export interface LlmSettings {
  provider: LlmProvider;
  apiKey: string;
  model: string;
  timeoutMs: number;
  maxTokens: number;
  temperature: number;
}

export interface Config {
  /** null when no provider is configured */
  llm: LlmSettings | null;

  defaults: {
    logLevel: "debug" | "info" | "warn" | "error";
    dataDir: string;
    period: string;
  };
}

export const DEFAULT_MODELS: Record<LlmProvider, string> = {
  gemini: "gemini-2.5-flash-lite",
  anthropic: "claude-3-5-sonnet-latest",
  openai: "gpt-4o-mini",
};

const KEY_BY_PROVIDER: Record<LlmProvider, keyof Env> = {
  gemini: "GEMINI_API_KEY",
  anthropic: "ANTHROPIC_API_KEY",
  openai: "OPENAI_API_KEY",
};

// Paraphrase budget: short, near-deterministic answers
const PARAPHRASE_MAX_TOKENS = 420;
const PARAPHRASE_TEMPERATURE = 0.1;

function resolveLlm(env: Env): LlmSettings | null {
  if (env.LLM_PROVIDER === "none") {
    return null;
  }

  const keys: Record<LlmProvider, string | undefined> = {
    gemini: env.GEMINI_API_KEY,
    anthropic: env.ANTHROPIC_API_KEY,
    openai: env.OPENAI_API_KEY,
  };

  let provider: LlmProvider | undefined = env.LLM_PROVIDER;
  if (!provider) {
    // First configured key wins
    provider = (["gemini", "anthropic", "openai"] as const).find((p) => keys[p]);
    if (!provider) {
      return null;
    }
  }

  const apiKey = keys[provider];
  if (!apiKey) {
    throw new ConfigError(`LLM_PROVIDER=${provider} requires ${KEY_BY_PROVIDER[provider]}`, {
      provider,
    });
  }

  return {
    provider,
    apiKey,
    model: env.LLM_MODEL ?? DEFAULT_MODELS[provider],
    timeoutMs: Math.round(env.LLM_TIMEOUT_SEC * 1000),
    maxTokens: PARAPHRASE_MAX_TOKENS,
    temperature: PARAPHRASE_TEMPERATURE,
  };
}

/**
 * Validate an environment map and build the config object
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  const parseResult = envSchema.safeParse(source);

  if (!parseResult.success) {
    const errors = parseResult.error.issues
      .map((e) => `  - ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new ConfigError(`Configuration validation failed:\n${errors}`);
  }

  const env = parseResult.data;

  return {
    llm: resolveLlm(env),
    defaults: {
      logLevel: env.LOG_LEVEL,
      dataDir: env.DATA_DIR,
      period: env.DEFAULT_PERIOD,
    },
  };
}

let configInstance: Config | null = null;

/**
 * Get configuration (lazy-loaded singleton)
 */
export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset config (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
