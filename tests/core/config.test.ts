import { describe, it, expect, afterEach } from "vitest";
import { getConfig, loadConfig, resetConfig } from "../../src/core/config.js";
import { ConfigError } from "../../src/core/errors.js";

describe("loadConfig", () => {
  afterEach(() => {
    resetConfig();
  });

  it("runs without any provider", () => {
    expect(loadConfig({})).toEqual({
      llm: null,
      defaults: { logLevel: "info", dataDir: "./data", period: "30 derniers jours" },
    });
  });

  it("picks the provider whose key is set", () => {
    expect(loadConfig({ ANTHROPIC_API_KEY: "test-secret" }).llm).toEqual({
      provider: "anthropic",
      apiKey: "test-secret",
      model: "claude-3-5-sonnet-latest",
      timeoutMs: 12000,
      maxTokens: 420,
      temperature: 0.1,
    });
  });

  it("prefers gemini when several keys are set", () => {
    const config = loadConfig({ GEMINI_API_KEY: "test-secret", OPENAI_API_KEY: "test-secret" });
    expect(config.llm?.provider).toBe("gemini");
    expect(config.llm?.model).toBe("gemini-2.5-flash-lite");
  });

  it("honours an explicit provider and model", () => {
    const config = loadConfig({
      LLM_PROVIDER: "openai",
      OPENAI_API_KEY: "test-secret",
      GEMINI_API_KEY: "test-secret",
      LLM_MODEL: "gpt-4o",
      LLM_TIMEOUT_SEC: "2.5",
    });
    expect(config.llm).toMatchObject({ provider: "openai", model: "gpt-4o", timeoutMs: 2500 });
  });

  it("ignores blank keys", () => {
    expect(loadConfig({ OPENAI_API_KEY: "   " }).llm).toBeNull();
  });

  it("turns generation off with LLM_PROVIDER=none", () => {
    expect(loadConfig({ LLM_PROVIDER: "none", OPENAI_API_KEY: "test-secret" }).llm).toBeNull();
  });

  it("rejects an explicit provider without its key", () => {
    expect(() => loadConfig({ LLM_PROVIDER: "openai", GEMINI_API_KEY: "test-secret" })).toThrow(
      "LLM_PROVIDER=openai requires OPENAI_API_KEY"
    );
  });

  it("lists invalid variables", () => {
    expect(() => loadConfig({ LLM_TIMEOUT_SEC: "0" })).toThrow(ConfigError);
    expect(() => loadConfig({ LLM_TIMEOUT_SEC: "0" })).toThrow("LLM_TIMEOUT_SEC: LLM_TIMEOUT_SEC must be > 0");
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow(ConfigError);
  });

  it("caches the process configuration until reset", () => {
    const first = getConfig();
    expect(getConfig()).toBe(first);
    resetConfig();
    expect(getConfig()).not.toBe(first);
  });
});
