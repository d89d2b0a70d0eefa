import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config/env.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toMatchObject({
      corpusDir: "./data_cache",
      kInitial: 6,
      kExpand: 10,
      fallbackTextCount: 5,
      fallbackImageCount: 4,
      maxReferences: 8,
      openaiApiKey: null,
      embeddingProvider: "none",
      answerMode: "client_llm",
      transport: "stdio",
      logLevel: "info",
    });
  });

  it("enables OpenAI embeddings when a key is present", () => {
    const config = loadConfig({
      OPENAI_API_KEY: "test-secret",
      OPENAI_CHAT_MODEL: "openai/gpt-4o-mini",
    });
    expect(config.embeddingProvider).toBe("openai");
    expect(config.openaiChatModel).toBe("gpt-4o-mini");
  });

  it("requires a key for OpenAI answers", () => {
    expect(() => loadConfig({ ANSWER_MODE: "openai" })).toThrow(
      "OpenAI embeddings or answers require OPENAI_API_KEY.",
    );
  });

  it("rejects an expanded depth below the initial one", () => {
    expect(() => loadConfig({ RETRIEVAL_K_INITIAL: "12" })).toThrow(
      "RETRIEVAL_K_EXPAND must be >= RETRIEVAL_K_INITIAL.",
    );
  });
});
