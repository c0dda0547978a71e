import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config/env.js";
import { createAiCapabilities } from "../src/infra/ai/defaultAiClient.js";
import { silentLogger } from "./helpers/fakes.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      store: "file",
      storageDir: ".data/knowledge-base",
      chunkSize: 600,
      chunkOverlap: 150,
      topK: 10,
      fallbackRatio: 0.5,
      semanticWeight: 0.5,
      lexicalWeight: 0.5,
      reranker: "none",
      historyTurns: 3,
      deleteGraceMs: 500,
      embeddingProvider: "none",
      answerMode: "client_llm",
      transport: "stdio",
      maxBodyBytes: 67108864,
      sessionIdleMs: 1800000,
      logLevel: "info",
    });
    expect(config.openaiApiKey).toBeNull();
  });

  it("coerces numeric strings", () => {
    const config = loadConfig({ RETRIEVAL_TOP_K: "25", FALLBACK_RATIO: "0.3", MCP_PORT: "8080" });

    expect(config.topK).toBe(25);
    expect(config.fallbackRatio).toBe(0.3);
    expect(config.port).toBe(8080);
  });

  it("turns on OpenAI embeddings when a key is present", () => {
    expect(loadConfig({ OPENAI_API_KEY: "test-secret" }).embeddingProvider).toBe("openai");
    expect(loadConfig({ OPENAI_API_KEY: "test-secret", EMBEDDING_PROVIDER: "none" }).embeddingProvider).toBe("none");
  });

  it("rejects inconsistent settings", () => {
    expect(() => loadConfig({ KB_STORE: "postgres" })).toThrow("KB_STORE=postgres requires DATABASE_URL.");
    expect(() => loadConfig({ CHUNK_SIZE: "100", CHUNK_OVERLAP: "100" })).toThrow(
      "CHUNK_OVERLAP must be smaller than CHUNK_SIZE.",
    );
    expect(() => loadConfig({ HYBRID_SEMANTIC_WEIGHT: "0", HYBRID_LEXICAL_WEIGHT: "0" })).toThrow(
      "HYBRID_SEMANTIC_WEIGHT and HYBRID_LEXICAL_WEIGHT cannot both be 0.",
    );
    expect(() => loadConfig({ ANSWER_MODE: "openai" })).toThrow(
      "OpenAI embeddings or answers require OPENAI_API_KEY.",
    );
    expect(() => loadConfig({ FALLBACK_RATIO: "0.9" })).toThrow();
  });
});

describe("createAiCapabilities", () => {
  it("leaves every model capability off in client_llm mode without keys", () => {
    const capabilities = createAiCapabilities(loadConfig({}), silentLogger);

    expect(capabilities).toEqual({
      answerMode: "client_llm",
      embedder: null,
      judge: null,
      answerGenerator: null,
      queryRewriter: null,
    });
  });

  it("enables the judge, answers and rewriting with a chat model", () => {
    const capabilities = createAiCapabilities(
      loadConfig({ ANSWER_MODE: "ollama", EMBEDDING_PROVIDER: "ollama" }),
      silentLogger,
    );

    expect(capabilities.answerMode).toBe("ollama");
    expect(capabilities.embedder).not.toBeNull();
    expect(capabilities.judge).not.toBeNull();
    expect(capabilities.answerGenerator).not.toBeNull();
    expect(capabilities.queryRewriter).not.toBeNull();
  });
});
