import { describe, it, expect } from "vitest";
import { parseEnv } from "./env.js";

function makeValidEnv(overrides: Record<string, string | undefined> = {}): Record<string, string | undefined> {
  return {
    NODE_ENV: "test",
    PORT: "3000",
    LOG_LEVEL: "info",
    OPENAI_API_KEY: "test-openai-key",
    QDRANT_URL: "http://localhost:6333",
    ...overrides,
  };
}

describe("parseEnv", () => {
  it("parses valid env and applies defaults", () => {
    const config = parseEnv(makeValidEnv());

    expect(config.nodeEnv).toBe("test");
    expect(config.port).toBe(3000);
    expect(config.logLevel).toBe("info");
    expect(config.uploadDir).toBe("uploads");
    expect(config.embedding).toEqual({
      provider: "openai",
      model: "text-embedding-3-large",
      dimensions: 3072,
      batchSize: 64,
      apiKey: "test-openai-key",
    });
    expect(config.generation).toEqual({
      model: "gpt-4o-mini",
      maxTokens: 1024,
      temperature: 0.2,
      apiKey: "test-openai-key",
    });
    expect(config.chunking).toEqual({ strategy: "sentence", chunkSize: 1000, overlap: 200 });
    expect(config.vectorStore).toEqual({
      type: "qdrant",
      url: "http://localhost:6333",
      apiKey: undefined,
      collection: "documents",
    });
    expect(config.retrieval.topK).toBe(5);
    expect(config.database).toBeNull();
    expect(config.redis).toBeNull();
    expect(config.worker.concurrency).toBe(5);
  });

  it("uses cohere defaults and key when cohere embeds", () => {
    const config = parseEnv(
      makeValidEnv({ EMBEDDING_PROVIDER: "cohere", COHERE_API_KEY: "test-cohere-key" }),
    );

    expect(config.embedding.model).toBe("embed-v4.0");
    expect(config.embedding.dimensions).toBe(1024);
    expect(config.embedding.apiKey).toBe("test-cohere-key");
    expect(config.generation.apiKey).toBe("test-openai-key");
  });

  it("lets explicit model and dimensions override the provider defaults", () => {
    const config = parseEnv(
      makeValidEnv({ EMBEDDING_MODEL: "text-embedding-3-small", EMBEDDING_DIMENSIONS: "1536" }),
    );

    expect(config.embedding.model).toBe("text-embedding-3-small");
    expect(config.embedding.dimensions).toBe(1536);
  });

  it("builds database and redis settings when urls are present", () => {
    const config = parseEnv(
      makeValidEnv({
        DATABASE_URL: "postgresql://localhost:5432/test",
        REDIS_URL: "redis://localhost:6379",
      }),
    );

    expect(config.database).toEqual({ url: "postgresql://localhost:5432/test", poolMax: 10 });
    expect(config.redis).toEqual({ url: "redis://localhost:6379" });
  });

  it("rejects overlap that is not smaller than the chunk size", () => {
    expect(() => parseEnv(makeValidEnv({ CHUNK_SIZE: "200", CHUNK_OVERLAP: "200" }))).toThrow(
      /CHUNK_OVERLAP must be smaller than CHUNK_SIZE/,
    );
  });

  it("rejects a missing OpenAI key", () => {
    expect(() => parseEnv(makeValidEnv({ OPENAI_API_KEY: undefined }))).toThrow(
      /OPENAI_API_KEY is required/,
    );
  });

  it("rejects cohere embeddings without a cohere key", () => {
    expect(() => parseEnv(makeValidEnv({ EMBEDDING_PROVIDER: "cohere" }))).toThrow(
      /COHERE_API_KEY is required/,
    );
  });

  it("rejects invalid DATABASE_URL", () => {
    expect(() => parseEnv(makeValidEnv({ DATABASE_URL: "mysql://localhost" }))).toThrow();
  });

  it("rejects TOP_K outside 1..50", () => {
    expect(() => parseEnv(makeValidEnv({ TOP_K: "0" }))).toThrow();
    expect(() => parseEnv(makeValidEnv({ TOP_K: "51" }))).toThrow();
  });

  it("rejects invalid NODE_ENV", () => {
    expect(() => parseEnv(makeValidEnv({ NODE_ENV: "staging" }))).toThrow();
  });
});
