import { describe, it, expect, vi } from "vitest";
import { EmbeddingError, SchemaMismatchError } from "@groundwork/errors";
import type { EmbeddingResult } from "@groundwork/types";
import { createEmbeddingProvider } from "./factory.js";
import { EmbeddingClient } from "./embedding-client.js";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const FAST_RETRY = { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 2 };

/** Encodes each text as [length, first char code, 1]. */
class StubProvider implements IEmbeddingProvider {
  readonly name = "stub";
  readonly model = "stub-model";
  readonly dimensions = 3;
  readonly calls: string[][] = [];
  failuresLeft = 0;
  width = 3;
  dropLast = false;

  constructor(readonly maxBatchSize = 100) {}

  async embedQuery(text: string): Promise<number[]> {
    const result = await this.embedDocuments([text]);
    return result.embeddings[0] ?? [];
  }

  async embedDocuments(texts: string[]): Promise<EmbeddingResult> {
    this.calls.push(texts);
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw new Error("503 upstream unavailable");
    }
    const embeddings = texts.map((t) =>
      [t.length, t.charCodeAt(0), 1, 0].slice(0, this.width),
    );
    if (this.dropLast) embeddings.pop();
    return { embeddings, model: this.model, tokensUsed: texts.length, dimensions: this.dimensions };
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }
}

describe("createEmbeddingProvider factory", () => {
  it("creates the OpenAI provider with its defaults", () => {
    const provider = createEmbeddingProvider({ provider: "openai", apiKey: "test-key" });
    expect(provider.name).toBe("openai");
    expect(provider.model).toBe("text-embedding-3-large");
    expect(provider.dimensions).toBe(3072);
    expect(provider.maxBatchSize).toBe(2048);
  });

  it("creates the Cohere provider with its defaults", () => {
    const provider = createEmbeddingProvider({ provider: "cohere", apiKey: "test-key" });
    expect(provider.name).toBe("cohere");
    expect(provider.model).toBe("embed-v4.0");
    expect(provider.dimensions).toBe(1024);
    expect(provider.maxBatchSize).toBe(96);
  });

  it("respects a configured model and dimensions", () => {
    const provider = createEmbeddingProvider({
      provider: "openai",
      apiKey: "test-key",
      model: "text-embedding-3-small",
      dimensions: 256,
    });
    expect(provider.model).toBe("text-embedding-3-small");
    expect(provider.dimensions).toBe(256);
  });

  it("throws when the API key is missing", () => {
    expect(() => createEmbeddingProvider({ provider: "cohere", apiKey: "" })).toThrow(
      "API key is required for embedding provider 'cohere'",
    );
  });

  it("throws for unknown provider", () => {
    expect(() =>
      createEmbeddingProvider({ provider: "unknown" as "cohere", apiKey: "test-key" }),
    ).toThrow("Unknown embedding provider");
  });
});

describe("EmbeddingClient", () => {
  it("returns one vector per input, in input order", async () => {
    const client = new EmbeddingClient(new StubProvider(), { batchSize: 2, retry: FAST_RETRY });

    const vectors = await client.embed(["a", "bb", "ccc"]);

    expect(vectors).toEqual([
      [1, 97, 1],
      [2, 98, 1],
      [3, 99, 1],
    ]);
  });

  it("caps the batch size at the provider limit", async () => {
    const provider = new StubProvider(2);
    const client = new EmbeddingClient(provider, { batchSize: 10, retry: FAST_RETRY });

    await client.embed(["a", "b", "c", "d", "e"]);

    expect(client.batchSize).toBe(2);
    expect(provider.calls).toEqual([["a", "b"], ["c", "d"], ["e"]]);
  });

  it("reports each batch with its offset", async () => {
    const client = new EmbeddingClient(new StubProvider(), { batchSize: 2, retry: FAST_RETRY });
    const onBatch = vi.fn();

    await client.embed(["a", "b", "c"], { onBatch });

    expect(onBatch).toHaveBeenCalledTimes(2);
    expect(onBatch).toHaveBeenNthCalledWith(1, 0, [
      [1, 97, 1],
      [1, 98, 1],
    ]);
    expect(onBatch).toHaveBeenNthCalledWith(2, 2, [[1, 99, 1]]);
  });

  it("does not call the provider for an empty input", async () => {
    const provider = new StubProvider();
    const client = new EmbeddingClient(provider);

    expect(await client.embed([])).toEqual([]);
    expect(provider.calls).toEqual([]);
  });

  it("retries a transient failure and succeeds", async () => {
    const provider = new StubProvider();
    provider.failuresLeft = 2;
    const onRetry = vi.fn();
    const client = new EmbeddingClient(provider, { retry: FAST_RETRY, onRetry });

    const vectors = await client.embed(["hello"]);

    expect(vectors).toEqual([[5, 104, 1]]);
    expect(provider.calls).toHaveLength(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry.mock.calls[0]?.[0]).toMatchObject({ attempt: 1, offset: 0 });
  });

  it("retries only the failing batch", async () => {
    const provider = new StubProvider();
    const client = new EmbeddingClient(provider, { batchSize: 1, retry: FAST_RETRY });
    const onBatch = vi.fn(() => {
      // the second batch fails once
      if (onBatch.mock.calls.length === 1) provider.failuresLeft = 1;
    });

    await client.embed(["a", "b"], { onBatch });

    expect(provider.calls).toEqual([["a"], ["b"], ["b"]]);
  });

  it("raises EmbeddingError once retries are exhausted", async () => {
    const provider = new StubProvider();
    provider.failuresLeft = 10;
    const client = new EmbeddingClient(provider, { batchSize: 2, retry: FAST_RETRY });

    const error = await client.embed(["a", "b", "c"]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EmbeddingError);
    expect(error).toMatchObject({
      code: "EMBEDDING_FAILED",
      service: "stub",
      details: { offset: 0, size: 2 },
    });
    expect(provider.calls).toHaveLength(3);
  });

  it("raises SchemaMismatchError without retrying on a wrong dimension", async () => {
    const provider = new StubProvider();
    provider.width = 4;
    const client = new EmbeddingClient(provider, { retry: FAST_RETRY });

    const error = await client.embed(["a"]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SchemaMismatchError);
    expect(error).toMatchObject({ expected: 3, actual: 4 });
    expect(provider.calls).toHaveLength(1);
  });

  it("raises SchemaMismatchError on a wrong vector count", async () => {
    const provider = new StubProvider();
    provider.dropLast = true;
    const client = new EmbeddingClient(provider, { retry: FAST_RETRY });

    await expect(client.embed(["a", "b"])).rejects.toThrow(
      "stub returned 1 vectors for 2 inputs",
    );
  });

  it("embeds a query and validates its width", async () => {
    const client = new EmbeddingClient(new StubProvider(), { retry: FAST_RETRY });

    expect(await client.embedQuery("why")).toEqual([3, 119, 1]);
    expect(client.dimensions).toBe(3);
    expect(client.model).toBe("stub-model");
  });
});
