import { describe, it, expect, vi } from "vitest";
import { ConflictError, NotFoundError } from "@groundwork/errors";
import type { Document } from "@groundwork/types";
import { chunkId } from "./chunk-ids.js";
import { createTestPipeline, sentences } from "./testing/fakes.js";
import type { TestPipeline } from "./testing/fakes.js";

const COLLECTION = "test-documents";

async function addDocument(p: TestPipeline, id: string, content: string): Promise<Document> {
  const now = new Date("2026-03-01T12:00:00.000Z");
  const document: Document = {
    id,
    filename: `${id}.txt`,
    mimeType: "text/plain",
    source: { type: "inline", content },
    state: "received",
    chunkCount: 0,
    failure: null,
    uploadedAt: now,
    updatedAt: now,
  };
  await p.store.createDocument(document);
  return document;
}

async function visibleRecords(p: TestPipeline, documentId: string) {
  const hits = await p.index.search(p.provider.vectorFor("probe"), 50, {
    documentIds: [documentId],
  });
  return hits.map((h) => h.record).sort((a, b) => a.chunkIndex - b.chunkIndex);
}

describe("IngestionWorkflow", () => {
  it("indexes a 3-chunk document and completes", async () => {
    const p = createTestPipeline({ chunkSize: 1000, overlap: 200 });
    await addDocument(p, "doc-1", sentences(240, 10));

    const result = await p.workflow.run("doc-1");

    expect(result.state).toBe("completed");
    expect(result.chunkCount).toBe(3);
    expect(result.failure).toBeNull();

    const records = await visibleRecords(p, "doc-1");
    expect(records.map((r) => r.chunkIndex)).toEqual([0, 1, 2]);
    expect(records.every((r) => r.documentId === "doc-1")).toBe(true);
    expect(records.map((r) => r.id)).toEqual([0, 1, 2].map((i) => chunkId("doc-1", i)));
    expect(records[0]).toMatchObject({
      filename: "doc-1.txt",
      uploadedAt: "2026-03-01T12:00:00.000Z",
      tokenCount: 1000,
    });
  });

  it("covers every token, overlapping by at most the window", async () => {
    const p = createTestPipeline({ chunkSize: 1000, overlap: 200 });
    await addDocument(p, "doc-1", sentences(240, 10));
    await p.workflow.run("doc-1");

    const records = await visibleRecords(p, "doc-1");
    const total = records.reduce((sum, r) => sum + r.tokenCount, 0);
    expect(total - 2400).toBe(400);
    expect(total - 2400).toBeLessThanOrEqual((records.length - 1) * 200);

    const chunks = await p.store.listChunks("doc-1");
    const covered = chunks.reduce((sum, c) => sum + c.tokenCount - c.span.overlap, 0);
    expect(covered).toBe(2400);
  });

  it("leaves a completed document untouched when run again", async () => {
    const p = createTestPipeline();
    await addDocument(p, "doc-1", sentences(20));
    const first = await p.workflow.run("doc-1");
    const callsAfterFirst = p.provider.calls;

    const second = await p.workflow.run("doc-1");

    expect(second).toEqual(first);
    expect(p.provider.calls).toBe(callsAfterFirst);
  });

  it("re-indexes to an identical set of records", async () => {
    const p = createTestPipeline({ chunkSize: 1000, overlap: 200 });
    await addDocument(p, "doc-1", sentences(240, 10));
    await p.workflow.run("doc-1");
    const before = await visibleRecords(p, "doc-1");

    const result = await p.workflow.run("doc-1", { reindex: true });

    expect(result.state).toBe("completed");
    expect(await visibleRecords(p, "doc-1")).toEqual(before);
    expect(await p.vectorStore.count(COLLECTION, { documentId: "doc-1" })).toBe(3);
  });

  it("fails at splitting when there is no text", async () => {
    const p = createTestPipeline();
    await addDocument(p, "empty", "  \n\n  ");

    const result = await p.workflow.run("empty");

    expect(result.state).toBe("failed");
    expect(result.failure).toEqual({
      step: "splitting",
      code: "EXTRACTION_FAILED",
      message: "no extractable text",
    });
  });

  it("completes when the embedding provider recovers within the retry budget", async () => {
    const p = createTestPipeline();
    await addDocument(p, "doc-1", sentences(30));
    p.provider.failuresLeft = 2;

    const result = await p.workflow.run("doc-1");

    expect(result.state).toBe("completed");
    expect(p.provider.calls).toBe(3);
  });

  it("fails at embedding when the provider keeps failing, with nothing searchable", async () => {
    const p = createTestPipeline();
    await addDocument(p, "doc-1", sentences(30));
    p.provider.failAlways = true;

    const result = await p.workflow.run("doc-1");

    expect(result.state).toBe("failed");
    expect(result.failure?.step).toBe("embedding");
    expect(result.failure?.code).toBe("EMBEDDING_FAILED");
    expect(await p.index.search(p.provider.vectorFor("s0w0"), 5)).toEqual([]);
  });

  it("resumes without re-splitting or re-embedding finished batches", async () => {
    const p = createTestPipeline({ chunkSize: 1000, overlap: 200, embeddingBatchSize: 1 });
    await addDocument(p, "doc-1", sentences(240, 10));
    const saveChunks = vi.spyOn(p.store, "saveChunks");
    const saveEmbeddings = p.store.saveEmbeddings.bind(p.store);
    vi.spyOn(p.store, "saveEmbeddings").mockImplementationOnce(async (documentId, batch) => {
      await saveEmbeddings(documentId, batch);
      p.provider.failAlways = true;
    });

    const failed = await p.workflow.run("doc-1");
    expect(failed.failure?.step).toBe("embedding");
    const stored = await p.store.listChunks("doc-1");
    expect(stored.map((c) => c.embedding !== null)).toEqual([true, false, false]);

    p.provider.failAlways = false;
    p.provider.calls = 0;
    const resumed = await p.workflow.run("doc-1");

    expect(resumed.state).toBe("completed");
    expect(p.provider.calls).toBe(2);
    expect(saveChunks).toHaveBeenCalledTimes(1);
    expect(await visibleRecords(p, "doc-1")).toHaveLength(3);
  });

  it("retries a failed index write and completes", async () => {
    const p = createTestPipeline();
    await addDocument(p, "doc-1", sentences(30));
    const upsert = p.vectorStore.upsert.bind(p.vectorStore);
    vi.spyOn(p.vectorStore, "upsert")
      .mockRejectedValueOnce(new Error("connection reset"))
      .mockImplementation(upsert);

    const result = await p.workflow.run("doc-1");

    expect(result.state).toBe("completed");
    expect(await p.vectorStore.count(COLLECTION, { documentId: "doc-1", visible: true })).toBe(1);
  });

  it("fails at indexing once upsert retries are exhausted, leaving nothing visible", async () => {
    const p = createTestPipeline();
    await addDocument(p, "doc-1", sentences(30));
    vi.spyOn(p.vectorStore, "upsert").mockRejectedValue(new Error("connection reset"));

    const result = await p.workflow.run("doc-1");

    expect(result.state).toBe("failed");
    expect(result.failure).toMatchObject({ step: "indexing", code: "INDEX_WRITE_FAILED" });
    expect(await p.vectorStore.count(COLLECTION, { visible: true })).toBe(0);
  });

  it("fails at indexing when publishing keeps failing, then completes on rerun", async () => {
    const p = createTestPipeline();
    await addDocument(p, "doc-1", sentences(30));
    const setVisibility = vi
      .spyOn(p.vectorStore, "setVisibility")
      .mockRejectedValue(new Error("503 qdrant unavailable"));

    const failed = await p.workflow.run("doc-1");

    expect(failed.state).toBe("failed");
    expect(failed.failure).toEqual({
      step: "indexing",
      code: "INDEX_WRITE_FAILED",
      message: "Publishing document doc-1 failed: 503 qdrant unavailable",
    });
    expect(setVisibility).toHaveBeenCalledTimes(3);
    expect(await p.vectorStore.count(COLLECTION, { visible: true })).toBe(0);

    setVisibility.mockRestore();
    const resumed = await p.workflow.run("doc-1");

    expect(resumed.state).toBe("completed");
    expect(await p.vectorStore.count(COLLECTION, { documentId: "doc-1", visible: true })).toBe(1);
  });

  it("discards its records when the document is deleted mid-run", async () => {
    const p = createTestPipeline();
    await addDocument(p, "doc-1", sentences(30));
    const upsert = p.vectorStore.upsert.bind(p.vectorStore);
    vi.spyOn(p.vectorStore, "upsert").mockImplementationOnce(async (collection, records, visible) => {
      await p.store.deleteDocument("doc-1");
      await upsert(collection, records, visible);
    });

    await expect(p.workflow.run("doc-1")).rejects.toBeInstanceOf(NotFoundError);

    expect(await p.vectorStore.count(COLLECTION, { documentId: "doc-1" })).toBe(0);
    expect(p.workflow.isRunning("doc-1")).toBe(false);
  });

  it("fails with SCHEMA_MISMATCH when the collection has another width", async () => {
    const p = createTestPipeline({ dimensions: 64 });
    await p.vectorStore.createCollection({ name: COLLECTION, dimensions: 8, distance: "Cosine" });
    await addDocument(p, "doc-1", sentences(5));

    const result = await p.workflow.run("doc-1");

    expect(result.failure).toMatchObject({ step: "indexing", code: "SCHEMA_MISMATCH" });
  });

  it("stops at the next step boundary when cancelled", async () => {
    const p = createTestPipeline();
    await addDocument(p, "doc-1", sentences(30));
    const controller = new AbortController();
    const saveChunks = p.store.saveChunks.bind(p.store);
    vi.spyOn(p.store, "saveChunks").mockImplementationOnce(async (documentId, chunks) => {
      await saveChunks(documentId, chunks);
      controller.abort();
    });

    const cancelled = await p.workflow.run("doc-1", { signal: controller.signal });

    expect(cancelled.state).toBe("failed");
    expect(cancelled.failure).toEqual({
      step: "embedding",
      code: "CANCELLED",
      message: "Cancelled before embedding",
    });
    expect(p.provider.calls).toBe(0);

    const resumed = await p.workflow.run("doc-1");
    expect(resumed.state).toBe("completed");
  });

  it("does not start when already cancelled", async () => {
    const p = createTestPipeline();
    await addDocument(p, "doc-1", sentences(3));

    const result = await p.workflow.run("doc-1", { signal: AbortSignal.abort() });

    expect(result.failure).toMatchObject({ step: "splitting", code: "CANCELLED" });
    expect(await p.store.listChunks("doc-1")).toEqual([]);
  });

  it("rejects a second concurrent run of the same document", async () => {
    const p = createTestPipeline();
    await addDocument(p, "doc-1", sentences(3));

    const first = p.workflow.run("doc-1");
    await expect(p.workflow.run("doc-1")).rejects.toBeInstanceOf(ConflictError);
    expect((await first).state).toBe("completed");
    expect(p.workflow.isRunning("doc-1")).toBe(false);
  });

  it("runs different documents in parallel", async () => {
    const p = createTestPipeline();
    await addDocument(p, "doc-a", sentences(3, 10, "a"));
    await addDocument(p, "doc-b", sentences(3, 10, "b"));

    const results = await Promise.all([p.workflow.run("doc-a"), p.workflow.run("doc-b")]);

    expect(results.map((d) => d.state)).toEqual(["completed", "completed"]);
  });

  it("rejects an unknown document", async () => {
    const p = createTestPipeline();

    await expect(p.workflow.run("missing")).rejects.toBeInstanceOf(NotFoundError);
  });
});
