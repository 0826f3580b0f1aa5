import type {
  Chunk,
  ChunkingConfig,
  Document,
  IndexedRecord,
  IWorkflowStore,
  StoredChunk,
  WorkflowStep,
} from "@groundwork/types";
import {
  AppError,
  CancelledError,
  ConflictError,
  ExtractionError,
  IndexWriteError,
  NotFoundError,
  SchemaMismatchError,
  errorMessage,
  withRetry,
} from "@groundwork/errors";
import type { RetryOptions } from "@groundwork/errors";
import type { IChunker } from "@groundwork/chunker";
import type { EmbeddingClient } from "@groundwork/embeddings";
import { getParser } from "@groundwork/parser";
import type { VectorIndex } from "@groundwork/vector-store";
import { createSilentLogger } from "@groundwork/logger";
import type { Logger } from "@groundwork/logger";
import { chunkId } from "./chunk-ids.js";
import { readDocumentSource } from "./document-source.js";
import type { SourceReader } from "./document-source.js";

const DEFAULT_INDEX_BATCH_SIZE = 64;

export interface IngestionWorkflowDependencies {
  store: IWorkflowStore;
  chunker: IChunker;
  chunking: ChunkingConfig;
  embeddings: EmbeddingClient;
  index: VectorIndex;
  logger?: Logger;
  readSource?: SourceReader;
  /** Records per upsert call. Default: 64 */
  indexBatchSize?: number;
  /** Retry budget for each upsert batch. */
  indexRetry?: Pick<RetryOptions, "maxRetries" | "baseDelayMs" | "maxDelayMs">;
}

export interface RunOptions {
  runId?: string;
  /** Checked between steps; a step in flight always finishes. */
  signal?: AbortSignal;
  /** Drop every checkpoint and index record, then run from the start. */
  reindex?: boolean;
}

class StepFailure extends Error {
  constructor(
    readonly step: WorkflowStep,
    readonly error: unknown,
  ) {
    super(errorMessage(error));
  }
}

/**
 * Per-document ingestion state machine:
 * received -> splitting -> embedding -> indexing -> completed, or failed.
 *
 * Progress is checkpointed in the workflow store (chunks, vectors, indexed
 * flags), so a rerun after a crash or failure skips finished work. Records are
 * written hidden and published only once every chunk is indexed.
 */
export class IngestionWorkflow {
  private readonly logger: Logger;
  private readonly readSource: SourceReader;
  private readonly indexBatchSize: number;
  private readonly active = new Set<string>();

  constructor(private readonly deps: IngestionWorkflowDependencies) {
    this.logger = deps.logger ?? createSilentLogger();
    this.readSource = deps.readSource ?? readDocumentSource;
    this.indexBatchSize = deps.indexBatchSize ?? DEFAULT_INDEX_BATCH_SIZE;
  }

  isRunning(documentId: string): boolean {
    return this.active.has(documentId);
  }

  /**
   * Drive a document as far as it can go. Resolves with the document in its
   * final state for this run (`completed` or `failed`); rejects only when the
   * document is unknown or already being processed.
   */
  async run(documentId: string, options: RunOptions = {}): Promise<Document> {
    if (this.active.has(documentId)) {
      throw new ConflictError(`Document ${documentId} is already being ingested`, {
        details: { documentId },
      });
    }

    this.active.add(documentId);
    try {
      return await this.execute(documentId, options);
    } finally {
      this.active.delete(documentId);
    }
  }

  private async execute(documentId: string, options: RunOptions): Promise<Document> {
    const { store } = this.deps;
    const log = this.logger.child({ documentId, runId: options.runId });

    let document = await store.getDocument(documentId);
    if (!document) {
      throw new NotFoundError(`Document ${documentId} not found`);
    }

    if (document.state === "completed" && !options.reindex) {
      log.info("Document already completed, nothing to do");
      return document;
    }

    if (options.reindex) {
      log.info("Re-indexing from scratch");
      await this.deps.index.deleteDocument(documentId);
      await store.clearChunks(documentId);
      document = await store.updateDocument(documentId, {
        state: "received",
        chunkCount: 0,
        failure: null,
      });
    }

    const startTime = Date.now();

    try {
      this.checkCancelled("splitting", options.signal);
      const chunks = await this.split(document, log);

      this.checkCancelled("embedding", options.signal);
      await this.embed(documentId, chunks, log);

      this.checkCancelled("indexing", options.signal);
      await this.indexChunks(document, log);

      if (await this.discardIfDeleted(documentId, log)) {
        throw new NotFoundError(`Document ${documentId} was deleted during ingestion`);
      }
      await this.publish(documentId, log);
    } catch (err: unknown) {
      if (!(err instanceof StepFailure)) {
        throw err;
      }
      return this.fail(documentId, err, log);
    }

    const completed = await store.updateDocument(documentId, {
      state: "completed",
      failure: null,
    });

    log.info(
      { chunkCount: completed.chunkCount, durationMs: Date.now() - startTime },
      "Document ingested",
    );
    return completed;
  }

  private async split(document: Document, log: Logger): Promise<StoredChunk[]> {
    const { store } = this.deps;

    const saved = await store.listChunks(document.id);
    if (saved.length > 0) {
      log.debug({ chunkCount: saved.length }, "Reusing saved chunks");
      return saved;
    }

    await store.updateDocument(document.id, { state: "splitting", failure: null });

    const chunks = await this.step("splitting", async () => {
      const raw = await this.readSource(document.source);
      const parsed = await getParser(document.mimeType).parse(raw, document.mimeType);
      const results = this.deps.chunker.chunk(parsed.text, this.deps.chunking);

      if (results.length === 0) {
        throw new ExtractionError("no extractable text");
      }

      return results.map(
        (result): Chunk => ({
          id: chunkId(document.id, result.index),
          documentId: document.id,
          index: result.index,
          content: result.content,
          tokenCount: result.tokenCount,
          span: result.metadata,
        }),
      );
    });

    await store.saveChunks(document.id, chunks);
    await store.updateDocument(document.id, { chunkCount: chunks.length });
    log.info({ chunkCount: chunks.length }, "Document split");

    return store.listChunks(document.id);
  }

  private async embed(documentId: string, chunks: StoredChunk[], log: Logger): Promise<void> {
    const pending = chunks.filter((chunk) => chunk.embedding === null);
    await this.deps.store.updateDocument(documentId, { state: "embedding" });

    if (pending.length === 0) {
      return;
    }
    log.debug({ pending: pending.length, total: chunks.length }, "Embedding chunks");

    await this.step("embedding", () =>
      this.deps.embeddings.embed(
        pending.map((chunk) => chunk.content),
        {
          onBatch: async (offset, vectors) => {
            const batch = new Map<string, number[]>();
            vectors.forEach((vector, i) => {
              const chunk = pending[offset + i];
              if (chunk) batch.set(chunk.id, vector);
            });
            await this.deps.store.saveEmbeddings(documentId, batch);
          },
        },
      ),
    );
  }

  private async indexChunks(document: Document, log: Logger): Promise<void> {
    const { store, index } = this.deps;

    await store.updateDocument(document.id, { state: "indexing" });
    const pending = (await store.listChunks(document.id)).filter((chunk) => !chunk.indexed);

    for (let i = 0; i < pending.length; i += this.indexBatchSize) {
      const batch = pending.slice(i, i + this.indexBatchSize);
      const ids = batch.map((chunk) => chunk.id);

      await this.step("indexing", async () => {
        const records = batch.map((chunk) => this.toRecord(document, chunk));
        try {
          await withRetry(() => index.upsert(records), {
            ...this.deps.indexRetry,
            onRetry: ({ attempt, maxRetries, delayMs, error }) =>
              log.warn(
                { attempt, maxRetries, delayMs, err: errorMessage(error), records: ids.length },
                "Index write failed, retrying",
              ),
          });
        } catch (err: unknown) {
          if (err instanceof SchemaMismatchError) {
            throw err;
          }
          throw new IndexWriteError(
            `Upsert of ${ids.length} records failed: ${errorMessage(err)}`,
            index.backend,
            ids,
            { cause: err },
          );
        }
      });

      await store.markIndexed(document.id, ids);
    }

    log.debug({ indexed: pending.length }, "Chunks indexed");
  }

  private async publish(documentId: string, log: Logger): Promise<void> {
    const { index } = this.deps;
    await this.step("indexing", async () => {
      try {
        await withRetry(() => index.publishDocument(documentId), {
          ...this.deps.indexRetry,
          onRetry: ({ attempt, maxRetries, delayMs, error }) =>
            log.warn({ attempt, maxRetries, delayMs, err: errorMessage(error) }, "Publish failed, retrying"),
        });
      } catch (err: unknown) {
        throw new IndexWriteError(
          `Publishing document ${documentId} failed: ${errorMessage(err)}`,
          index.backend,
          [],
          { cause: err },
        );
      }
    });
  }

  /** A document deleted mid-run must not leave records behind. */
  private async discardIfDeleted(documentId: string, log: Logger): Promise<boolean> {
    if (await this.deps.store.getDocument(documentId)) {
      return false;
    }
    log.warn("Document deleted while ingesting, discarding its records");
    await this.deps.index.deleteDocument(documentId);
    return true;
  }

  private toRecord(document: Document, chunk: StoredChunk): IndexedRecord {
    if (!chunk.embedding) {
      throw new Error(`Chunk ${chunk.index} has no stored vector`);
    }
    return {
      id: chunk.id,
      vector: chunk.embedding,
      documentId: document.id,
      chunkId: chunk.id,
      chunkIndex: chunk.index,
      text: chunk.content,
      filename: document.filename,
      uploadedAt: document.uploadedAt.toISOString(),
      tokenCount: chunk.tokenCount,
    };
  }

  private async step<T>(step: WorkflowStep, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err: unknown) {
      throw new StepFailure(step, err);
    }
  }

  private checkCancelled(step: WorkflowStep, signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
      throw new StepFailure(step, new CancelledError(`Cancelled before ${step}`));
    }
  }

  private async fail(documentId: string, failure: StepFailure, log: Logger): Promise<Document> {
    const code = AppError.isAppError(failure.error) ? failure.error.code : "INTERNAL_ERROR";
    const level = code === "CANCELLED" ? "warn" : "error";
    log[level]({ step: failure.step, code, err: failure.error }, "Ingestion failed");

    return this.deps.store.updateDocument(documentId, {
      state: "failed",
      failure: { step: failure.step, code, message: failure.message },
    });
  }
}
