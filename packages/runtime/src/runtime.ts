import type {
  AppConfig,
  IEvaluationSink,
  IIngestionScheduler,
  IWorkflowStore,
} from "@groundwork/types";
import { createChunker } from "@groundwork/chunker";
import { EmbeddingClient, createEmbeddingProvider } from "@groundwork/embeddings";
import type { IEmbeddingProvider } from "@groundwork/embeddings";
import { VectorIndex, createVectorStore } from "@groundwork/vector-store";
import type { IVectorStore } from "@groundwork/vector-store";
import { createChatModel } from "@groundwork/llm";
import type { IChatModel } from "@groundwork/llm";
import {
  AnswerSynthesizer,
  EvaluationHarness,
  InMemoryEvaluationSink,
  InMemoryWorkflowStore,
  InProcessScheduler,
  IngestionService,
  IngestionWorkflow,
  LlmJudgeScorer,
  QueryService,
  RetrievalEngine,
} from "@groundwork/core";
import type { IEvaluationScorer } from "@groundwork/core";
import {
  DrizzleEvaluationSink,
  DrizzleWorkflowStore,
  createDbClient,
  createWorkerDbClient,
  migrate,
  pingDatabase,
} from "@groundwork/db";
import type { DbHandle } from "@groundwork/db";
import { BullMqScheduler, createQueues, parseRedisConnection } from "@groundwork/queue";
import type { CircuitState } from "@groundwork/errors";
import { createChildLogger } from "@groundwork/logger";
import type { Logger } from "@groundwork/logger";

export type RuntimeRole = "api" | "worker" | "cli";

const CIRCUIT_MESSAGES: Record<CircuitState, string> = {
  open: "Circuit opened, calls fail fast",
  halfOpen: "Circuit half-open, next call probes the upstream",
  close: "Circuit closed",
};

export function logCircuitStateChange(logger: Logger) {
  return (breaker: string, state: CircuitState): void => {
    const level = state === "close" ? "info" : "warn";
    logger[level]({ breaker, state }, CIRCUIT_MESSAGES[state]);
  };
}

export interface RuntimeOptions {
  /**
   * The api role hands runs to the queue when Redis is configured; the worker
   * and cli roles always run them in process.
   */
  role?: RuntimeRole;
  /** Replace the configured backends, e.g. with in-process stand-ins. */
  overrides?: {
    embeddingProvider?: IEmbeddingProvider;
    vectorStore?: IVectorStore;
    chatModel?: IChatModel;
    workflowStore?: IWorkflowStore;
    scheduler?: IIngestionScheduler;
  };
}

export interface HealthReport {
  healthy: boolean;
  checks: Record<string, boolean>;
}

export interface Runtime {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly store: IWorkflowStore;
  readonly index: VectorIndex;
  readonly embeddings: EmbeddingClient;
  readonly chatModel: IChatModel;
  readonly workflow: IngestionWorkflow;
  readonly scheduler: IIngestionScheduler;
  readonly ingestion: IngestionService;
  readonly retrieval: RetrievalEngine;
  readonly synthesizer: AnswerSynthesizer;
  readonly query: QueryService;
  readonly evaluationSink: IEvaluationSink;
  createEvaluationHarness(options?: {
    sink?: IEvaluationSink;
    scorer?: IEvaluationScorer;
  }): EvaluationHarness;
  healthCheck(): Promise<HealthReport>;
  shutdown(): Promise<void>;
}

async function probe(check: () => Promise<boolean>): Promise<boolean> {
  try {
    return await check();
  } catch {
    return false;
  }
}

/**
 * Composition root: builds every client and service from config. Clients are
 * plain handles; nothing is global, and `shutdown` releases all of them.
 */
export async function createRuntime(
  config: AppConfig,
  logger: Logger,
  options: RuntimeOptions = {},
): Promise<Runtime> {
  const role = options.role ?? "api";
  const overrides = options.overrides ?? {};
  const component = (name: string) => createChildLogger(logger, { component: name });

  const provider =
    overrides.embeddingProvider ??
    createEmbeddingProvider({
      provider: config.embedding.provider,
      apiKey: config.embedding.apiKey,
      model: config.embedding.model,
      dimensions: config.embedding.dimensions,
    });
  const embeddingLogger = component("embeddings");
  const embeddings = new EmbeddingClient(provider, {
    batchSize: config.embedding.batchSize,
    onRetry: ({ attempt, maxRetries, delayMs, error }) =>
      embeddingLogger.warn({ attempt, maxRetries, delayMs, err: error }, "Embedding retry"),
  });

  const vectorStore = overrides.vectorStore ?? createVectorStore(config.vectorStore);
  const index = new VectorIndex(vectorStore, {
    name: config.vectorStore.collection,
    dimensions: provider.dimensions,
    distance: "Cosine",
  });

  const chatModel =
    overrides.chatModel ??
    createChatModel(
      { apiKey: config.generation.apiKey, model: config.generation.model },
      { onStateChange: logCircuitStateChange(component("generation")) },
    );

  let db: DbHandle | null = null;
  if (config.database && !overrides.workflowStore) {
    const dbOptions = { url: config.database.url, maxConnections: config.database.poolMax };
    db = role === "worker" ? createWorkerDbClient(dbOptions) : createDbClient(dbOptions);
    await migrate(db.db);
  }
  const store =
    overrides.workflowStore ?? (db ? new DrizzleWorkflowStore(db.db) : new InMemoryWorkflowStore());

  const workflow = new IngestionWorkflow({
    store,
    chunker: createChunker(config.chunking.strategy),
    chunking: {
      strategy: config.chunking.strategy,
      maxTokens: config.chunking.chunkSize,
      overlap: config.chunking.overlap,
    },
    embeddings,
    index,
    logger: component("ingestion"),
  });

  let scheduler: IIngestionScheduler;
  if (overrides.scheduler) {
    scheduler = overrides.scheduler;
  } else if (config.redis && role === "api") {
    const { ingestQueue } = createQueues({ connection: parseRedisConnection(config.redis.url) });
    scheduler = new BullMqScheduler(ingestQueue, component("scheduler"));
  } else {
    scheduler = new InProcessScheduler(workflow, component("scheduler"));
  }

  const ingestion = new IngestionService({
    store,
    scheduler,
    index,
    uploadDir: config.uploadDir,
    logger: component("documents"),
  });
  const retrieval = new RetrievalEngine({
    embeddings,
    index,
    defaultK: config.retrieval.topK,
    logger: component("retrieval"),
  });
  const synthesizer = new AnswerSynthesizer({
    model: chatModel,
    maxTokens: config.generation.maxTokens,
    temperature: config.generation.temperature,
    logger: component("synthesis"),
  });
  const query = new QueryService({ retrieval, synthesizer, logger: component("query") });
  const evaluationSink: IEvaluationSink = db
    ? new DrizzleEvaluationSink(db.db)
    : new InMemoryEvaluationSink();

  logger.info(
    {
      role,
      embedding: `${embeddings.name}/${embeddings.model}`,
      dimensions: embeddings.dimensions,
      vectorStore: index.backend,
      workflowStore: db ? "postgres" : "memory",
      scheduler: scheduler instanceof BullMqScheduler ? "bullmq" : "in-process",
    },
    "Runtime ready",
  );

  return {
    config,
    logger,
    store,
    index,
    embeddings,
    chatModel,
    workflow,
    scheduler,
    ingestion,
    retrieval,
    synthesizer,
    query,
    evaluationSink,

    createEvaluationHarness(harnessOptions = {}) {
      return new EvaluationHarness({
        retrieval,
        synthesizer,
        scorer: harnessOptions.scorer ?? new LlmJudgeScorer(chatModel),
        sink: harnessOptions.sink ?? evaluationSink,
        logger: component("evaluation"),
      });
    },

    async healthCheck() {
      const checks: Record<string, boolean> = {
        embeddings: await probe(() => embeddings.healthCheck()),
        vectorStore: await probe(() => index.healthCheck()),
      };
      const database = db;
      if (database) {
        checks["database"] = await probe(() => pingDatabase(database.db));
      }
      return { healthy: Object.values(checks).every(Boolean), checks };
    },

    async shutdown() {
      logger.info("Shutting down runtime");
      await scheduler.close();
      if (db) {
        await db.close();
      }
    },
  };
}
