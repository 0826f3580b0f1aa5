export type {
  WorkflowState,
  WorkflowStep,
  DocumentStatus,
  DocumentSource,
  DocumentFailure,
  Document,
  DocumentUploadRequest,
  DocumentStatusView,
} from "./document.js";
export { DOCUMENT_STATUS_BY_STATE } from "./document.js";

export type { ChunkStrategy, ChunkingConfig, ChunkResult, ChunkSpan, Chunk } from "./chunk.js";

export type {
  ParseResult,
  EmbeddingResult,
  IndexedRecordPayload,
  IndexedRecord,
  StoredChunk,
  DocumentPatch,
  IWorkflowStore,
} from "./pipeline.js";

export type {
  QueryRequest,
  RetrievalHit,
  RetrievalResult,
  Citation,
  Answer,
  QueryErrorKind,
  QueryError,
  QueryResponse,
} from "./query.js";

export type {
  EvaluationQuestion,
  EvaluationScores,
  EvaluationRecord,
  EvaluationFailure,
  EvaluationAggregate,
  EvaluationReport,
  IEvaluationSink,
} from "./evaluation.js";

export type {
  IngestJobData,
  DeadLetterJobData,
  RunHandle,
  IIngestionScheduler,
} from "./job.js";

export type { ApiResponse, ApiError } from "./api.js";

export type {
  AppConfig,
  EmbeddingProviderType,
  VectorStoreType,
  EmbeddingConfig,
  GenerationConfig,
  ChunkingSettings,
  VectorStoreSettings,
  RetrievalConfig,
  DatabaseConfig,
  RedisConfig,
  WorkerConfig,
} from "./config.js";
