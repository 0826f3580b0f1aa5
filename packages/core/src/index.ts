export { IngestionWorkflow } from "./ingestion-workflow.js";
export type { IngestionWorkflowDependencies, RunOptions } from "./ingestion-workflow.js";

export { IngestionService, toStatusView } from "./ingestion-service.js";
export type { IngestionServiceDependencies } from "./ingestion-service.js";

export { InProcessScheduler } from "./in-process-scheduler.js";
export { InMemoryWorkflowStore } from "./in-memory-workflow-store.js";
export { readDocumentSource } from "./document-source.js";
export type { SourceReader } from "./document-source.js";
export { chunkId } from "./chunk-ids.js";

export { RetrievalEngine } from "./retrieval-engine.js";
export type { RetrievalEngineDependencies } from "./retrieval-engine.js";

export {
  ANSWER_SYSTEM_PROMPT,
  assembleContext,
  buildAnswerPrompt,
  citedSourcePositions,
  sourceLabel,
} from "./context-assembler.js";

export { AnswerSynthesizer, NO_GROUNDING_ANSWER, toCitation } from "./answer-synthesizer.js";
export type { AnswerSynthesizerDependencies, SynthesizeOptions } from "./answer-synthesizer.js";

export { QueryService } from "./query-service.js";
export type { QueryServiceDependencies } from "./query-service.js";

export { EvaluationHarness, aggregate } from "./evaluation-harness.js";
export type { EvaluateOptions, EvaluationHarnessDependencies } from "./evaluation-harness.js";
export { LlmJudgeScorer, buildJudgePrompt } from "./judge-scorer.js";
export type { IEvaluationScorer, ScoringInput } from "./judge-scorer.js";
export { InMemoryEvaluationSink, JsonFileEvaluationSink } from "./evaluation-sinks.js";
export { DEFAULT_EVALUATION_QUESTIONS } from "./evaluation-questions.js";

export {
  MAX_K,
  documentUploadSchema,
  evaluationRequestSchema,
  parseInput,
  queryRequestSchema,
  retrievalRequestSchema,
} from "./validation.js";
