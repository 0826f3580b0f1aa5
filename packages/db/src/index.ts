export * from "./schema/index.js";
export {
  createDbClient,
  createWorkerDbClient,
  type DbClient,
  type DbClientOptions,
  type DbHandle,
  pingDatabase,
} from "./client.js";
export { getSchemaMigrationSql, migrate } from "./migrations.js";
export { DrizzleWorkflowStore, DrizzleEvaluationSink } from "./workflow-store.js";
export { toDocument, toStoredChunk, toEvaluationRow } from "./mappers.js";
