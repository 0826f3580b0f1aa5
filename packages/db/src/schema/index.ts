export * from "./documents.js";
export * from "./chunks.js";
export * from "./evaluation-records.js";
