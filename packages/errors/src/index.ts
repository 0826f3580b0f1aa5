export { AppError, errorMessage } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export {
  NotFoundError,
  ConflictError,
  ValidationError,
  CancelledError,
  ExtractionError,
  SchemaMismatchError,
  ExternalServiceError,
  EmbeddingError,
  IndexWriteError,
  GenerationError,
} from "./errors.js";
export type { ErrorContext } from "./errors.js";

export { createCircuitBreaker } from "./circuit-breaker.js";
export type { CircuitBreakerOptions, CircuitState } from "./circuit-breaker.js";

export { withRetry, isRetryable } from "./retry.js";
export type { RetryOptions, RetryAttempt } from "./retry.js";
