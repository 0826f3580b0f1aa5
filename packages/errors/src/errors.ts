import { AppError } from "./app-error.js";

export interface ErrorContext {
  requestId?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found", options?: ErrorContext) {
    super({
      message,
      statusCode: 404,
      code: "NOT_FOUND",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
  }
}

export class ConflictError extends AppError {
  constructor(message = "Conflict", options?: ErrorContext) {
    super({
      message,
      statusCode: 409,
      code: "CONFLICT",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
  }
}

export class ValidationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(
    message = "Validation error",
    fields: Record<string, string>,
    options?: ErrorContext,
  ) {
    super({
      message,
      statusCode: 400,
      code: "VALIDATION_ERROR",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
    this.fields = fields;
  }
}

/** A run stopped on request between two steps. */
export class CancelledError extends AppError {
  constructor(message = "Cancelled", options?: ErrorContext) {
    super({
      message,
      statusCode: 499,
      code: "CANCELLED",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
  }
}

/** The document could not be read, or held no text. Terminal for that document. */
export class ExtractionError extends AppError {
  constructor(message = "No extractable text", options?: ErrorContext) {
    super({
      message,
      statusCode: 422,
      code: "EXTRACTION_FAILED",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
  }
}

/**
 * Vector dimension or model drift between the configured embedding model and
 * the collection. Never retried: an operator has to fix the configuration.
 */
export class SchemaMismatchError extends AppError {
  public readonly expected: number;
  public readonly actual: number;

  constructor(message: string, expected: number, actual: number, options?: ErrorContext) {
    super({
      message,
      statusCode: 500,
      code: "SCHEMA_MISMATCH",
      isOperational: false,
      requestId: options?.requestId,
      details: { expected, actual, ...options?.details },
      cause: options?.cause,
    });
    this.expected = expected;
    this.actual = actual;
  }
}

export class ExternalServiceError extends AppError {
  public readonly service: string;

  constructor(
    message = "External service error",
    service: string,
    options?: ErrorContext & { code?: string },
  ) {
    super({
      message,
      statusCode: 502,
      code: options?.code ?? "EXTERNAL_SERVICE_ERROR",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
    this.service = service;
  }
}

export class EmbeddingError extends ExternalServiceError {
  constructor(message = "Embedding failed", service: string, options?: ErrorContext) {
    super(message, service, { ...options, code: "EMBEDDING_FAILED" });
  }
}

export class IndexWriteError extends ExternalServiceError {
  public readonly recordIds: string[];

  constructor(
    message = "Index write failed",
    service: string,
    recordIds: string[],
    options?: ErrorContext,
  ) {
    super(message, service, {
      ...options,
      code: "INDEX_WRITE_FAILED",
      details: { recordCount: recordIds.length, ...options?.details },
    });
    this.recordIds = recordIds;
  }
}

export class GenerationError extends ExternalServiceError {
  constructor(
    message = "Generation failed",
    service: string,
    options?: ErrorContext & { timedOut?: boolean },
  ) {
    super(message, service, {
      ...options,
      code: options?.timedOut ? "GENERATION_TIMEOUT" : "GENERATION_FAILED",
    });
  }
}
