import type { ApiResponse } from "@groundwork/types";
import { AppError, ValidationError } from "@groundwork/errors";

export interface HttpResult<T = unknown> {
  status: number;
  body?: ApiResponse<T>;
}

export function ok<T>(data: T, status = 200): HttpResult<T> {
  return { status, body: { success: true, data } };
}

export function noContent(): HttpResult<never> {
  return { status: 204 };
}

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && "body" in err;
}

/**
 * Maps any thrown value onto the response envelope. Operational errors keep
 * their message; anything else is reported as an internal error.
 */
export function toErrorResponse(err: unknown, requestId: string): HttpResult<never> {
  if (isBodyParseError(err)) {
    return {
      status: 400,
      body: {
        success: false,
        error: { code: "VALIDATION_ERROR", message: "Malformed JSON body", requestId },
      },
    };
  }

  if (AppError.isAppError(err)) {
    const details = err instanceof ValidationError ? { fields: err.fields } : err.details;
    return {
      status: err.statusCode,
      body: {
        success: false,
        error: {
          code: err.code,
          message: err.isOperational ? err.message : "Server misconfiguration",
          requestId,
          ...(details !== undefined ? { details } : {}),
        },
      },
    };
  }

  return {
    status: 500,
    body: {
      success: false,
      error: { code: "INTERNAL_ERROR", message: "Internal server error", requestId },
    },
  };
}
