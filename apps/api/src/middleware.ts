import { randomUUID } from "node:crypto";
import type { Request, Response, NextFunction } from "express";
import type { Logger } from "@groundwork/logger";
import type { Handler } from "./handlers.js";
import type { HttpResult } from "./http.js";
import { toErrorResponse } from "./http.js";

// Extend Express Request with the request id
declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

const REQUEST_ID_HEADER = "x-request-id";

function getRequestId(req: Request): string {
  return req.requestId ?? "unknown";
}

function send(res: Response, result: HttpResult): void {
  res.status(result.status);
  if (result.body) {
    res.json(result.body);
  } else {
    res.end();
  }
}

/** Reuses the caller's request id or assigns one, and echoes it back. */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.get(REQUEST_ID_HEADER);
  req.requestId = incoming && incoming.length <= 128 ? incoming : randomUUID();
  res.setHeader(REQUEST_ID_HEADER, req.requestId);
  next();
}

export function createRequestLogger(logger: Logger) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const startTime = Date.now();
    res.on("finish", () => {
      logger.info(
        {
          requestId: getRequestId(req),
          method: req.method,
          path: req.path,
          status: res.statusCode,
          durationMs: Date.now() - startTime,
        },
        "Request completed",
      );
    });
    next();
  };
}

/** Adapts a handler to Express; anything it throws reaches the error middleware. */
export function route(handler: Handler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    void handler({ params: req.params, body: req.body })
      .then((result) => send(res, result))
      .catch(next);
  };
}

export function notFoundHandler(req: Request, res: Response): void {
  send(res, {
    status: 404,
    body: {
      success: false,
      error: {
        code: "NOT_FOUND",
        message: `No route for ${req.method} ${req.path}`,
        requestId: getRequestId(req),
      },
    },
  });
}

export function createErrorHandler(logger: Logger) {
  // Express recognises error middleware by its four parameters
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    const result = toErrorResponse(err, getRequestId(req));
    if (result.status >= 500) {
      logger.error({ err, requestId: getRequestId(req) }, "Request failed");
    } else {
      logger.warn(
        { requestId: getRequestId(req), code: result.body?.error?.code },
        "Request rejected",
      );
    }
    send(res, result);
  };
}
