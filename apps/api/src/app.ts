import express from "express";
import type { Express } from "express";
import type { Logger } from "@groundwork/logger";
import { createHandlers } from "./handlers.js";
import type { ApiServices } from "./handlers.js";
import {
  createErrorHandler,
  createRequestLogger,
  notFoundHandler,
  requestIdMiddleware,
  route,
} from "./middleware.js";

const MAX_BODY_SIZE = "10mb";

export function createApp(services: ApiServices, logger: Logger): Express {
  const handlers = createHandlers(services);
  const app = express();

  app.disable("x-powered-by");
  app.use(requestIdMiddleware);
  app.use(createRequestLogger(logger));
  app.use(express.json({ limit: MAX_BODY_SIZE }));

  app.get("/health", route(handlers.health));

  app.post("/documents", route(handlers.submitDocument));
  app.get("/documents", route(handlers.listDocuments));
  app.get("/documents/:id", route(handlers.getDocument));
  app.delete("/documents/:id", route(handlers.deleteDocument));
  app.post("/documents/:id/reindex", route(handlers.reindexDocument));

  app.post("/query", route(handlers.query));
  app.post("/evaluations", route(handlers.evaluate));

  app.use(notFoundHandler);
  app.use(createErrorHandler(logger));

  return app;
}
