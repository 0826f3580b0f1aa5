import type { Runtime } from "@groundwork/runtime";
import type { QueryResponse } from "@groundwork/types";
import { evaluationRequestSchema, parseInput } from "@groundwork/core";
import type { HttpResult } from "./http.js";
import { noContent, ok } from "./http.js";

export type ApiServices = Pick<
  Runtime,
  "ingestion" | "query" | "createEvaluationHarness" | "healthCheck"
>;

export interface HandlerInput {
  params: Record<string, string>;
  body: unknown;
}

export type Handler = (input: HandlerInput) => Promise<HttpResult>;

const QUERY_STATUS: Record<QueryResponse["kind"], number> = {
  answered: 200,
  no_grounding: 200,
  generation_failed: 502,
  misconfigured: 500,
};

function param(input: HandlerInput, name: string): string {
  return input.params[name] ?? "";
}

export function createHandlers(services: ApiServices) {
  return {
    submitDocument: async ({ body }: HandlerInput): Promise<HttpResult> => {
      const handle = await services.ingestion.submit(body);
      return ok({ documentId: handle.documentId, runId: handle.runId }, 202);
    },

    listDocuments: async (): Promise<HttpResult> => ok(await services.ingestion.list()),

    getDocument: async (input: HandlerInput): Promise<HttpResult> =>
      ok(await services.ingestion.status(param(input, "id"))),

    reindexDocument: async (input: HandlerInput): Promise<HttpResult> => {
      const handle = await services.ingestion.reindex(param(input, "id"));
      return ok({ documentId: handle.documentId, runId: handle.runId }, 202);
    },

    deleteDocument: async (input: HandlerInput): Promise<HttpResult> => {
      await services.ingestion.delete(param(input, "id"));
      return noContent();
    },

    query: async ({ body }: HandlerInput): Promise<HttpResult> => {
      const response = await services.query.query(body);
      const status = QUERY_STATUS[response.kind];
      return { status, body: { success: status === 200, data: response } };
    },

    evaluate: async ({ body }: HandlerInput): Promise<HttpResult> => {
      const request = parseInput(evaluationRequestSchema, body ?? {});
      const report = await services
        .createEvaluationHarness()
        .evaluate(request.questions, request.k !== undefined ? { k: request.k } : {});
      return ok(report);
    },

    health: async (): Promise<HttpResult> => {
      const report = await services.healthCheck();
      return { status: report.healthy ? 200 : 503, body: { success: report.healthy, data: report } };
    },
  } satisfies Record<string, Handler>;
}

export type Handlers = ReturnType<typeof createHandlers>;
