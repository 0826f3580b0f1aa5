import type { Citation, QueryResponse, RetrievalResult } from "@groundwork/types";
import { GenerationError, SchemaMismatchError } from "@groundwork/errors";
import { createSilentLogger } from "@groundwork/logger";
import type { Logger } from "@groundwork/logger";
import type { RetrievalEngine } from "./retrieval-engine.js";
import { toCitation } from "./answer-synthesizer.js";
import type { AnswerSynthesizer } from "./answer-synthesizer.js";
import { parseInput, queryRequestSchema } from "./validation.js";

export interface QueryServiceDependencies {
  retrieval: RetrievalEngine;
  synthesizer: AnswerSynthesizer;
  logger?: Logger;
}

/**
 * Question in, structured response out. Only input validation throws; the
 * other outcomes are variants of {@link QueryResponse}:
 * - `no_grounding`: nothing relevant is indexed (not an error)
 * - `generation_failed`: the model failed or timed out; retrieved citations are kept
 * - `misconfigured`: vector width and collection disagree; needs an operator
 */
export class QueryService {
  private readonly logger: Logger;

  constructor(private readonly deps: QueryServiceDependencies) {
    this.logger = deps.logger ?? createSilentLogger();
  }

  async query(input: unknown): Promise<QueryResponse> {
    const startTime = Date.now();
    const { timeoutMs, ...request } = parseInput(queryRequestSchema, input);
    const signal = timeoutMs !== undefined ? AbortSignal.timeout(timeoutMs) : undefined;

    let retrieval: RetrievalResult;
    try {
      retrieval = await this.deps.retrieval.retrieve(request);
    } catch (err: unknown) {
      if (err instanceof SchemaMismatchError) {
        this.logger.error({ err }, "Query embedding does not match the collection");
        return {
          kind: "misconfigured",
          citations: [],
          error: { code: err.code, message: err.message, retryable: false },
          latencyMs: Date.now() - startTime,
        };
      }
      throw err;
    }

    const retrieved: Citation[] = retrieval.hits.map(toCitation);

    try {
      const answer = await this.deps.synthesizer.synthesize(request.question, retrieval, { signal });

      if (!answer.grounded) {
        return {
          kind: "no_grounding",
          answer: answer.text,
          citations: [],
          latencyMs: Date.now() - startTime,
        };
      }

      this.logger.info(
        { hits: retrieval.hits.length, cited: answer.citations.length, latencyMs: answer.latencyMs },
        "Query answered",
      );
      return {
        kind: "answered",
        answer: answer.text,
        citations: answer.citations,
        confidence: answer.confidence,
        latencyMs: Date.now() - startTime,
      };
    } catch (err: unknown) {
      if (!(err instanceof GenerationError)) {
        throw err;
      }
      this.logger.warn({ code: err.code, message: err.message }, "Generation failed");
      return {
        kind: "generation_failed",
        citations: retrieved,
        error: { code: err.code, message: err.message, retryable: true },
        latencyMs: Date.now() - startTime,
      };
    }
  }
}
