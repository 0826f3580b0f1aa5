import type { Answer, Citation, RetrievalHit, RetrievalResult } from "@groundwork/types";
import { GenerationError, errorMessage, withRetry } from "@groundwork/errors";
import type { RetryOptions } from "@groundwork/errors";
import type { ChatResult, IChatModel } from "@groundwork/llm";
import { createSilentLogger } from "@groundwork/logger";
import type { Logger } from "@groundwork/logger";
import { ANSWER_SYSTEM_PROMPT, buildAnswerPrompt, citedSourcePositions } from "./context-assembler.js";

export const NO_GROUNDING_ANSWER =
  "I could not find anything in the indexed documents that answers this question.";

const DEFAULT_MAX_TOKENS = 1024;
const DEFAULT_TEMPERATURE = 0.2;
const DEFAULT_RETRY = { maxRetries: 2, baseDelayMs: 500, maxDelayMs: 4_000 };

export interface AnswerSynthesizerDependencies {
  model: IChatModel;
  maxTokens?: number;
  temperature?: number;
  retry?: Pick<RetryOptions, "maxRetries" | "baseDelayMs" | "maxDelayMs">;
  logger?: Logger;
}

export interface SynthesizeOptions {
  /** Aborting stops waiting for the model; the call fails with GENERATION_TIMEOUT. */
  signal?: AbortSignal;
}

export function toCitation(hit: RetrievalHit): Citation {
  return {
    documentId: hit.record.documentId,
    chunkId: hit.record.chunkId,
    chunkIndex: hit.record.chunkIndex,
    score: hit.score,
  };
}

/**
 * Turns a retrieval result into a cited answer. With no retrieved context the
 * model is not called and a fixed non-answer is returned.
 */
export class AnswerSynthesizer {
  private readonly logger: Logger;

  constructor(private readonly deps: AnswerSynthesizerDependencies) {
    this.logger = deps.logger ?? createSilentLogger();
  }

  async synthesize(
    question: string,
    retrieval: RetrievalResult,
    options: SynthesizeOptions = {},
  ): Promise<Answer> {
    const startTime = Date.now();
    const { hits } = retrieval;

    if (hits.length === 0) {
      return {
        text: NO_GROUNDING_ANSWER,
        citations: [],
        grounded: false,
        latencyMs: Date.now() - startTime,
      };
    }

    const result = await this.generate(buildAnswerPrompt(question, hits), options.signal);

    // Answers that cite nothing are attributed to every source shown
    const positions = citedSourcePositions(result.text, hits.length);
    const cited = positions.length > 0 ? positions.flatMap((p) => hits.slice(p, p + 1)) : hits;
    const confidence = cited.reduce((sum, hit) => sum + hit.score, 0) / cited.length;

    return {
      text: result.text,
      citations: cited.map(toCitation),
      grounded: true,
      confidence,
      latencyMs: Date.now() - startTime,
      model: result.model,
    };
  }

  private async generate(prompt: string, signal?: AbortSignal): Promise<ChatResult> {
    const { model } = this.deps;

    try {
      return await withRetry(
        () =>
          model.complete({
            system: ANSWER_SYSTEM_PROMPT,
            prompt,
            maxTokens: this.deps.maxTokens ?? DEFAULT_MAX_TOKENS,
            temperature: this.deps.temperature ?? DEFAULT_TEMPERATURE,
            signal,
          }),
        {
          ...DEFAULT_RETRY,
          ...this.deps.retry,
          signal,
          onRetry: ({ attempt, maxRetries, delayMs, error }) =>
            this.logger.warn(
              { attempt, maxRetries, delayMs, err: errorMessage(error), model: model.model },
              "Generation failed, retrying",
            ),
        },
      );
    } catch (err: unknown) {
      if (signal?.aborted) {
        throw new GenerationError("Generation timed out", model.name, { cause: err, timedOut: true });
      }
      if (err instanceof GenerationError) {
        throw err;
      }
      throw new GenerationError(`Generation failed: ${errorMessage(err)}`, model.name, {
        cause: err,
      });
    }
  }
}
