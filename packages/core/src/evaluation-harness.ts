import { randomUUID } from "node:crypto";
import type {
  EvaluationAggregate,
  EvaluationFailure,
  EvaluationQuestion,
  EvaluationRecord,
  EvaluationReport,
  IEvaluationSink,
} from "@groundwork/types";
import { AppError, errorMessage } from "@groundwork/errors";
import { createSilentLogger } from "@groundwork/logger";
import type { Logger } from "@groundwork/logger";
import type { RetrievalEngine } from "./retrieval-engine.js";
import type { AnswerSynthesizer } from "./answer-synthesizer.js";
import type { IEvaluationScorer } from "./judge-scorer.js";
import { DEFAULT_EVALUATION_QUESTIONS } from "./evaluation-questions.js";

export interface EvaluationHarnessDependencies {
  retrieval: RetrievalEngine;
  synthesizer: AnswerSynthesizer;
  scorer: IEvaluationScorer;
  sink: IEvaluationSink;
  logger?: Logger;
}

export interface EvaluateOptions {
  k?: number;
}

function mean(values: number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function aggregate(records: EvaluationRecord[]): EvaluationAggregate {
  const faithfulness = mean(records.map((r) => r.faithfulness));
  const relevancy = mean(records.map((r) => r.relevancy));
  return {
    faithfulness,
    relevancy,
    average: (faithfulness + relevancy) / 2,
    count: records.length,
  };
}

/**
 * Replays questions through retrieval and synthesis and scores each answer.
 * Read-only with respect to the index. Questions run one after another so
 * a run is reproducible; one failing question is reported and excluded from
 * the means without stopping the run.
 */
export class EvaluationHarness {
  private readonly logger: Logger;

  constructor(private readonly deps: EvaluationHarnessDependencies) {
    this.logger = deps.logger ?? createSilentLogger();
  }

  async evaluate(
    questions: readonly EvaluationQuestion[] = DEFAULT_EVALUATION_QUESTIONS,
    options: EvaluateOptions = {},
  ): Promise<EvaluationReport> {
    const runId = randomUUID();
    const startedAt = new Date();
    const log = this.logger.child({ runId });
    const records: EvaluationRecord[] = [];
    const failures: EvaluationFailure[] = [];

    log.info({ questions: questions.length }, "Evaluation started");

    for (const item of questions) {
      try {
        records.push(await this.evaluateOne(runId, item, options));
      } catch (err: unknown) {
        const code = AppError.isAppError(err) ? err.code : "INTERNAL_ERROR";
        log.warn({ question: item.question, code, err: errorMessage(err) }, "Question failed");
        failures.push({ question: item.question, code, message: errorMessage(err) });
      }
    }

    const report: EvaluationReport = {
      runId,
      startedAt,
      finishedAt: new Date(),
      records,
      failures,
      aggregate: aggregate(records),
    };

    log.info({ ...report.aggregate, failures: failures.length }, "Evaluation finished");
    return report;
  }

  private async evaluateOne(
    runId: string,
    item: EvaluationQuestion,
    options: EvaluateOptions,
  ): Promise<EvaluationRecord> {
    const retrieval = await this.deps.retrieval.retrieve({
      question: item.question,
      ...(options.k !== undefined ? { k: options.k } : {}),
    });
    const answer = await this.deps.synthesizer.synthesize(item.question, retrieval);
    const contexts = retrieval.hits.map((hit) => hit.record.text);

    const scores = await this.deps.scorer.score({
      question: item.question,
      answer: answer.text,
      contexts,
      reference: item.reference,
    });

    const record: EvaluationRecord = {
      runId,
      question: item.question,
      ...(item.reference !== undefined ? { reference: item.reference } : {}),
      answer: answer.text,
      contexts,
      faithfulness: scores.faithfulness,
      relevancy: scores.relevancy,
      createdAt: new Date(),
    };

    await this.deps.sink.append(record);
    return record;
  }
}
