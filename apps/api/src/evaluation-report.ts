import type { EvaluationAggregate, EvaluationReport } from "@groundwork/types";

const pad = (value: number) => String(value).padStart(2, "0");

/** `evaluation_YYYYMMDD_HHMMSS.json`, in local time. */
export function reportFilename(date: Date): string {
  const day = `${String(date.getFullYear())}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `evaluation_${day}_${time}.json`;
}

export function toReportFile(report: EvaluationReport) {
  return {
    runId: report.runId,
    timestamp: report.finishedAt.toISOString(),
    scores: {
      faithfulness: report.aggregate.faithfulness,
      answer_relevancy: report.aggregate.relevancy,
      average: report.aggregate.average,
    },
    queries: report.records.map((record) => ({
      question: record.question,
      answer: record.answer,
      contexts: record.contexts,
      faithfulness: record.faithfulness,
      relevancy: record.relevancy,
    })),
    failures: report.failures,
  };
}

function line(label: string, score: number): string {
  return `${label.padEnd(18)}${score.toFixed(4)} (${(score * 100).toFixed(1)}%)`;
}

export function formatSummary(aggregate: EvaluationAggregate): string {
  return [
    line("Faithfulness:", aggregate.faithfulness),
    line("Answer Relevancy:", aggregate.relevancy),
    line("Average:", aggregate.average),
  ].join("\n");
}
