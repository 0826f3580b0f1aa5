import { describe, it, expect } from "vitest";
import type { EvaluationReport } from "@groundwork/types";
import { formatSummary, reportFilename, toReportFile } from "./evaluation-report.js";

describe("reportFilename", () => {
  it("stamps the local date and time", () => {
    expect(reportFilename(new Date(2026, 0, 2, 3, 4, 5))).toBe("evaluation_20260102_030405.json");
  });
});

describe("toReportFile", () => {
  it("lists scores and per-question results", () => {
    const finishedAt = new Date("2026-03-01T10:00:00.000Z");
    const report: EvaluationReport = {
      runId: "run-1",
      startedAt: finishedAt,
      finishedAt,
      records: [
        {
          runId: "run-1",
          question: "q",
          answer: "a",
          contexts: ["c"],
          faithfulness: 1,
          relevancy: 0.5,
          createdAt: finishedAt,
        },
      ],
      failures: [],
      aggregate: { faithfulness: 1, relevancy: 0.5, average: 0.75, count: 1 },
    };

    expect(toReportFile(report)).toEqual({
      runId: "run-1",
      timestamp: "2026-03-01T10:00:00.000Z",
      scores: { faithfulness: 1, answer_relevancy: 0.5, average: 0.75 },
      queries: [{ question: "q", answer: "a", contexts: ["c"], faithfulness: 1, relevancy: 0.5 }],
      failures: [],
    });
  });
});

describe("formatSummary", () => {
  it("prints each score with a percentage", () => {
    expect(formatSummary({ faithfulness: 0.8, relevancy: 0.5, average: 0.65, count: 2 })).toBe(
      "Faithfulness:     0.8000 (80.0%)\n" +
        "Answer Relevancy: 0.5000 (50.0%)\n" +
        "Average:          0.6500 (65.0%)",
    );
  });
});
