import { z } from "zod";
import type { EvaluationScores } from "@groundwork/types";
import { GenerationError } from "@groundwork/errors";
import type { IChatModel } from "@groundwork/llm";

export interface ScoringInput {
  question: string;
  answer: string;
  contexts: string[];
  reference?: string;
}

export interface IEvaluationScorer {
  readonly name: string;
  score(input: ScoringInput, signal?: AbortSignal): Promise<EvaluationScores>;
}

const judgeResponseSchema = z.object({
  faithfulness: z.number(),
  relevancy: z.number(),
});

const JUDGE_SYSTEM_PROMPT = [
  "You grade answers produced by a retrieval-augmented assistant.",
  'Reply with one JSON object: {"faithfulness": number, "relevancy": number}, both between 0 and 1.',
  "faithfulness: the share of the answer's claims supported by the contexts.",
  "relevancy: how directly the answer addresses the question.",
].join("\n");

function clamp(value: number): number {
  return Math.min(1, Math.max(0, value));
}

export function buildJudgePrompt(input: ScoringInput): string {
  const contexts = input.contexts.map((c, i) => `Context ${String(i + 1)}:\n${c}`).join("\n\n");
  const reference = input.reference ? `\n\nReference answer:\n${input.reference}` : "";

  return `Question:\n${input.question}\n\n${contexts || "No contexts were retrieved."}\n\nAnswer:\n${input.answer}${reference}`;
}

/** Scores with a chat model acting as judge. */
export class LlmJudgeScorer implements IEvaluationScorer {
  readonly name = "llm-judge";

  constructor(private readonly model: IChatModel) {}

  async score(input: ScoringInput, signal?: AbortSignal): Promise<EvaluationScores> {
    const result = await this.model.complete({
      system: JUDGE_SYSTEM_PROMPT,
      prompt: buildJudgePrompt(input),
      maxTokens: 200,
      temperature: 0,
      responseFormat: "json",
      signal,
    });

    let raw: unknown;
    try {
      raw = JSON.parse(result.text);
    } catch (err: unknown) {
      throw new GenerationError("Judge reply is not JSON", this.model.name, { cause: err });
    }

    const parsed = judgeResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new GenerationError("Judge reply is missing scores", this.model.name, {
        details: { issues: parsed.error.issues.map((i) => i.message) },
      });
    }

    return {
      faithfulness: clamp(parsed.data.faithfulness),
      relevancy: clamp(parsed.data.relevancy),
    };
  }
}
