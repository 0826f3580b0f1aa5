import { describe, it, expect } from "vitest";
import { GenerationError } from "@groundwork/errors";
import type { RetrievalHit, RetrievalResult } from "@groundwork/types";
import { AnswerSynthesizer, NO_GROUNDING_ANSWER } from "./answer-synthesizer.js";
import { FAST_RETRY, ScriptedChatModel } from "./testing/fakes.js";

function hit(documentId: string, chunkIndex: number, score: number): RetrievalHit {
  const id = `${documentId}-${chunkIndex}`;
  return {
    record: {
      id,
      documentId,
      chunkId: id,
      chunkIndex,
      text: `Passage ${id}.`,
      filename: `${documentId}.txt`,
      uploadedAt: "2026-01-01T00:00:00.000Z",
      tokenCount: 2,
    },
    score,
  };
}

function retrieval(hits: RetrievalHit[]): RetrievalResult {
  return { question: "What?", hits, retrievalTimeMs: 1 };
}

const HITS = [hit("doc-a", 0, 0.9), hit("doc-b", 2, 0.7), hit("doc-a", 1, 0.5)];

describe("AnswerSynthesizer", () => {
  it("returns the templated non-answer without calling the model", async () => {
    const model = new ScriptedChatModel();
    const synthesizer = new AnswerSynthesizer({ model });

    const answer = await synthesizer.synthesize("What?", retrieval([]));

    expect(answer.text).toBe(NO_GROUNDING_ANSWER);
    expect(answer.citations).toEqual([]);
    expect(answer.grounded).toBe(false);
    expect(model.requests).toHaveLength(0);
  });

  it("sends labelled sources with bounded, low-temperature settings", async () => {
    const model = new ScriptedChatModel();
    const synthesizer = new AnswerSynthesizer({ model });

    await synthesizer.synthesize("What?", retrieval(HITS.slice(0, 1)));

    expect(model.requests).toHaveLength(1);
    expect(model.requests[0]).toMatchObject({
      maxTokens: 1024,
      temperature: 0.2,
      prompt:
        "Sources:\n\n[S1] (document: doc-a, chunk: 0)\nPassage doc-a-0.\n\nQuestion: What?\n\nAnswer:",
    });
    expect(model.requests[0]?.system).toContain("[S1]");
  });

  it("cites only the referenced sources, in label order", async () => {
    const model = new ScriptedChatModel(() => "Both agree [S3], see also [S1].");
    const synthesizer = new AnswerSynthesizer({ model });

    const answer = await synthesizer.synthesize("What?", retrieval(HITS));

    expect(answer.citations).toEqual([
      { documentId: "doc-a", chunkId: "doc-a-0", chunkIndex: 0, score: 0.9 },
      { documentId: "doc-a", chunkId: "doc-a-1", chunkIndex: 1, score: 0.5 },
    ]);
    expect(answer.confidence).toBeCloseTo(0.7, 10);
    expect(answer.grounded).toBe(true);
    expect(answer.model).toBe("scripted-1");
  });

  it("cites every source when the answer names none", async () => {
    const model = new ScriptedChatModel(() => "An answer without labels.");
    const synthesizer = new AnswerSynthesizer({ model });

    const answer = await synthesizer.synthesize("What?", retrieval(HITS));

    expect(answer.citations.map((c) => c.chunkId)).toEqual(["doc-a-0", "doc-b-2", "doc-a-1"]);
    expect(answer.confidence).toBeCloseTo(0.7, 10);
  });

  it("retries a failing model call", async () => {
    let attempts = 0;
    const model = new ScriptedChatModel(() => {
      attempts++;
      if (attempts < 3) throw new Error("502 bad gateway");
      return "Recovered [S1].";
    });
    const synthesizer = new AnswerSynthesizer({ model, retry: FAST_RETRY });

    const answer = await synthesizer.synthesize("What?", retrieval(HITS));

    expect(answer.text).toBe("Recovered [S1].");
    expect(attempts).toBe(3);
  });

  it("raises GenerationError once retries are exhausted", async () => {
    const model = new ScriptedChatModel(() => {
      throw new Error("502 bad gateway");
    });
    const synthesizer = new AnswerSynthesizer({ model, retry: FAST_RETRY });

    const error = await synthesizer.synthesize("What?", retrieval(HITS)).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GenerationError);
    expect(error).toMatchObject({
      code: "GENERATION_FAILED",
      message: "Generation failed: 502 bad gateway",
    });
    expect(model.requests).toHaveLength(3);
  });

  it("raises GENERATION_TIMEOUT when the signal aborts", async () => {
    const controller = new AbortController();
    const model = new ScriptedChatModel(() => {
      controller.abort();
      throw new Error("aborted");
    });
    const synthesizer = new AnswerSynthesizer({ model, retry: FAST_RETRY });

    const error = await synthesizer
      .synthesize("What?", retrieval(HITS), { signal: controller.signal })
      .catch((e: unknown) => e);

    expect(error).toMatchObject({ code: "GENERATION_TIMEOUT" });
    expect(model.requests).toHaveLength(1);
  });
});
