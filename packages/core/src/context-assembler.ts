import type { RetrievalHit } from "@groundwork/types";

export const ANSWER_SYSTEM_PROMPT = [
  "You answer questions using only the numbered sources provided.",
  "Cite every source you rely on with its label, for example [S1].",
  "If the sources do not contain the answer, say that you do not know.",
].join(" ");

export function sourceLabel(position: number): string {
  return `[S${String(position + 1)}]`;
}

/**
 * Numbered context block. Each source carries its label and the document and
 * chunk it came from, so the model's citations can be traced back.
 */
export function assembleContext(hits: RetrievalHit[]): string {
  if (hits.length === 0) return "";

  const parts = hits.map(
    (hit, i) =>
      `${sourceLabel(i)} (document: ${hit.record.documentId}, chunk: ${String(hit.record.chunkIndex)})\n${hit.record.text}`,
  );

  return parts.join("\n\n");
}

export function buildAnswerPrompt(question: string, hits: RetrievalHit[]): string {
  return `Sources:\n\n${assembleContext(hits)}\n\nQuestion: ${question}\n\nAnswer:`;
}

/**
 * Zero-based positions of the sources an answer cites, ascending. Labels
 * outside the source range are ignored.
 */
export function citedSourcePositions(answer: string, sourceCount: number): number[] {
  const positions = new Set<number>();

  for (const match of answer.matchAll(/\[S(\d+)\]/g)) {
    const position = Number(match[1]) - 1;
    if (position >= 0 && position < sourceCount) {
      positions.add(position);
    }
  }

  return [...positions].sort((a, b) => a - b);
}
