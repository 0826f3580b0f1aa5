import type { ChunkResult } from "@groundwork/types";
import { ValidationError } from "@groundwork/errors";
import type { Token, TokenRange } from "./tokenizer.js";

export function assertWindow(maxTokens: number, overlap: number): void {
  const fields: Record<string, string> = {};
  if (!Number.isInteger(maxTokens) || maxTokens <= 0) {
    fields["maxTokens"] = "must be a positive integer";
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= maxTokens) {
    fields["overlap"] = "must be an integer with 0 <= overlap < maxTokens";
  }
  if (Object.keys(fields).length > 0) {
    throw new ValidationError("Invalid chunking window", fields);
  }
}

/** Breaks any range longer than `maxTokens` into single-token units. */
function boundUnits(units: TokenRange[], maxTokens: number): TokenRange[] {
  const bounded: TokenRange[] = [];
  for (const unit of units) {
    if (unit.end - unit.start <= maxTokens) {
      bounded.push(unit);
      continue;
    }
    for (let i = unit.start; i < unit.end; i++) {
      bounded.push({ start: i, end: i + 1 });
    }
  }
  return bounded;
}

/**
 * Greedy sliding-window packing.
 *
 * The first unit always enters a chunk; further units enter while the chunk
 * stays within `maxTokens`. The next chunk re-includes the trailing `overlap`
 * tokens of the previous one, shortened only as far as needed for its first
 * unit to fit.
 */
export function packUnits(
  text: string,
  tokens: Token[],
  units: TokenRange[],
  maxTokens: number,
  overlap: number,
): ChunkResult[] {
  const bounded = boundUnits(units, maxTokens);
  const results: ChunkResult[] = [];

  let start = 0;
  let previousEnd = 0;
  let u = 0;

  while (u < bounded.length) {
    const first = bounded[u];
    if (!first) break;
    let end = first.end;
    u++;

    for (let next = bounded[u]; next && next.end - start <= maxTokens; next = bounded[u]) {
      end = next.end;
      u++;
    }

    const firstToken = tokens[start];
    const lastToken = tokens[end - 1];
    if (!firstToken || !lastToken) break;

    results.push({
      content: text.slice(firstToken.start, lastToken.end),
      index: results.length,
      tokenCount: end - start,
      metadata: {
        tokenStart: start,
        tokenEnd: end,
        startChar: firstToken.start,
        endChar: lastToken.end,
        overlap: results.length === 0 ? 0 : Math.max(0, previousEnd - start),
      },
    });

    previousEnd = end;
    const upcoming = bounded[u];
    if (upcoming) {
      start = Math.max(end - overlap, upcoming.end - maxTokens);
    }
  }

  return results;
}
