import type { ChunkResult, ChunkingConfig } from "@groundwork/types";
import type { IChunker } from "./chunker.interface.js";
import { sentenceRanges, tokenize } from "./tokenizer.js";
import { assertWindow, packUnits } from "./packer.js";

/**
 * Sentence-aware chunker.
 * Packs whole sentences until the token limit, carrying `overlap` tokens
 * across each boundary. Sentences longer than the limit are hard-split.
 */
export class SentenceChunker implements IChunker {
  readonly strategy = "sentence";

  chunk(content: string, config: ChunkingConfig): ChunkResult[] {
    const { maxTokens, overlap } = config;
    assertWindow(maxTokens, overlap);

    const tokens = tokenize(content);
    return packUnits(content, tokens, sentenceRanges(content, tokens), maxTokens, overlap);
  }
}
