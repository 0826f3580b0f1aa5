import type { ChunkResult, ChunkingConfig } from "@groundwork/types";
import type { IChunker } from "./chunker.interface.js";
import { tokenize, tokenRanges } from "./tokenizer.js";
import { assertWindow, packUnits } from "./packer.js";

/**
 * Fixed token-count windows chunker.
 * Windows of exactly `maxTokens` tokens with stride `maxTokens - overlap`.
 */
export class FixedChunker implements IChunker {
  readonly strategy = "fixed";

  chunk(content: string, config: ChunkingConfig): ChunkResult[] {
    const { maxTokens, overlap } = config;
    assertWindow(maxTokens, overlap);

    const tokens = tokenize(content);
    return packUnits(content, tokens, tokenRanges(tokens), maxTokens, overlap);
  }
}
