import type { ChunkStrategy } from "@groundwork/types";
import type { IChunker } from "./chunker.interface.js";
import { FixedChunker } from "./fixed-chunker.js";
import { SentenceChunker } from "./sentence-chunker.js";

export function createChunker(strategy: ChunkStrategy): IChunker {
  switch (strategy) {
    case "sentence":
      return new SentenceChunker();
    case "fixed":
      return new FixedChunker();
    default:
      throw new Error(`Unknown chunking strategy: ${String(strategy)}`);
  }
}
