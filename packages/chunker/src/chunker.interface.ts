import type { ChunkResult, ChunkStrategy, ChunkingConfig } from "@groundwork/types";

export interface IChunker {
  readonly strategy: ChunkStrategy;
  chunk(content: string, config: ChunkingConfig): ChunkResult[];
}
