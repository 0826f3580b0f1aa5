export type { IChunker } from "./chunker.interface.js";
export { SentenceChunker } from "./sentence-chunker.js";
export { FixedChunker } from "./fixed-chunker.js";
export { createChunker } from "./factory.js";
export { tokenize } from "./tokenizer.js";
export type { Token } from "./tokenizer.js";
