import { v5 as uuidv5 } from "uuid";

/** Fixed namespace for chunk ids; changing it re-keys every indexed record. */
const CHUNK_NAMESPACE = "8b5c0e47-2f5a-4c1e-9a43-5d0f7e6b2c91";

/** Deterministic id of the chunk at `index` in a document. */
export function chunkId(documentId: string, index: number): string {
  return uuidv5(`${documentId}:${index}`, CHUNK_NAMESPACE);
}
