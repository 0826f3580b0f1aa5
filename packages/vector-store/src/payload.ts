import { z } from "zod";
import type { IndexedRecord } from "@groundwork/types";
import type { StoredPayload } from "./vector-store.interface.js";

export const storedPayloadSchema = z.object({
  documentId: z.string(),
  chunkId: z.string(),
  chunkIndex: z.number().int().nonnegative(),
  text: z.string(),
  filename: z.string(),
  uploadedAt: z.string(),
  tokenCount: z.number().int().nonnegative(),
  visible: z.boolean(),
});

export function toStoredPayload(record: IndexedRecord, visible: boolean): StoredPayload {
  return {
    documentId: record.documentId,
    chunkId: record.chunkId,
    chunkIndex: record.chunkIndex,
    text: record.text,
    filename: record.filename,
    uploadedAt: record.uploadedAt,
    tokenCount: record.tokenCount,
    visible,
  };
}
