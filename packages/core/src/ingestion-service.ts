import { randomUUID } from "node:crypto";
import type { z } from "zod";
import type {
  Document,
  DocumentSource,
  DocumentStatusView,
  IIngestionScheduler,
  IWorkflowStore,
  RunHandle,
  WorkflowState,
} from "@groundwork/types";
import { DOCUMENT_STATUS_BY_STATE } from "@groundwork/types";
import { ConflictError, NotFoundError } from "@groundwork/errors";
import { detectMimeType } from "@groundwork/parser";
import type { VectorIndex } from "@groundwork/vector-store";
import { createSilentLogger } from "@groundwork/logger";
import type { Logger } from "@groundwork/logger";
import { resolveUploadPath, storeUpload } from "./document-source.js";
import { documentUploadSchema, parseInput } from "./validation.js";

const IN_FLIGHT_STATES: ReadonlySet<WorkflowState> = new Set(["splitting", "embedding", "indexing"]);

type DocumentUpload = z.output<typeof documentUploadSchema>;

export interface IngestionServiceDependencies {
  store: IWorkflowStore;
  scheduler: IIngestionScheduler;
  index: VectorIndex;
  /** Uploaded files live here; `path` inputs resolve against it. */
  uploadDir: string;
  logger?: Logger;
}

export function toStatusView(document: Document): DocumentStatusView {
  return {
    documentId: document.id,
    filename: document.filename,
    state: document.state,
    status: DOCUMENT_STATUS_BY_STATE[document.state],
    chunkCount: document.chunkCount,
    failure: document.failure,
    uploadedAt: document.uploadedAt,
    updatedAt: document.updatedAt,
  };
}

/**
 * Entry points for ingestion: accept a document, hand its run to the
 * scheduler and answer status queries. Submission returns as soon as the
 * run is scheduled.
 */
export class IngestionService {
  private readonly logger: Logger;

  constructor(private readonly deps: IngestionServiceDependencies) {
    this.logger = deps.logger ?? createSilentLogger();
  }

  async submit(input: unknown): Promise<RunHandle> {
    const upload = parseInput(documentUploadSchema, input);
    const documentId = upload.documentId ?? randomUUID();

    if (await this.deps.store.getDocument(documentId)) {
      throw new ConflictError(`Document ${documentId} already exists; request a re-index instead`, {
        details: { documentId },
      });
    }

    const now = new Date();
    await this.deps.store.createDocument({
      id: documentId,
      filename: upload.filename,
      mimeType: upload.mimeType ?? detectMimeType(upload.filename),
      source: await this.toSource(documentId, upload),
      state: "received",
      chunkCount: 0,
      failure: null,
      uploadedAt: now,
      updatedAt: now,
    });

    const handle = await this.deps.scheduler.schedule({
      documentId,
      runId: randomUUID(),
      reindex: false,
    });
    this.logger.info({ documentId, runId: handle.runId, filename: upload.filename }, "Document accepted");
    return handle;
  }

  async status(documentId: string): Promise<DocumentStatusView> {
    return toStatusView(await this.require(documentId));
  }

  async list(): Promise<DocumentStatusView[]> {
    return (await this.deps.store.listDocuments()).map(toStatusView);
  }

  async reindex(documentId: string): Promise<RunHandle> {
    this.assertSettled(await this.require(documentId), "re-indexed");
    const handle = await this.deps.scheduler.schedule({
      documentId,
      runId: randomUUID(),
      reindex: true,
    });
    this.logger.info({ documentId, runId: handle.runId }, "Re-index scheduled");
    return handle;
  }

  /**
   * Index records go first, then the document and its checkpoints. A document
   * mid-run is refused; one still waiting in `received` may go, since its run
   * discards whatever it wrote once it finds the document gone.
   */
  async delete(documentId: string): Promise<void> {
    const document = await this.require(documentId);
    if (IN_FLIGHT_STATES.has(document.state)) {
      throw new ConflictError(`Document ${documentId} is being ingested; try again once it settles`, {
        details: { documentId, state: document.state },
      });
    }
    await this.deps.index.deleteDocument(documentId);
    await this.deps.store.deleteDocument(documentId);
    this.logger.info({ documentId }, "Document deleted");
  }

  private async toSource(documentId: string, upload: DocumentUpload): Promise<DocumentSource> {
    const { uploadDir } = this.deps;
    if (upload.path !== undefined) {
      return { type: "file", path: resolveUploadPath(uploadDir, upload.path) };
    }
    if (upload.contentBase64 !== undefined) {
      const bytes = Buffer.from(upload.contentBase64, "base64");
      return { type: "file", path: await storeUpload(uploadDir, documentId, upload.filename, bytes) };
    }
    return { type: "inline", content: upload.content ?? "" };
  }

  private assertSettled(document: Document, action: string): void {
    if (document.state !== "completed" && document.state !== "failed") {
      throw new ConflictError(
        `Document ${document.id} cannot be ${action} while ${document.state}`,
        { details: { documentId: document.id, state: document.state } },
      );
    }
  }

  private async require(documentId: string): Promise<Document> {
    const document = await this.deps.store.getDocument(documentId);
    if (!document) {
      throw new NotFoundError(`Document ${documentId} not found`);
    }
    return document;
  }
}
