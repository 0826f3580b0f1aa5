import type { Document } from "./document.js";

export interface IngestJobData {
  documentId: string;
  runId: string;
  reindex: boolean;
}

export interface DeadLetterJobData extends IngestJobData {
  originalQueue: string;
  failureReason: string;
  attemptsMade: number;
}

export interface RunHandle {
  runId: string;
  documentId: string;
  /** Settles when the run ends; absent when the run executes in another process. */
  done?: Promise<Document>;
}

export interface IIngestionScheduler {
  schedule(job: IngestJobData): Promise<RunHandle>;
  cancel(runId: string): Promise<boolean>;
  close(): Promise<void>;
}
