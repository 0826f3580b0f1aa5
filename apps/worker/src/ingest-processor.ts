import type { DeadLetterJobData, Document, IngestJobData } from "@groundwork/types";
import type { IngestionWorkflow } from "@groundwork/core";
import { ExternalServiceError } from "@groundwork/errors";
import type { Logger } from "@groundwork/logger";
import { DEAD_LETTER_JOB_NAME, deadLetterEntry } from "@groundwork/queue";

/** Failure codes worth another attempt; the rerun resumes from checkpoints. */
export const RETRYABLE_FAILURE_CODES: ReadonlySet<string> = new Set([
  "EMBEDDING_FAILED",
  "INDEX_WRITE_FAILED",
]);

export interface IngestJob {
  id?: string;
  data: IngestJobData;
  attemptsMade: number;
  opts: { attempts?: number };
}

export interface DeadLetterSink {
  add(name: string, data: DeadLetterJobData): Promise<unknown>;
}

/**
 * Runs one queued ingestion. A run that ends `failed` with a retryable code
 * throws so BullMQ schedules another attempt; any other outcome completes
 * the job, with the failure recorded on the document.
 */
export function createIngestProcessor(workflow: IngestionWorkflow, logger: Logger) {
  return async (job: IngestJob): Promise<Document> => {
    const { documentId, runId } = job.data;
    // A retried reindex resumes instead of wiping the first attempt's work
    const reindex = job.data.reindex && job.attemptsMade === 0;
    const log = logger.child({ documentId, runId, attempt: job.attemptsMade + 1 });

    const document = await workflow.run(documentId, { runId, reindex });

    if (document.state === "failed" && document.failure) {
      const { code, step, message } = document.failure;
      if (RETRYABLE_FAILURE_CODES.has(code)) {
        log.warn({ code, step }, "Retryable ingestion failure");
        throw new ExternalServiceError(`Ingestion failed at ${step}: ${message}`, "ingestion", {
          code,
          details: { documentId, step },
        });
      }
      log.error({ code, step }, "Ingestion failed permanently");
    }

    return document;
  };
}

/** Copies a job that used its last attempt to the dead-letter queue. */
export async function moveToDeadLetter(
  job: IngestJob,
  error: Error,
  queueName: string,
  deadLetter: DeadLetterSink,
  logger: Logger,
): Promise<boolean> {
  const attempts = job.opts.attempts ?? 1;
  if (job.attemptsMade < attempts) {
    return false;
  }

  await deadLetter.add(
    DEAD_LETTER_JOB_NAME,
    deadLetterEntry(job.data, queueName, error.message, job.attemptsMade),
  );
  logger.error(
    { jobId: job.id, documentId: job.data.documentId, attemptsMade: job.attemptsMade },
    "Job moved to dead-letter queue",
  );
  return true;
}
