import { Queue } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import type { DeadLetterJobData, IngestJobData } from "@groundwork/types";

/** Ingest runs that used every attempt. Nothing consumes this queue. */
export const DLQ_NAME = "groundwork-dead-letter";
export const DEAD_LETTER_JOB_NAME = "dead-letter";

export type DeadLetterQueue = Queue<DeadLetterJobData>;

export function deadLetterEntry(
  job: IngestJobData,
  originalQueue: string,
  failureReason: string,
  attemptsMade: number,
): DeadLetterJobData {
  return {
    documentId: job.documentId,
    runId: job.runId,
    reindex: job.reindex,
    originalQueue,
    failureReason,
    attemptsMade,
  };
}

/** Entries stay until removed by hand, so a failed run can be inspected and resubmitted. */
export function createDeadLetterQueue(connection: ConnectionOptions): DeadLetterQueue {
  return new Queue<DeadLetterJobData>(DLQ_NAME, {
    connection,
    defaultJobOptions: { removeOnComplete: false, removeOnFail: false },
  });
}
