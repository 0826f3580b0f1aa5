import type { JobsOptions } from "bullmq";
import type { IIngestionScheduler, IngestJobData, RunHandle } from "@groundwork/types";
import { createSilentLogger } from "@groundwork/logger";
import type { Logger } from "@groundwork/logger";
import { INGEST_JOB_NAME } from "./queues.js";

/** The slice of a BullMQ queue the scheduler uses. */
export interface IngestQueue {
  add(name: string, data: IngestJobData, opts?: JobsOptions): Promise<unknown>;
  getJob(
    jobId: string,
  ): Promise<{ getState(): Promise<string>; remove(): Promise<void> } | undefined>;
  close(): Promise<void>;
}

const CANCELLABLE_STATES = new Set(["waiting", "delayed", "prioritized", "waiting-children"]);

/**
 * Hands runs to the worker process through the ingest queue. The run id is
 * the job id, so the same run is never queued twice.
 */
export class BullMqScheduler implements IIngestionScheduler {
  private readonly logger: Logger;

  constructor(
    private readonly queue: IngestQueue,
    logger?: Logger,
  ) {
    this.logger = logger ?? createSilentLogger();
  }

  async schedule(job: IngestJobData): Promise<RunHandle> {
    await this.queue.add(INGEST_JOB_NAME, job, { jobId: job.runId });
    this.logger.debug({ documentId: job.documentId, runId: job.runId }, "Ingest job queued");
    return { runId: job.runId, documentId: job.documentId };
  }

  /**
   * Only a run still waiting in the queue can be withdrawn. An active run
   * belongs to a worker and finishes its current step.
   */
  async cancel(runId: string): Promise<boolean> {
    const job = await this.queue.getJob(runId);
    if (!job) {
      return false;
    }

    const state = await job.getState();
    if (!CANCELLABLE_STATES.has(state)) {
      this.logger.info({ runId, state }, "Run is not cancellable from the queue");
      return false;
    }

    await job.remove();
    this.logger.info({ runId }, "Queued run cancelled");
    return true;
  }

  async close(): Promise<void> {
    await this.queue.close();
  }
}
