import type { Document, IIngestionScheduler, IngestJobData, RunHandle } from "@groundwork/types";
import { createSilentLogger } from "@groundwork/logger";
import type { Logger } from "@groundwork/logger";
import type { IngestionWorkflow } from "./ingestion-workflow.js";

interface ActiveRun {
  handle: RunHandle & { done: Promise<Document> };
  controller: AbortController;
}

/**
 * Runs workflows as detached promises in this process. Each run gets an
 * AbortController so it can be cancelled between steps.
 */
export class InProcessScheduler implements IIngestionScheduler {
  private runs = new Map<string, ActiveRun>();
  private logger: Logger;

  constructor(
    private readonly workflow: IngestionWorkflow,
    logger?: Logger,
  ) {
    this.logger = logger ?? createSilentLogger();
  }

  async schedule(job: IngestJobData): Promise<RunHandle> {
    const controller = new AbortController();

    const done = this.workflow
      .run(job.documentId, { runId: job.runId, reindex: job.reindex, signal: controller.signal })
      .finally(() => this.runs.delete(job.runId));

    // Step failures are recorded on the document; only preconditions reject
    void done.catch((err: unknown) =>
      this.logger.error({ err, documentId: job.documentId, runId: job.runId }, "Run rejected"),
    );

    const handle = { runId: job.runId, documentId: job.documentId, done };
    this.runs.set(job.runId, { handle, controller });
    return handle;
  }

  async cancel(runId: string): Promise<boolean> {
    const run = this.runs.get(runId);
    if (!run) {
      return false;
    }
    run.controller.abort();
    return true;
  }

  get activeRuns(): number {
    return this.runs.size;
  }

  /** Wait for every run started so far to settle. */
  async drain(): Promise<void> {
    await Promise.allSettled([...this.runs.values()].map((run) => run.handle.done));
  }

  async close(): Promise<void> {
    for (const run of this.runs.values()) {
      run.controller.abort();
    }
    await this.drain();
  }
}
