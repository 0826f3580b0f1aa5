import { Worker } from "bullmq";
import { parseEnv } from "@groundwork/config";
import { createLogger } from "@groundwork/logger";
import { createRuntime } from "@groundwork/runtime";
import type { IngestJobData } from "@groundwork/types";
import { QUEUE_NAMES, createDeadLetterQueue, parseRedisConnection } from "@groundwork/queue";
import { errorMessage } from "@groundwork/errors";
import { createIngestProcessor, moveToDeadLetter } from "./ingest-processor.js";

async function main(): Promise<void> {
  const config = parseEnv();
  const logger = createLogger({ level: config.logLevel, service: "groundwork-worker" });

  if (!config.redis) {
    throw new Error("REDIS_URL is required to run the worker");
  }
  if (!config.database) {
    logger.warn("DATABASE_URL is not set; workflow state will not be shared with the API");
  }

  const runtime = await createRuntime(config, logger, { role: "worker" });
  const connection = parseRedisConnection(config.redis.url);
  const deadLetterQueue = createDeadLetterQueue(connection);
  const processIngest = createIngestProcessor(runtime.workflow, logger);

  const worker = new Worker<IngestJobData>(QUEUE_NAMES.INGEST, async (job) => processIngest(job), {
    connection,
    concurrency: config.worker.concurrency,
  });

  worker.on("failed", (job, err) => {
    if (!job) return;
    moveToDeadLetter(job, err, QUEUE_NAMES.INGEST, deadLetterQueue, logger).catch(
      (dlqErr: unknown) =>
        logger.error({ jobId: job.id, err: errorMessage(dlqErr) }, "Dead-letter write failed"),
    );
  });
  worker.on("error", (err) => logger.error({ err }, "Worker error"));

  logger.info(
    { queue: QUEUE_NAMES.INGEST, concurrency: config.worker.concurrency },
    "Worker started",
  );

  const shutdown = async (): Promise<void> => {
    logger.info("Shutting down worker");
    await worker.close();
    await deadLetterQueue.close();
    await runtime.shutdown();
    logger.info("Worker closed");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown());
  process.on("SIGINT", () => void shutdown());
}

main().catch((err: unknown) => {
  console.error("[worker] Fatal error:", err);
  process.exit(1);
});
