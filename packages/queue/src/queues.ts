import { Queue } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import type { IngestJobData } from "@groundwork/types";

export const QUEUE_NAMES = {
  INGEST: "groundwork-ingest",
} as const;

export const INGEST_JOB_NAME = "ingest";

export interface QueueConfig {
  connection: ConnectionOptions;
}

export const INGEST_JOB_OPTIONS = {
  attempts: 3,
  backoff: {
    type: "exponential" as const,
    delay: 1000,
  },
  removeOnComplete: { count: 1000 },
  removeOnFail: { count: 5000 },
};

export function createQueues(config: QueueConfig) {
  const ingestQueue = new Queue<IngestJobData>(QUEUE_NAMES.INGEST, {
    connection: config.connection,
    defaultJobOptions: INGEST_JOB_OPTIONS,
  });

  return { ingestQueue };
}

export type Queues = ReturnType<typeof createQueues>;

export function parseRedisConnection(url: string): ConnectionOptions {
  const parsed = new URL(url);
  return {
    host: parsed.hostname,
    port: Number(parsed.port) || 6379,
    password: parsed.password || undefined,
    ...(parsed.username ? { username: parsed.username } : {}),
    // Required by BullMQ workers
    maxRetriesPerRequest: null,
  };
}
