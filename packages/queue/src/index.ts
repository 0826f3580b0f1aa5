export {
  QUEUE_NAMES,
  INGEST_JOB_NAME,
  INGEST_JOB_OPTIONS,
  createQueues,
  parseRedisConnection,
  type QueueConfig,
  type Queues,
} from "./queues.js";
export {
  DEAD_LETTER_JOB_NAME,
  DLQ_NAME,
  createDeadLetterQueue,
  deadLetterEntry,
  type DeadLetterQueue,
} from "./dlq.js";
export { BullMqScheduler, type IngestQueue } from "./bullmq-scheduler.js";
