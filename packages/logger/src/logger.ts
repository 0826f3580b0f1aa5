import pino from "pino";
import type { DestinationStream, LoggerOptions, Logger as PinoLogger, TransportSingleOptions } from "pino";
import { REDACT_PATHS } from "./redact-paths.js";

/** Re-exported so packages log without depending on pino themselves. */
export type Logger = PinoLogger;

export interface CreateLoggerOptions {
  /** Defaults to "debug" under NODE_ENV=development, "info" otherwise. */
  level?: string;
  /** Written as `name` on every line. Default: "groundwork" */
  service?: string;
  /** JSON lines go here instead of stdout, never pretty-printed. */
  destination?: DestinationStream;
}

const PRETTY_TRANSPORT: TransportSingleOptions = {
  target: "pino-pretty",
  options: {
    colorize: true,
    translateTime: "SYS:standard",
    ignore: "pid,hostname",
  },
};

/**
 * Root logger for a process. Provider keys and credentials are censored
 * wherever they appear in bindings; development output is pretty-printed,
 * everything else is JSON.
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const development = process.env["NODE_ENV"] === "development";
  const settings: LoggerOptions = {
    level: options.level ?? (development ? "debug" : "info"),
    name: options.service ?? "groundwork",
    redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (options.destination) {
    return pino(settings, options.destination);
  }
  return pino(development ? { ...settings, transport: PRETTY_TRANSPORT } : settings);
}

/** Scoped logger, e.g. `{ component: "ingestion" }` or `{ documentId, runId }`. */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}

/** Drops everything; the default when a component is built without a logger. */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
