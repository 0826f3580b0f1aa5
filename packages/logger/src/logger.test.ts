import { describe, it, expect } from "vitest";
import { Writable } from "node:stream";
import pino from "pino";
import { createLogger, createChildLogger, createSilentLogger } from "./logger.js";
import { REDACT_PATHS } from "./redact-paths.js";

function capture(): { stream: Writable; lines: () => unknown[] } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  const lines = (): unknown[] =>
    chunks
      .join("")
      .split("\n")
      .filter((line) => line.length > 0)
      .map((line): unknown => JSON.parse(line));
  return { stream, lines };
}

describe("REDACT_PATHS", () => {
  it("covers each key at the top level and one level down", () => {
    const topLevel = REDACT_PATHS.filter((p) => !p.startsWith("*."));
    const nested = REDACT_PATHS.filter((p) => p.startsWith("*."));

    expect(topLevel.length).toBe(nested.length);
    for (const key of topLevel) {
      expect(REDACT_PATHS).toContain(`*.${key}`);
    }
    expect(REDACT_PATHS).toContain("apiKey");
    expect(REDACT_PATHS).toContain("*.authorization");
  });

  it("censors provider keys in nested bindings", () => {
    const { stream, lines } = capture();
    const logger = pino({ redact: { paths: REDACT_PATHS, censor: "[REDACTED]" } }, stream);

    logger.info({ embedding: { apiKey: "test-secret", model: "m" } }, "configured");

    expect(lines()[0]).toMatchObject({ embedding: { apiKey: "[REDACTED]", model: "m" } });
  });
});

describe("createLogger", () => {
  it("uses the requested level and service name", () => {
    const logger = createLogger({ level: "warn", service: "worker" });
    expect(logger.level).toBe("warn");
    expect(logger.bindings()).toMatchObject({ name: "worker" });
  });

  it("creates child loggers with bindings", () => {
    const child = createChildLogger(createLogger({ level: "error" }), { component: "ingestion" });
    expect(child.bindings()).toMatchObject({ component: "ingestion" });
  });

  it("writes redacted JSON lines to a given destination", () => {
    const { stream, lines } = capture();
    const logger = createLogger({ service: "api", destination: stream });

    logger.info({ generation: { apiKey: "test-key" } }, "ready");

    expect(lines()[0]).toMatchObject({
      level: 30,
      name: "api",
      msg: "ready",
      generation: { apiKey: "[REDACTED]" },
    });
  });

  it("creates a silent logger", () => {
    expect(createSilentLogger().level).toBe("silent");
  });
});
