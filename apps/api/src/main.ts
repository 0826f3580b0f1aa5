import { parseEnv } from "@groundwork/config";
import { createLogger } from "@groundwork/logger";
import { createRuntime } from "@groundwork/runtime";
import { createApp } from "./app.js";

async function main(): Promise<void> {
  const config = parseEnv();
  const logger = createLogger({ level: config.logLevel, service: "groundwork-api" });
  const runtime = await createRuntime(config, logger, { role: "api" });
  const app = createApp(runtime, logger.child({ component: "http" }));

  const server = app.listen(config.port, () => {
    logger.info({ port: config.port }, "API listening");
  });

  const shutdown = async (): Promise<void> => {
    logger.info("Shutting down API");
    await new Promise<void>((resolve, reject) =>
      server.close((err) => (err ? reject(err) : resolve())),
    );
    await runtime.shutdown();
    logger.info("API closed");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown());
  process.on("SIGINT", () => void shutdown());
}

main().catch((err: unknown) => {
  console.error("[api] Fatal error:", err);
  process.exit(1);
});
