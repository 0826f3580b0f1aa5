import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { parseArgs } from "node:util";
import { parseEnv } from "@groundwork/config";
import { evaluationRequestSchema, parseInput } from "@groundwork/core";
import { createLogger } from "@groundwork/logger";
import { createRuntime } from "@groundwork/runtime";
import { formatSummary, reportFilename, toReportFile } from "./evaluation-report.js";

const USAGE = "Usage: evaluate [--questions <file.json>] [--k <n>] [--out <dir>]";

async function main(): Promise<number> {
  const { values } = parseArgs({
    options: {
      questions: { type: "string" },
      k: { type: "string" },
      out: { type: "string", default: "." },
      help: { type: "boolean", short: "h" },
    },
  });
  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  const config = parseEnv();
  const logger = createLogger({ level: config.logLevel, service: "groundwork-evaluate" });

  const questions: unknown = values.questions
    ? JSON.parse(await readFile(values.questions, "utf8"))
    : undefined;
  const request = parseInput(evaluationRequestSchema, {
    ...(questions !== undefined ? { questions } : {}),
    ...(values.k !== undefined ? { k: Number(values.k) } : {}),
  });

  const runtime = await createRuntime(config, logger, { role: "cli" });
  try {
    const report = await runtime
      .createEvaluationHarness()
      .evaluate(request.questions, request.k !== undefined ? { k: request.k } : {});

    if (report.records.length === 0) {
      logger.error({ failures: report.failures }, "No question could be evaluated; is anything indexed?");
      return 1;
    }

    const path = join(values.out ?? ".", reportFilename(report.finishedAt));
    await writeFile(path, `${JSON.stringify(toReportFile(report), null, 2)}\n`, "utf8");

    console.log(formatSummary(report.aggregate));
    logger.info({ path, failures: report.failures.length }, "Evaluation saved");
    return 0;
  } finally {
    await runtime.shutdown();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    console.error("[evaluate] Fatal error:", err);
    process.exit(1);
  });
