import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import type { EvaluationRecord, IEvaluationSink } from "@groundwork/types";

export class InMemoryEvaluationSink implements IEvaluationSink {
  readonly records: EvaluationRecord[] = [];

  async append(record: EvaluationRecord): Promise<void> {
    this.records.push({ ...record, contexts: [...record.contexts] });
  }
}

/** One JSON object per line, appended. */
export class JsonFileEvaluationSink implements IEvaluationSink {
  constructor(readonly path: string) {}

  async append(record: EvaluationRecord): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    await appendFile(this.path, `${JSON.stringify(record)}\n`, "utf8");
  }
}
