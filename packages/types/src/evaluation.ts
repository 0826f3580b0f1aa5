export interface EvaluationQuestion {
  question: string;
  reference?: string;
}

export interface EvaluationScores {
  faithfulness: number;
  relevancy: number;
}

export interface EvaluationRecord extends EvaluationScores {
  runId: string;
  question: string;
  reference?: string;
  answer: string;
  contexts: string[];
  createdAt: Date;
}

export interface EvaluationFailure {
  question: string;
  code: string;
  message: string;
}

export interface EvaluationAggregate extends EvaluationScores {
  average: number;
  count: number;
}

export interface EvaluationReport {
  runId: string;
  startedAt: Date;
  finishedAt: Date;
  records: EvaluationRecord[];
  failures: EvaluationFailure[];
  aggregate: EvaluationAggregate;
}

/** Append-only destination for evaluation records. */
export interface IEvaluationSink {
  append(record: EvaluationRecord): Promise<void>;
}
