import type { EvaluationQuestion } from "@groundwork/types";

/** Generic questions that suit most document collections. */
export const DEFAULT_EVALUATION_QUESTIONS: readonly EvaluationQuestion[] = [
  {
    question: "What is the main topic of the documents?",
    reference: "A short statement of the subject the documents cover.",
  },
  {
    question: "What are the key points made in the documents?",
    reference: "A list of the principal claims or findings.",
  },
  {
    question: "Which methods or approaches are described?",
    reference: "The procedures, techniques or approaches the documents explain.",
  },
  {
    question: "What conclusions or recommendations are given?",
    reference: "The conclusions the authors draw or the actions they recommend.",
  },
  {
    question: "What limitations or open issues are mentioned?",
    reference: "Caveats, risks or unanswered questions the documents acknowledge.",
  },
];
