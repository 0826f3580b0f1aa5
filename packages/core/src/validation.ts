import { z } from "zod";
import { ValidationError } from "@groundwork/errors";

export const MAX_K = 50;

/**
 * Allowlist-only request schemas. Unknown fields are rejected so callers
 * find typos instead of having them silently ignored.
 */
export const documentUploadSchema = z
  .object({
    documentId: z.string().trim().min(1).max(200).optional(),
    filename: z.string().trim().min(1).max(500),
    path: z.string().min(1).optional(),
    content: z.string().optional(),
    contentBase64: z.string().min(1).base64().optional(),
    mimeType: z.string().min(1).optional(),
  })
  .strict()
  .refine(
    (input) =>
      [input.path, input.content, input.contentBase64].filter((v) => v !== undefined).length === 1,
    {
      message: "Exactly one of path, content or contentBase64 is required",
      path: ["content"],
    },
  );

export const retrievalRequestSchema = z
  .object({
    question: z.string().trim().min(1, "question must not be empty"),
    k: z.number().int().min(1).max(MAX_K).optional(),
    documentIds: z.array(z.string().min(1)).min(1).optional(),
  })
  .strict();

export const queryRequestSchema = retrievalRequestSchema
  .extend({
    timeoutMs: z.number().int().positive().max(300_000).optional(),
  })
  .strict();

export const evaluationRequestSchema = z
  .object({
    questions: z
      .array(
        z
          .object({
            question: z.string().trim().min(1),
            reference: z.string().optional(),
          })
          .strict(),
      )
      .min(1)
      .optional(),
    k: z.number().int().min(1).max(MAX_K).optional(),
  })
  .strict();

/**
 * Parse a boundary input, surfacing every problem as one ValidationError whose
 * `fields` maps each path to its first message.
 */
export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const fields: Record<string, string> = {};
  for (const issue of result.error.issues) {
    const key = issue.path.length > 0 ? issue.path.join(".") : "_";
    fields[key] ??= issue.message;
  }
  throw new ValidationError("Invalid request", fields);
}
