import { z } from "zod";
import type { AppConfig, EmbeddingProviderType } from "@groundwork/types";

const DEFAULT_EMBEDDING_MODELS: Record<EmbeddingProviderType, { model: string; dimensions: number }> =
  {
    openai: { model: "text-embedding-3-large", dimensions: 3072 },
    cohere: { model: "embed-v4.0", dimensions: 1024 },
  };

const positiveInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

/**
 * Zod schema for all environment variables defined in .env.example.
 * Validates, transforms, and provides defaults so that the resulting
 * object is a strongly-typed AppConfig.
 */
export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    PORT: positiveInt("3000"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
    UPLOAD_DIR: z.string().min(1).default("uploads"),

    // ---------- Embeddings ----------
    EMBEDDING_PROVIDER: z.enum(["openai", "cohere"]).default("openai"),
    EMBEDDING_MODEL: z.string().min(1).optional(),
    EMBEDDING_DIMENSIONS: z.string().transform(Number).pipe(z.number().int().positive()).optional(),
    EMBEDDING_BATCH_SIZE: positiveInt("64"),
    OPENAI_API_KEY: z.string().optional(),
    COHERE_API_KEY: z.string().optional(),

    // ---------- Generation ----------
    GENERATION_MODEL: z.string().min(1).default("gpt-4o-mini"),
    GENERATION_MAX_TOKENS: positiveInt("1024"),
    GENERATION_TEMPERATURE: z
      .string()
      .default("0.2")
      .transform(Number)
      .pipe(z.number().min(0).max(2)),

    // ---------- Chunking ----------
    CHUNK_STRATEGY: z.enum(["sentence", "fixed"]).default("sentence"),
    CHUNK_SIZE: positiveInt("1000"),
    CHUNK_OVERLAP: z.string().default("200").transform(Number).pipe(z.number().int().nonnegative()),

    // ---------- Vector store ----------
    VECTOR_STORE: z.enum(["qdrant", "memory"]).default("qdrant"),
    QDRANT_URL: z.string().url().default("http://localhost:6333"),
    QDRANT_API_KEY: z.string().optional(),
    QDRANT_COLLECTION: z.string().min(1).default("documents"),

    // ---------- Retrieval ----------
    TOP_K: z.string().default("5").transform(Number).pipe(z.number().int().min(1).max(50)),

    // ---------- Database / queue (optional: in-process fallbacks) ----------
    DATABASE_URL: z
      .string()
      .refine((url) => url.startsWith("postgresql://") || url.startsWith("postgres://"), {
        message: "DATABASE_URL must start with postgresql://",
      })
      .optional(),
    DATABASE_POOL_MAX: positiveInt("10"),
    REDIS_URL: z.string().min(1).optional(),
    WORKER_CONCURRENCY: positiveInt("5"),
  })
  .superRefine((env, ctx) => {
    if (env.CHUNK_OVERLAP >= env.CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["CHUNK_OVERLAP"],
        message: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
      });
    }
    if (!env.OPENAI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["OPENAI_API_KEY"],
        message: "OPENAI_API_KEY is required for answer generation",
      });
    }
    if (env.EMBEDDING_PROVIDER === "cohere" && !env.COHERE_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["COHERE_API_KEY"],
        message: "COHERE_API_KEY is required when EMBEDDING_PROVIDER is cohere",
      });
    }
  });

/**
 * Parse and validate process.env (or any compatible record) against
 * the envSchema and return a strongly-typed {@link AppConfig}.
 *
 * Throws a ZodError with detailed messages when validation fails.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  const embeddingDefaults = DEFAULT_EMBEDDING_MODELS[parsed.EMBEDDING_PROVIDER];
  const openaiKey = parsed.OPENAI_API_KEY ?? "";

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,
    uploadDir: parsed.UPLOAD_DIR,

    embedding: {
      provider: parsed.EMBEDDING_PROVIDER,
      model: parsed.EMBEDDING_MODEL ?? embeddingDefaults.model,
      dimensions: parsed.EMBEDDING_DIMENSIONS ?? embeddingDefaults.dimensions,
      batchSize: parsed.EMBEDDING_BATCH_SIZE,
      apiKey:
        parsed.EMBEDDING_PROVIDER === "cohere" ? (parsed.COHERE_API_KEY ?? "") : openaiKey,
    },

    generation: {
      model: parsed.GENERATION_MODEL,
      maxTokens: parsed.GENERATION_MAX_TOKENS,
      temperature: parsed.GENERATION_TEMPERATURE,
      apiKey: openaiKey,
    },

    chunking: {
      strategy: parsed.CHUNK_STRATEGY,
      chunkSize: parsed.CHUNK_SIZE,
      overlap: parsed.CHUNK_OVERLAP,
    },

    vectorStore: {
      type: parsed.VECTOR_STORE,
      url: parsed.QDRANT_URL,
      apiKey: parsed.QDRANT_API_KEY,
      collection: parsed.QDRANT_COLLECTION,
    },

    retrieval: {
      topK: parsed.TOP_K,
    },

    database: parsed.DATABASE_URL
      ? { url: parsed.DATABASE_URL, poolMax: parsed.DATABASE_POOL_MAX }
      : null,

    redis: parsed.REDIS_URL ? { url: parsed.REDIS_URL } : null,

    worker: {
      concurrency: parsed.WORKER_CONCURRENCY,
    },
  };
}
