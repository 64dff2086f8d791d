import path from "node:path";
import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z.string().optional().default("development"),
  PORT: z.coerce.number().optional().default(8000),
  PGHOST: z.string(),
  PGPORT: z.coerce.number().default(5432),
  POSTGRES_USER: z.string(),
  POSTGRES_PASSWORD: z.string(),
  POSTGRES_DB: z.string(),
  REDIS_URL: z.string().optional().default("redis://localhost:6379/0"),
  QUEUE_PREFIX: z.string().optional().default("doc-analysis"),
  LLM_BASE_URL: z.string(),
  LLM_MODEL_NAME: z.string().optional().default("gpt-4o-mini"),
  LLM_API_KEY: z.string().optional(),
  MAX_LLM_TOKENS: z.coerce.number().optional().default(2000),
  MAX_CONTEXT: z.coerce.number().optional().default(32000),
  VERIFY_MAX_ITERATIONS: z.coerce.number().int().min(1).optional().default(3),
  ANALYZE_MAX_ITERATIONS: z.coerce.number().int().min(1).optional().default(5),
  ANALYSIS_TIMEOUT_SECONDS: z.coerce.number().optional().default(600),
  DATA_DIR: z.string().optional().default("data"),
  MAX_UPLOAD_MB: z.coerce.number().optional().default(25),
  MAX_CONCURRENT_JOBS: z.coerce.number().int().min(1).optional().default(2),
  WORKER_POLL_MS: z.coerce.number().optional().default(1000),
  EMBEDDED_WORKER: z
    .string()
    .optional()
    .default("true")
    .transform((value) => value.toLowerCase() === "true"),
});

export function loadConfig(source: NodeJS.ProcessEnv = process.env) {
  const env = envSchema.parse(source);
  return {
    env: env.NODE_ENV,
    port: env.PORT,
    database: {
      host: env.PGHOST,
      port: env.PGPORT,
      user: env.POSTGRES_USER,
      password: env.POSTGRES_PASSWORD,
      database: env.POSTGRES_DB,
    },
    queue: {
      redisUrl: env.REDIS_URL,
      prefix: env.QUEUE_PREFIX,
    },
    llm: {
      baseUrl: env.LLM_BASE_URL.replace(/\/$/, ""),
      model: env.LLM_MODEL_NAME,
      apiKey: env.LLM_API_KEY,
      maxTokens: env.MAX_LLM_TOKENS,
      maxContext: env.MAX_CONTEXT,
      verifyMaxIterations: env.VERIFY_MAX_ITERATIONS,
      analyzeMaxIterations: env.ANALYZE_MAX_ITERATIONS,
    },
    uploads: {
      dir: path.join(env.DATA_DIR, "uploads"),
      maxBytes: Math.floor(env.MAX_UPLOAD_MB * 1024 * 1024),
    },
    worker: {
      embedded: env.EMBEDDED_WORKER,
      maxConcurrent: env.MAX_CONCURRENT_JOBS,
      pollIntervalMs: env.WORKER_POLL_MS,
      analysisTimeoutMs: env.ANALYSIS_TIMEOUT_SECONDS * 1000,
    },
  };
}

export type AppConfig = ReturnType<typeof loadConfig>;
export type LlmConfig = AppConfig["llm"];
export type WorkerConfig = AppConfig["worker"];
