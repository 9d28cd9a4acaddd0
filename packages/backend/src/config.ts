import { availableParallelism } from "node:os";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { config as loadEnv } from "dotenv";
import { z } from "zod";

const __dirname = dirname(fileURLToPath(import.meta.url));
loadEnv({ path: resolve(__dirname, "../../../.env") });

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(3001),
  CORS_ORIGIN: z.string().default("http://localhost:5173"),
  MAX_UPLOAD_SIZE: z.coerce.number().int().positive().default(50 * 1024 * 1024),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  CHAT_DB_PATH: z.string().default("data/chat.db"),
  UPLOADS_DIR: z.string().default("data/uploads"),
  CHUNK_SIZE: z.coerce.number().int().positive().default(1000),
  CHUNK_OVERLAP: z.coerce.number().int().min(0).default(200),
  EMBEDDING_BATCH_SIZE: z.coerce.number().int().min(1).max(256).default(32),
  EMBEDDING_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  EMBEDDING_RETRY_DELAY_MS: z.coerce.number().int().positive().default(500),
  INGEST_CONCURRENCY: z.coerce.number().int().positive().default(() => availableParallelism()),
  RETRIEVAL_TOP_K: z.coerce.number().int().min(1).max(20).default(6),
  MIN_RELEVANCE_SCORE: z.coerce.number().min(-1).max(1).default(0.3),
  HISTORY_TOKEN_BUDGET: z.coerce.number().int().positive().default(1500),
  ANSWER_MAX_TOKENS: z.coerce.number().int().positive().default(1024),
  OPENAI_API_KEY: z.string().default(""),
  OPENAI_BASE_URL: z.string().default("https://api.openai.com/v1"),
  OPENAI_CHAT_MODEL: z.string().default("gpt-4o-mini"),
  OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  EMBEDDING_API_KEY: z.string().default(""),
  EMBEDDING_BASE_URL: z.string().default(""),
  EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(1536),
  LLM_MAX_CONCURRENT: z.coerce.number().int().positive().default(5),
  LLM_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  LLM_RETRY_DELAY_MS: z.coerce.number().int().positive().default(1000),
  LLM_REQUESTS_PER_MINUTE: z.coerce.number().int().positive().default(60),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  VECTOR_STORE: z.enum(["memory", "neo4j"]).default("memory"),
  NEO4J_URI: z.string().default("bolt://localhost:7687"),
  NEO4J_USER: z.string().default("neo4j"),
  NEO4J_PASSWORD: z.string().default(""),
  NEO4J_DATABASE: z.string().default("neo4j")
}).superRefine((env, ctx) => {
  if (env.CHUNK_OVERLAP >= env.CHUNK_SIZE) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["CHUNK_OVERLAP"],
      message: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE"
    });
  }
});

export type AppConfig = z.infer<typeof envSchema>;
export const appConfig: AppConfig = envSchema.parse(process.env);
