import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { config as loadEnv } from "dotenv";
import { z } from "zod";

const __dirname = dirname(fileURLToPath(import.meta.url));
loadEnv({ path: resolve(__dirname, "../../../.env") });

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  APP_NAME: z.string().default("graph-mem-chat-backend"),
  PORT: z.coerce.number().int().positive().default(8000),
  CORS_ORIGIN: z.string().default("*"),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(300),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  NEO4J_URI: z.string().default("bolt://localhost:7687"),
  NEO4J_USER: z.string().default("neo4j"),
  NEO4J_PASSWORD: z.string().default(""),
  NEO4J_DATABASE: z.string().default("neo4j"),
  SHORT_TERM_TTL_MINUTES: z.coerce.number().int().positive().default(60),
  FALLBACK_MAX_ENTRIES: z.coerce.number().int().positive().default(1000),
  STORE_PROBE_INTERVAL_MS: z.coerce.number().int().min(0).default(5000),
  LLM_BASE_URL: z.string().default("http://localhost:11434/v1"),
  LLM_API_KEY: z.string().default("ollama"),
  LLM_MODEL: z.string().default("gpt-oss:20b"),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(1024),
  LLM_MAX_CONCURRENT: z.coerce.number().int().positive().default(4),
  LLM_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
  LLM_RETRY_DELAY_MS: z.coerce.number().int().positive().default(1000),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  CHAT_HISTORY_LIMIT: z.coerce.number().int().positive().default(20),
  SIMULATION_MAX_TURNS: z.coerce.number().int().positive().default(50),
  // 0 disables the job deadline
  SIMULATION_TIMEOUT_SECONDS: z.coerce.number().min(0).default(0),
  SIMULATION_SNAPSHOT_INTERVAL: z.coerce.number().int().positive().default(1),
  SIMULATION_MAX_RETAINED_JOBS: z.coerce.number().int().positive().default(100)
});

export type AppConfig = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return envSchema.parse(env);
}

export const appConfig: AppConfig = loadConfig();
