import path from "path";
import dotenv from "dotenv";
dotenv.config({ path: path.resolve(process.cwd(), ".env") });
dotenv.config({ path: path.resolve(process.cwd(), "backend", ".env") }); // Also check subfolder if run from root
import { z } from "zod";

// z.coerce.boolean() turns the string "false" into true.
const envBoolean = (fallback: boolean) =>
  z
    .enum(["true", "false", "1", "0"])
    .default(fallback ? "true" : "false")
    .transform((value) => value === "true" || value === "1");

const commaList = z
  .string()
  .default("")
  .transform((value) =>
    value
      .split(",")
      .map((entry) => entry.trim())
      .filter(Boolean),
  );

const domainList = z
  .string()
  .default("")
  .transform((value) =>
    value
      .split(/[,;\s]+/)
      .map((entry) => entry.trim().toLowerCase())
      .filter(Boolean),
  );

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(8787),
  HOST: z.string().default("127.0.0.1"),
  CORS_ORIGINS: commaList.default("http://localhost:5173,http://127.0.0.1:5173"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  DATABASE_PATH: z.string().default("./data/applications.db"),
  GOOGLE_CLIENT_ID: z.string().default(""),
  GOOGLE_CLIENT_SECRET: z.string().default(""),
  GOOGLE_REFRESH_TOKEN: z.string().default(""),
  SPREADSHEET_ID: z.string().default(""),
  POLL_CRON: z.string().default("0 7 * * *"),
  INITIAL_SCAN_DAYS: z.coerce.number().int().min(1).max(3650).default(240),
  DAILY_SCAN_DAYS: z.coerce.number().int().min(1).max(365).default(7),
  OLLAMA_ENABLED: envBoolean(true),
  OLLAMA_BASE_URL: z.string().url().default("http://127.0.0.1:11434"),
  OLLAMA_MODEL: z.string().default("llama31_16k:latest"),
  OLLAMA_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  CLASSIFIER_MIN_CONFIDENCE: z.coerce.number().min(0).max(1).default(0.7),
  CLASSIFIER_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(2),
  CLASSIFIER_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(5).default(2),
  CLASSIFIER_DAILY_QUOTA: z.coerce.number().int().min(0).default(1400),
  CLASSIFIER_RULES_FIRST: envBoolean(false),
  FUZZY_MATCH_THRESHOLD: z.coerce.number().min(0).max(1).default(0.8),
  PREFILTER_ALLOW_DOMAINS: domainList,
  PREFILTER_DENY_DOMAINS: domainList,
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("\n");
  throw new Error(`Invalid environment configuration:\n${details}`);
}

export const config = parsed.data;

export type AppConfig = typeof config;

export const hasGoogleConfig =
  config.GOOGLE_CLIENT_ID.length > 0 &&
  config.GOOGLE_CLIENT_SECRET.length > 0 &&
  config.GOOGLE_REFRESH_TOKEN.length > 0;

export const hasSheetConfig = hasGoogleConfig && config.SPREADSHEET_ID.length > 0;
