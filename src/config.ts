import path from "path";
import { z } from "zod";

import type { LogLevel } from "./utils/logger";

const logLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

const envSchema = z.object({
  NODE_ENV: z.string().default("development"),
  PORT: z.coerce.number().int().min(0).max(65_535).default(8080),
  LOG_LEVEL: logLevelSchema.optional(),
  CORS_ORIGIN: z.string().optional(),
  GOOGLE_API_KEY: z.string().optional(),
  GEMINI_MODEL: z.string().min(1).default("gemini-1.5-flash"),
  GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),
  DATA_DIR: z.string().min(1).default("data"),
  RECORD_RETENTION_DAYS: z.coerce.number().int().positive().default(365)
});

export interface AppConfig {
  env: string;
  port: number;
  logLevel: LogLevel;
  corsOrigins: string[] | null;
  generation: {
    apiKey: string | null;
    model: string;
    timeoutMs: number;
  };
  storage: {
    alertsFile: string;
    recordsFile: string;
    retentionDays: number;
  };
}

const emptyToUndefined = (env: NodeJS.ProcessEnv): Record<string, string | undefined> => {
  const out: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(env)) {
    out[key] = value === undefined || value.trim() === "" ? undefined : value.trim();
  }
  return out;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = envSchema.safeParse(emptyToUndefined(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const data = parsed.data;
  const dataDir = path.resolve(data.DATA_DIR);

  return {
    env: data.NODE_ENV,
    port: data.PORT,
    logLevel: data.LOG_LEVEL ?? (data.NODE_ENV === "production" ? "info" : "debug"),
    corsOrigins: data.CORS_ORIGIN ? data.CORS_ORIGIN.split(",").map((s) => s.trim()).filter(Boolean) : null,
    generation: {
      apiKey: data.GOOGLE_API_KEY ?? null,
      model: data.GEMINI_MODEL,
      timeoutMs: data.GENERATION_TIMEOUT_MS
    },
    storage: {
      alertsFile: path.join(dataDir, "alerts.jsonl"),
      recordsFile: path.join(dataDir, "records.jsonl"),
      retentionDays: data.RECORD_RETENTION_DAYS
    }
  };
};
