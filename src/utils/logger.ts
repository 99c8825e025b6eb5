import pino, { type Logger } from "pino";

export type { Logger };

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export const createLogger = (level: LogLevel): Logger =>
  pino({
    level,
    redact: {
      paths: ["req.headers.authorization", "req.headers.cookie", "GOOGLE_API_KEY", "apiKey"],
      remove: true
    }
  });
