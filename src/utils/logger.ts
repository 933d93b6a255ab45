// src/utils/logger.ts
import winston from "winston";

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  silent: process.env.NODE_ENV === "test",
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: { service: "tea-store-api" },
  transports: [new winston.transports.Console()],
});

export function setLogLevel(level: string): void {
  logger.level = level;
}

export function errorMeta(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    return { error: err.message, name: err.name, stack: err.stack };
  }
  return { error: String(err) };
}
