import pino from "pino";

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  timestamp: pino.stdTimeFunctions.isoTime,
  base: { app: "gridiron-schedule" },
});

export type Logger = typeof logger;

export function withSource(source: string): Logger {
  return logger.child({ source });
}
