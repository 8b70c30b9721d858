import { pino, type Logger, type LoggerOptions } from "pino";

export function loggerOptions(level: string): LoggerOptions {
  return {
    level,
    base: { service: "tollgate-api" },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: ["req.headers.authorization", "req.headers[\"x-admin-token\"]"]
  };
}

/** Standalone logger for code that runs outside a Fastify instance. */
export function createLogger(level: string): Logger {
  return pino(loggerOptions(level));
}
