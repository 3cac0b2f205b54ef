import pino, { type LoggerOptions, stdTimeFunctions, type Logger as PinoLogger } from "pino";

export type AppLogger = PinoLogger;

type CreateLoggerOptions = {
  level?: string;
  bindings?: Record<string, unknown>;
  options?: LoggerOptions;
};

function envValue(name: string, fallback: string): string {
  const value = process.env[name]?.trim();
  return value && value.length > 0 ? value : fallback;
}

/**
 * Build a pino logger. Level comes from `LOG_LEVEL` (default "info") and
 * the `service` binding from `SERVICE_NAME` (default "flatconf").
 */
export function createLogger(options: CreateLoggerOptions = {}): AppLogger {
  const logger = pino({
    level: options.level ?? envValue("LOG_LEVEL", "info"),
    base: { service: envValue("SERVICE_NAME", "flatconf") },
    timestamp: stdTimeFunctions.isoTime,
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    ...options.options,
  });
  if (options.bindings && Object.keys(options.bindings).length > 0) {
    return logger.child(options.bindings);
  }
  return logger;
}

export const appLogger: AppLogger = createLogger({ bindings: { subsystem: "codec" } });
export default appLogger;
