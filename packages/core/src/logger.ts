/**
 * Structured logging for the pipeline, built on pino.
 * Components log through `logger.child({ component })`.
 */

import pino, { type Logger, type LoggerOptions } from "pino";

export type { Logger };

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerConfig {
  level: LogLevel;
  /** Human-readable output through pino-pretty. */
  pretty: boolean;
}

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

function levelFromEnv(value: string | undefined): LogLevel {
  const match = LOG_LEVELS.find((level) => level === value);
  return match ?? "info";
}

/**
 * Captured templates carry session cookies; keep them out of log output.
 */
const REDACT_PATHS = [
  "headers.cookie",
  "headers.authorization",
  "request.headers.cookie",
  "request.headers.authorization",
  "*.credential",
  "credential",
];

export function createLogger(config: Partial<LoggerConfig> = {}): Logger {
  const level = config.level ?? levelFromEnv(process.env.LOG_LEVEL);
  const pretty = config.pretty ?? process.env.LOG_PRETTY === "true";

  const options: LoggerOptions = {
    level,
    base: { service: "crawl-relay" },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
  };

  if (pretty) {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "SYS:standard", ignore: "pid,hostname,service" },
      },
    });
  }
  return pino(options);
}

let rootLogger: Logger | undefined;

/**
 * Shared root logger, created on first use from `LOG_LEVEL` / `LOG_PRETTY`.
 */
export function getLogger(): Logger {
  rootLogger ??= createLogger();
  return rootLogger;
}
