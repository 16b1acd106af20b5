import { destination, pino, type Logger, type LevelWithSilent } from "pino";

export type { Logger };

export type LogLevel = LevelWithSilent;

export const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export interface LoggerOptions {
  level?: LogLevel;
  /** File descriptor the log lines go to. Defaults to stderr so stdout carries only results. */
  fd?: number;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some(level => level === value);
}

/** $SQLRUN_LOG_LEVEL, when valid, overrides the configured level. */
export function createLogger(options: LoggerOptions = {}): Logger {
  const envLevel = process.env.SQLRUN_LOG_LEVEL;
  const level = isLogLevel(envLevel) ? envLevel : options.level ?? "info";
  return pino({ name: "sqlrun", level }, destination(options.fd ?? 2));
}

/** Logger used when a component is constructed without one. */
export const silentLogger: Logger = pino({ level: "silent" });
