import type { CodecLogger } from "./types";

export type LogLevel = keyof CodecLogger;

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const noop = (): void => undefined;

export const NOOP_LOGGER: CodecLogger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

export interface ConsoleLoggerOptions {
  /** Lowest level written. Per-field traces are logged at `debug`, so the default leaves them out. */
  level?: LogLevel;
}

export function createConsoleLogger(prefix = "Codec", options: ConsoleLoggerOptions = {}): CodecLogger {
  const threshold = LEVEL_ORDER[options.level ?? "info"];
  const write =
    (level: LogLevel) =>
    (message: string, meta?: Record<string, unknown>): void => {
      if (LEVEL_ORDER[level] < threshold) return;
      console[level](`[${prefix}] ${message}`, meta ?? "");
    };
  return {
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
  };
}
