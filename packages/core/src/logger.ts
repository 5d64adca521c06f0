/**
 * Stderr logging. Stdout belongs to the stdio transport, so every line goes
 * through console.error with a `[prefix]` tag.
 */

export const LOG_LEVELS = ["silent", "error", "warn", "info", "debug"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  error(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  debug(message: string, ...details: unknown[]): void;
}

export type LogSink = (line: string, ...details: unknown[]) => void;

export function createLogger(
  prefix: string,
  level: LogLevel = "info",
  sink: LogSink = (line, ...details) => console.error(line, ...details)
): Logger {
  const threshold = LOG_LEVELS.indexOf(level);

  const emit =
    (at: Exclude<LogLevel, "silent">) =>
    (message: string, ...details: unknown[]): void => {
      if (LOG_LEVELS.indexOf(at) > threshold) return;
      sink(`[${prefix}] ${message}`, ...details);
    };

  return {
    error: emit("error"),
    warn: emit("warn"),
    info: emit("info"),
    debug: emit("debug"),
  };
}
