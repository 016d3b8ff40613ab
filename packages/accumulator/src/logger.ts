/**
 * Minimal logging seam for the accumulator.
 *
 * Components log through an AccumulatorLogger with a "[component]" prefix in
 * the message and an optional context object, the same shape as console.
 */

export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

export const LOG_LEVELS: readonly LogLevel[] = [
  "silent",
  "error",
  "warn",
  "info",
  "debug",
];

export type LogContext = Record<string, unknown>;

export interface AccumulatorLogger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const SEVERITY: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Console-backed logger that drops messages below `level`.
 */
export function createConsoleLogger(level: LogLevel): AccumulatorLogger {
  const emit =
    (method: Exclude<LogLevel, "silent">) =>
    (message: string, context?: LogContext): void => {
      if (SEVERITY[level] < SEVERITY[method]) {
        return;
      }
      if (context === undefined) {
        console[method](message);
      } else {
        console[method](message, context);
      }
    };

  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  };
}
