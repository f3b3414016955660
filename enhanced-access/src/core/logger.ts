import { LOG_PREFIX } from "./constants";

/**
 * Log level, from quietest to most verbose. Each level also prints
 * everything the levels before it print.
 */
export type LogLevel = "off" | "error" | "warn" | "debug" | "trace";

export interface Logger {
  trace: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  off: 0,
  error: 1,
  warn: 2,
  debug: 3,
  trace: 4,
};

type ConsoleMethod = "debug" | "warn" | "error";

/**
 * Create a console logger that prefixes every line with `[enhanced-access]`.
 * Trace lines go to `console.debug`.
 */
export function createLogger(level: LogLevel = "warn"): Logger {
  const rank = LEVEL_RANK[level];

  const emit =
    (minimum: LogLevel, method: ConsoleMethod) =>
    (...args: unknown[]): void => {
      if (rank < LEVEL_RANK[minimum]) return;
      const [first, ...rest] = args;
      if (typeof first === "string") {
        console[method](`${LOG_PREFIX} ${first}`, ...rest);
      } else {
        console[method](LOG_PREFIX, ...args);
      }
    };

  return {
    trace: emit("trace", "debug"),
    debug: emit("debug", "debug"),
    warn: emit("warn", "warn"),
    error: emit("error", "error"),
  };
}
