export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const PREFIX = "[blobtuf]";

// Everything goes to stderr: stdout is reserved for command output such as
// pulled blob bytes.
export function createLogger(level: LogLevel = "warn"): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const enabled = (at: LogLevel) => LOG_LEVELS.indexOf(at) >= threshold;

  return {
    debug(message) {
      if (enabled("debug")) console.error(PREFIX, "debug", message);
    },
    info(message) {
      if (enabled("info")) console.error(PREFIX, "info", message);
    },
    warn(message) {
      if (enabled("warn")) console.error(PREFIX, "warn", message);
    },
    error(message) {
      if (enabled("error")) console.error(PREFIX, "error", message);
    },
  };
}

export const silentLogger: Logger = createLogger("silent");
