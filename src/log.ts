export type LogLevel = "silent" | "warn" | "info" | "debug";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVELS: Record<LogLevel, number> = {
  silent: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

/**
 * Create a console logger that drops messages above the given level
 */
export function createLogger(level: LogLevel = "info"): Logger {
  const enabled = (wanted: LogLevel) => LEVELS[level] >= LEVELS[wanted];

  return {
    debug(message) {
      if (enabled("debug")) console.debug(message);
    },
    info(message) {
      if (enabled("info")) console.log(message);
    },
    warn(message) {
      if (enabled("warn")) console.warn(message);
    },
    error(message) {
      if (level !== "silent") console.error(message);
    },
  };
}
