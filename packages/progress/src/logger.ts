export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

const rank = (level: LogLevel): number => LOG_LEVELS.indexOf(level);

/**
 * Console-backed logger. Every line is prefixed with `[scope]` and entries
 * below `level` are dropped.
 */
export const createLogger = (scope: string, level: LogLevel = "info"): Logger => {
  const emit =
    (entryLevel: LogLevel, write: (...args: unknown[]) => void) =>
    (message: string, meta?: LogMeta): void => {
      if (rank(entryLevel) < rank(level)) {
        return;
      }
      if (meta && Object.keys(meta).length > 0) {
        write(`[${scope}] ${message}`, meta);
      } else {
        write(`[${scope}] ${message}`);
      }
    };

  return {
    debug: emit("debug", console.debug),
    info: emit("info", console.info),
    warn: emit("warn", console.warn),
    error: emit("error", console.error),
  };
};

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
