const PREFIX = "[VIEW_EXTRACT]";

export type Logger = {
  debug(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
};

export type LoggerOptions = {
  /** Write debug lines (default: false) */
  debug?: boolean;
};

/**
 * Console logger. Errors are always written; debug lines only when enabled.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const debug = options.debug ?? false;

  return {
    debug(message, ...details) {
      if (debug) {
        console.log(`${PREFIX} ${message}`, ...details);
      }
    },
    error(message, ...details) {
      console.error(`${PREFIX} ${message}`, ...details);
    },
  };
}
