/**
 * Minimal logging seam.
 *
 * Lines are tagged with their area (`[http]`, `[session]`, `[upload]`)
 * and written to the console. Debug lines are dropped unless enabled.
 */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ConsoleLoggerOptions {
  /** Emit debug lines (default: false) */
  debug?: boolean;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const debug = options.debug ?? false;
  return {
    debug: (message) => {
      if (debug) console.debug(message);
    },
    info: (message) => console.info(message),
    warn: (message) => console.warn(message),
    error: (message) => console.error(message),
  };
}

/** Discards everything */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
