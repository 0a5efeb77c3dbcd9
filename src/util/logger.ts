export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  debug?: boolean;
}

/** Logs to stderr as `[prefix] message`; debug lines only when enabled. */
export function createLogger(prefix: string, options: LoggerOptions = {}): Logger {
  const write = (message: string): void => {
    console.error(`[${prefix}] ${message}`);
  };
  return {
    debug: (message) => {
      if (options.debug) write(message);
    },
    info: write,
    warn: (message) => write(`warning: ${message}`),
    error: (message) => write(`error: ${message}`),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
