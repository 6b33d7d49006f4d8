/**
 * Simple logger interface for the gateway.
 * @packageDocumentation
 */

export interface Logger {
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
}

export interface LoggerOptions {
  /** Emit debug lines (default: false) */
  verbose?: boolean;
  /** Tag printed before every line (default: "gateway") */
  prefix?: string;
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  const tag = `[${opts.prefix ?? 'gateway'}]`;
  const verbose = opts.verbose ?? false;
  return {
    debug: (msg, ...args) => {
      if (verbose) console.debug(`${tag} ${msg}`, ...args);
    },
    info: (msg, ...args) => console.log(`${tag} ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`${tag} ${msg}`, ...args),
    error: (msg, ...args) => console.error(`${tag} ${msg}`, ...args),
  };
}

export const defaultLogger: Logger = createLogger();

/** Discards everything. Used by tests and embedded callers. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
