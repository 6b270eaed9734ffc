/**
 * Logger
 *
 * Lightweight logger for core modules and the CLI front ends.
 * Silent by default; callers opt into logging by injecting a non-silent logger.
 */

export interface Logger {
  log: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
}

export interface LoggerOptions {
  /** If true (default), all output is suppressed. */
  silent?: boolean;
  /** Prefix prepended to every message (e.g., "[Scan]"). */
  prefix?: string;
  /**
   * "stderr" routes every level to console.error. Hook commands use this so
   * nothing they log ends up on the stdout the host tool reads.
   */
  stream?: "console" | "stderr";
  /** Emit debug() output. Off unless asked for. */
  debug?: boolean;
}

const noop = (): void => {};

/** A logger that does nothing (default for all core functions). */
const silentLogger: Logger = {
  log: noop,
  warn: noop,
  error: noop,
  debug: noop,
};

export function createLogger(options?: LoggerOptions): Logger {
  const { silent = true, prefix, stream = "console", debug = false } = options || {};

  if (silent) {
    return silentLogger;
  }

  const formatArgs = (args: unknown[]): unknown[] => {
    if (prefix && args.length > 0 && typeof args[0] === "string") {
      return [`${prefix} ${args[0]}`, ...args.slice(1)];
    }
    if (prefix) {
      return [prefix, ...args];
    }
    return args;
  };

  if (stream === "stderr") {
    const write = (...args: unknown[]) => console.error(...formatArgs(args));
    return {
      log: write,
      warn: write,
      error: write,
      debug: debug ? write : noop,
    };
  }

  return {
    log: (...args) => console.log(...formatArgs(args)),
    warn: (...args) => console.warn(...formatArgs(args)),
    error: (...args) => console.error(...formatArgs(args)),
    debug: debug ? (...args) => console.debug(...formatArgs(args)) : noop,
  };
}
