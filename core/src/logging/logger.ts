/**
 * Logger
 *
 * Lightweight logger interface for core modules.
 * Silent by default — callers opt into logging by injecting a non-silent logger.
 */

/**
 * Minimal logger shape shared by the status reporter and debug output.
 */
export interface Logger {
  log: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

export interface LoggerOptions {
  /** If true (default), all output is suppressed. */
  silent?: boolean;
  /** Prepended to all messages (e.g., "[devprep]"). */
  prefix?: string;
  /**
   * Where `log` writes. "stderr" keeps stdout free for the tools being run;
   * `warn` and `error` always go to stderr.
   */
  stream?: "stdout" | "stderr";
}

/** A logger that does nothing (default for all core functions). */
const silentLogger: Logger = {
  log: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Create a logger instance.
 */
export function createLogger(options?: LoggerOptions): Logger {
  const { silent = true, prefix, stream = "stdout" } = options || {};

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

  return {
    log: (...args) =>
      stream === "stderr"
        ? console.error(...formatArgs(args))
        : console.log(...formatArgs(args)),
    warn: (...args) => console.warn(...formatArgs(args)),
    error: (...args) => console.error(...formatArgs(args)),
  };
}

/**
 * Debug logger for devprep internals, enabled with DEVPREP_DEBUG=1.
 */
export function createDebugLogger(env: NodeJS.ProcessEnv = process.env): Logger {
  const enabled = env.DEVPREP_DEBUG === "1" || env.DEVPREP_DEBUG === "true";
  return createLogger({ silent: !enabled, prefix: "[devprep]", stream: "stderr" });
}
