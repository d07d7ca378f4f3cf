/**
 * Logger
 *
 * Leveled, colorized logger for core modules.
 * Silent by default: callers opt into output by injecting a non-silent logger.
 */

import chalk from "chalk";

/**
 * Logger interface shared by the core engine, provisioning modules and the CLI.
 */
export interface Logger {
  /** Plain output line, no level tag. */
  log: (...args: unknown[]) => void;
  /** Only emitted when the logger was created with `verbose`. */
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  success: (message: string) => void;
  /** Section header for a unit of work. */
  step: (message: string) => void;
  substep: (message: string) => void;
}

export interface LoggerOptions {
  /** If true (default), all output is suppressed. */
  silent?: boolean;
  /** Optional prefix prepended to all messages (e.g., "[backup]"). */
  prefix?: string;
  /** Emit debug lines. */
  verbose?: boolean;
  /** Set to false to force plain output regardless of terminal support. */
  color?: boolean;
}

const noop = (): void => {};

/** A logger that does nothing (default for all core functions). */
const silentLogger: Logger = {
  log: noop,
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
  success: noop,
  step: noop,
  substep: noop,
};

/**
 * Create a logger instance.
 *
 * Warnings and errors go to stderr, everything else to stdout.
 */
export function createLogger(options?: LoggerOptions): Logger {
  const { silent = true, prefix, verbose = false, color = true } = options || {};

  if (silent) {
    return silentLogger;
  }

  const c = color ? chalk : new chalk.Instance({ level: 0 });

  const withPrefix = (message: string): string =>
    prefix ? `${prefix} ${message}` : message;

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
    log: (...args) => console.log(...formatArgs(args)),
    debug: (message) => {
      if (verbose) {
        console.log(`${c.dim("[DEBUG]")} ${withPrefix(message)}`);
      }
    },
    info: (message) => console.log(`${c.blue("[INFO]")} ${withPrefix(message)}`),
    warn: (message) => console.warn(`${c.yellow("[WARN]")} ${withPrefix(message)}`),
    error: (message) => console.error(`${c.red("[ERROR]")} ${withPrefix(message)}`),
    success: (message) => console.log(`${c.green("[OK]")} ${withPrefix(message)}`),
    step: (message) => console.log(`\n${c.bold.cyan("==>")} ${c.bold(withPrefix(message))}`),
    substep: (message) => console.log(`  ${c.cyan("->")} ${withPrefix(message)}`),
  };
}
