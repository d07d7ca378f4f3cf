/**
 * Dependencies every command takes, so tests can run them without the
 * real home directory, terminal or subprocesses.
 */

import { createLogger, type CommandRunner, type Logger } from "@rigup/core";

export interface CommandDeps {
  env?: NodeJS.ProcessEnv;
  runner?: CommandRunner;
  logger?: Logger;
  /** Report output; defaults to console.log. */
  print?: (line: string) => void;
  color?: boolean;
}

export function commandLogger(deps: CommandDeps, verbose = false): Logger {
  return deps.logger ?? createLogger({ silent: false, verbose, color: deps.color ?? true });
}

export function printer(deps: CommandDeps): (line: string) => void {
  return deps.print ?? ((line) => console.log(line));
}
