/**
 * Restore command: copy a backup session back over the current files.
 */

import {
  acquireRunLock,
  getErrorMessage,
  loadConfig,
  resolveHomeDir,
  restoreSession,
  type ExecutionMode,
  type RunLock,
} from "@rigup/core";
import { formatRestoreSummary } from "../report.js";
import { commandLogger, printer, type CommandDeps } from "./shared.js";

export interface RestoreCommandOptions {
  dryRun?: boolean;
  verbose?: boolean;
}

export async function runRestore(
  sessionId: string,
  options: RestoreCommandOptions,
  deps: CommandDeps = {},
): Promise<number> {
  const env = deps.env ?? process.env;
  const print = printer(deps);
  const logger = commandLogger(deps, options.verbose);
  const mode: ExecutionMode = options.dryRun ? "simulate" : "apply";
  const config = loadConfig({ homeDir: resolveHomeDir(env), env, logger });

  let lock: RunLock | null;
  try {
    lock = await acquireRunLock(config.backupDir, { mode, logger });
  } catch (err) {
    logger.error(getErrorMessage(err));
    return 1;
  }

  try {
    logger.step(`Restoring backup ${sessionId}`);
    const result = await restoreSession(config.backupDir, sessionId, { mode, logger });
    formatRestoreSummary(result, mode).forEach((line) => print(line));
    return result.failed.length > 0 ? 1 : 0;
  } catch (err) {
    logger.error(getErrorMessage(err));
    logger.info("List available sessions with: rigup backups");
    return 1;
  } finally {
    await lock?.release();
  }
}
