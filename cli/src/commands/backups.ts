/**
 * Backups command: list backup sessions, oldest first.
 */

import { listSessions, loadConfig, resolveHomeDir } from "@rigup/core";
import { formatSessionList } from "../report.js";
import { commandLogger, printer, type CommandDeps } from "./shared.js";

export async function runBackups(deps: CommandDeps = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const print = printer(deps);
  const config = loadConfig({ homeDir: resolveHomeDir(env), env, logger: commandLogger(deps) });

  const sessions = await listSessions(config.backupDir);
  if (sessions.length === 0) {
    print(`No backups found in ${config.backupDir}`);
    return 0;
  }
  formatSessionList(sessions).forEach((line) => print(line));
  return 0;
}
