/**
 * Listing and pruning of backup sessions.
 */

import { promises as fs } from "fs";
import { join } from "path";
import { countFiles, type ExecutionMode } from "../fs/file-ops.js";
import { isNotFoundError } from "../logging/error-utils.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { MANIFEST_FILE } from "./manifest.js";
import { isSessionId } from "./session-id.js";
import type { PruneResult, SessionSummary } from "./types.js";

export const DEFAULT_KEEP_BACKUPS = 5;

async function readSessionIds(baseDir: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(baseDir, { withFileTypes: true });
    return entries
      .filter((e) => e.isDirectory() && isSessionId(e.name))
      .map((e) => e.name)
      .sort();
  } catch (err) {
    if (isNotFoundError(err)) {
      return [];
    }
    throw err;
  }
}

/**
 * Yield sessions oldest first. File counts are read as each session is
 * reached.
 */
export async function* iterateSessions(baseDir: string): AsyncGenerator<SessionSummary> {
  for (const id of await readSessionIds(baseDir)) {
    const path = join(baseDir, id);
    yield { id, path, fileCount: await countFiles(path, [MANIFEST_FILE]) };
  }
}

export async function listSessions(baseDir: string): Promise<SessionSummary[]> {
  const sessions: SessionSummary[] = [];
  for await (const session of iterateSessions(baseDir)) {
    sessions.push(session);
  }
  return sessions;
}

/**
 * Delete all but the newest `keepCount` sessions.
 */
export async function pruneOldSessions(
  baseDir: string,
  keepCount: number,
  options: { mode?: ExecutionMode; logger?: Logger } = {},
): Promise<PruneResult> {
  const { mode = "apply", logger = createLogger() } = options;
  const keep = Math.max(0, Math.floor(keepCount));

  const newestFirst = (await readSessionIds(baseDir)).reverse();
  const kept = newestFirst.slice(0, keep);
  const removed = newestFirst.slice(keep);

  for (const id of removed) {
    const path = join(baseDir, id);
    if (mode === "simulate") {
      logger.info(`[DRY RUN] Would remove old backup: ${path}`);
      continue;
    }
    await fs.rm(path, { recursive: true, force: true });
    logger.substep(`Removed old backup: ${id}`);
  }

  return { kept, removed, simulated: mode === "simulate" };
}
