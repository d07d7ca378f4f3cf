/**
 * Restore a backup session over the current files.
 */

import { promises as fs } from "fs";
import { join } from "path";
import { SessionNotFoundError } from "../errors.js";
import {
  atomicCopy,
  isDirectory,
  pathExists,
  replaceDirectory,
  type ExecutionMode,
} from "../fs/file-ops.js";
import { getErrorMessage, isNotFoundError } from "../logging/error-utils.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { MANIFEST_FILE, parseManifest } from "./manifest.js";
import { isSessionId } from "./session-id.js";
import type { RestoreResult } from "./types.js";

export interface RestoreOptions {
  mode?: ExecutionMode;
  logger?: Logger;
}

export async function restoreSession(
  baseDir: string,
  sessionId: string,
  options: RestoreOptions = {},
): Promise<RestoreResult> {
  const { mode = "apply", logger = createLogger() } = options;

  const rootDir = join(baseDir, sessionId);
  if (!isSessionId(sessionId) || !(await isDirectory(rootDir))) {
    throw new SessionNotFoundError(sessionId);
  }

  const result: RestoreResult = { sessionId, restored: [], skipped: [], failed: [] };

  let manifest: string;
  try {
    manifest = await fs.readFile(join(rootDir, MANIFEST_FILE), "utf8");
  } catch (err) {
    if (isNotFoundError(err)) {
      logger.warn(`Session ${sessionId} has no ${MANIFEST_FILE}, nothing to restore`);
      return result;
    }
    throw err;
  }

  for (const mapping of parseManifest(manifest)) {
    const backupPath = join(rootDir, mapping.relative);

    if (!(await pathExists(backupPath))) {
      logger.warn(`Backup copy missing, skipping: ${mapping.relative}`);
      result.skipped.push(mapping.original);
      continue;
    }

    if (mode === "simulate") {
      logger.info(`[DRY RUN] Would restore: ${mapping.original}`);
      result.restored.push(mapping.original);
      continue;
    }

    try {
      if (mapping.kind === "directory") {
        await replaceDirectory(backupPath, mapping.original);
      } else {
        await atomicCopy(backupPath, mapping.original);
      }
      logger.substep(`Restored: ${mapping.original}`);
      result.restored.push(mapping.original);
    } catch (err) {
      logger.error(`Failed to restore ${mapping.original}: ${getErrorMessage(err)}`);
      result.failed.push({ path: mapping.original, error: getErrorMessage(err) });
    }
  }

  return result;
}
