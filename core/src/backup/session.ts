/**
 * Backup session lifecycle.
 *
 * A session is created once per run and grows as files are backed up.
 * Nothing touches the disk until the first real backup, so a run that
 * changes nothing leaves no session directory behind.
 */

import { promises as fs } from "fs";
import { join } from "path";
import { BackupWriteFailedError } from "../errors.js";
import {
  copyDirectoryPreserving,
  copyFilePreserving,
  countFiles,
  isDirectory,
  pathExists,
} from "../fs/file-ops.js";
import { getErrorMessage, isAlreadyExistsError } from "../logging/error-utils.js";
import { createLogger } from "../logging/logger.js";
import {
  MANIFEST_FILE,
  formatManifestEntry,
  formatManifestHeader,
  relativePathFor,
} from "./manifest.js";
import { formatSessionId, nextSessionId } from "./session-id.js";
import type {
  BackupEntry,
  BackupEntryKind,
  BackupSession,
  FinalizeResult,
  SessionOptions,
} from "./types.js";

export function initSession(options: SessionOptions): BackupSession {
  const { baseDir, homeDir, mode, enabled = true, now = new Date(), logger = createLogger() } = options;
  const id = formatSessionId(now);

  return {
    id,
    baseDir,
    rootDir: join(baseDir, id),
    homeDir,
    enabled,
    mode,
    entries: [],
    storageCreated: false,
    logger,
  };
}

async function ensureStorage(session: BackupSession): Promise<void> {
  if (session.storageCreated) return;

  await fs.mkdir(session.baseDir, { recursive: true });
  // Another run may own this second's directory; take the next free one.
  for (;;) {
    try {
      await fs.mkdir(session.rootDir);
      break;
    } catch (err) {
      if (!isAlreadyExistsError(err)) throw err;
    }
    session.logger.debug(`Backup session ${session.id} exists, trying the next id`);
    session.id = nextSessionId(session.id);
    session.rootDir = join(session.baseDir, session.id);
  }
  await fs.writeFile(join(session.rootDir, MANIFEST_FILE), formatManifestHeader(session.id), "utf8");
  session.storageCreated = true;
  session.logger.debug(`Backup directory: ${session.rootDir}`);
}

function findEntry(session: BackupSession, original: string, kind: BackupEntryKind): BackupEntry | undefined {
  return session.entries.find((e) => e.original === original && e.kind === kind);
}

async function record(
  session: BackupSession,
  original: string,
  kind: BackupEntryKind,
  description: string | undefined,
  copy: (dest: string) => Promise<void>,
): Promise<BackupEntry> {
  const existing = findEntry(session, original, kind);
  const entry: BackupEntry = existing ?? {
    original,
    relative: relativePathFor(session.homeDir, original),
    kind,
    ...(description ? { description } : {}),
  };

  if (session.mode === "simulate") {
    session.logger.info(`[DRY RUN] Would back up: ${original}`);
    if (!existing) session.entries.push(entry);
    return entry;
  }

  try {
    await ensureStorage(session);
    await copy(join(session.rootDir, entry.relative));
    if (!existing) {
      await fs.appendFile(join(session.rootDir, MANIFEST_FILE), formatManifestEntry(entry), "utf8");
      session.entries.push(entry);
    }
  } catch (err) {
    throw new BackupWriteFailedError(original, getErrorMessage(err));
  }

  session.logger.substep(`Backed up: ${original}`);
  return entry;
}

/**
 * Back up a single file before it is modified.
 *
 * Returns the recorded entry, or null when there was nothing to back up
 * (missing file or disabled session). Throws `BackupWriteFailedError` when
 * the copy cannot be written or verified.
 */
export async function backupFile(
  session: BackupSession,
  absolutePath: string,
  description?: string,
): Promise<BackupEntry | null> {
  if (!session.enabled) return null;

  if (!(await pathExists(absolutePath))) {
    session.logger.debug(`Nothing to back up at ${absolutePath}`);
    return null;
  }

  return record(session, absolutePath, "file", description, async (dest) => {
    await copyFilePreserving(absolutePath, dest);
    const [source, copy] = await Promise.all([fs.stat(absolutePath), fs.stat(dest)]);
    if (source.size !== copy.size) {
      throw new Error(`copy is ${copy.size} bytes, expected ${source.size}`);
    }
  });
}

/**
 * Back up a directory tree. Same contract as `backupFile`.
 */
export async function backupDirectory(
  session: BackupSession,
  absoluteDir: string,
  description?: string,
): Promise<BackupEntry | null> {
  if (!session.enabled) return null;

  const dir = absoluteDir.length > 1 ? absoluteDir.replace(/\/+$/, "") : absoluteDir;
  if (!(await isDirectory(dir))) {
    session.logger.debug(`No directory to back up at ${dir}`);
    return null;
  }

  return record(session, dir, "directory", description, async (dest) => {
    await fs.rm(dest, { recursive: true, force: true });
    await copyDirectoryPreserving(dir, dest);
    if (!(await isDirectory(dest))) {
      throw new Error("copied directory is missing");
    }
  });
}

/**
 * Close the session: count what was stored and drop an empty session
 * directory.
 */
export async function finalizeSession(session: BackupSession): Promise<FinalizeResult> {
  if (!session.storageCreated || !(await isDirectory(session.rootDir))) {
    return { id: session.id, fileCount: 0, removedEmpty: false };
  }

  const fileCount = await countFiles(session.rootDir, [MANIFEST_FILE]);
  if (fileCount === 0) {
    await fs.rm(session.rootDir, { recursive: true, force: true });
    session.storageCreated = false;
    session.logger.debug(`Removed empty backup session ${session.id}`);
    return { id: session.id, fileCount, removedEmpty: true };
  }

  return { id: session.id, fileCount, removedEmpty: false };
}
