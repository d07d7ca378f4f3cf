/**
 * Types for the backup/restore engine.
 */

import type { ExecutionMode } from "../fs/file-ops.js";
import type { Logger } from "../logging/logger.js";

export type BackupEntryKind = "file" | "directory";

export interface BackupEntry {
  /** Absolute path of the original file or directory. */
  original: string;
  /** Path inside the session directory. */
  relative: string;
  description?: string;
  kind: BackupEntryKind;
}

export interface BackupSession {
  /** Creation time, `YYYYMMDD_HHMMSS` in local time. */
  id: string;
  baseDir: string;
  rootDir: string;
  homeDir: string;
  /** False when backups are disabled; every call then succeeds without recording. */
  enabled: boolean;
  mode: ExecutionMode;
  /** Grows during the run, in the order backups were taken. */
  entries: BackupEntry[];
  /** Set once the session directory and manifest exist on disk. */
  storageCreated: boolean;
  logger: Logger;
}

export interface SessionOptions {
  baseDir: string;
  homeDir: string;
  mode: ExecutionMode;
  enabled?: boolean;
  now?: Date;
  logger?: Logger;
}

export interface SessionSummary {
  id: string;
  path: string;
  fileCount: number;
}

export interface RestoreFailure {
  path: string;
  error: string;
}

export interface RestoreResult {
  sessionId: string;
  restored: string[];
  skipped: string[];
  failed: RestoreFailure[];
}

export interface PruneResult {
  kept: string[];
  /** Removed session ids, or the ones that would be removed in simulate mode. */
  removed: string[];
  simulated: boolean;
}

export interface FinalizeResult {
  id: string;
  fileCount: number;
  /** True when an empty session directory was deleted. */
  removedEmpty: boolean;
}
