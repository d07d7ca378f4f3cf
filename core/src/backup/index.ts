/**
 * Backup Module
 *
 * Session-scoped backups of configuration files, restore and retention.
 */

export type {
  BackupEntry,
  BackupEntryKind,
  BackupSession,
  SessionOptions,
  SessionSummary,
  RestoreFailure,
  RestoreResult,
  PruneResult,
  FinalizeResult,
} from "./types.js";

// Session lifecycle
export { initSession, backupFile, backupDirectory, finalizeSession } from "./session.js";
export { formatSessionId, isSessionId, nextSessionId } from "./session-id.js";

// Manifest
export {
  MANIFEST_FILE,
  formatManifestHeader,
  formatManifestEntry,
  parseManifest,
  relativePathFor,
  type ManifestMapping,
} from "./manifest.js";

// Restore and retention
export { restoreSession, type RestoreOptions } from "./restore.js";
export { iterateSessions, listSessions, pruneOldSessions, DEFAULT_KEEP_BACKUPS } from "./retention.js";
export { acquireRunLock, LOCK_FILE, type RunLock } from "./session-lock.js";
