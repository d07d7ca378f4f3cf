/**
 * @rigup/core
 *
 * Detection, backup/restore, idempotent document edits and the
 * provisioning modules behind the rigup CLI.
 */

export * from "./backup/index.js";
export * from "./config/index.js";
export * from "./decisions/index.js";
export * from "./detect/index.js";
export * from "./document/index.js";
export * from "./logging/index.js";
export * from "./packages/index.js";
export * from "./setup/index.js";

export {
  RigupError,
  PreconditionMissingError,
  BackupWriteFailedError,
  SessionNotFoundError,
  DocumentNotFoundError,
  DocumentWriteFailedError,
  AnchorNotFoundError,
  AmbiguousAnchorError,
  ConcurrentRunError,
  UnknownModuleError,
  CommandFailedError,
  isRigupError,
  isFatalError,
  type RigupErrorCode,
} from "./errors.js";

export {
  atomicReplace,
  pathExists,
  isDirectory,
  type ExecutionMode,
} from "./fs/file-ops.js";

export { detectionEnv, type ProvisionContext } from "./context.js";
