/**
 * Error taxonomy.
 *
 * Every failure the engine raises carries a stable `code`. `fatal` errors
 * abort the whole run; the rest fail (or merely warn about) a single unit.
 */

export type RigupErrorCode =
  | "PRECONDITION_MISSING"
  | "BACKUP_WRITE_FAILED"
  | "SESSION_NOT_FOUND"
  | "DOCUMENT_NOT_FOUND"
  | "DOCUMENT_WRITE_FAILED"
  | "ANCHOR_NOT_FOUND"
  | "AMBIGUOUS_ANCHOR"
  | "CONCURRENT_RUN"
  | "UNKNOWN_MODULE"
  | "COMMAND_FAILED";

export class RigupError extends Error {
  readonly code: RigupErrorCode;
  readonly fatal: boolean;

  constructor(message: string, code: RigupErrorCode, fatal = false) {
    super(message);
    this.name = "RigupError";
    this.code = code;
    this.fatal = fatal;
  }
}

/** A required external capability (OS version, tool) is absent. */
export class PreconditionMissingError extends RigupError {
  readonly capability: string;

  constructor(capability: string, message: string) {
    super(message, "PRECONDITION_MISSING");
    this.name = "PreconditionMissingError";
    this.capability = capability;
  }
}

export class BackupWriteFailedError extends RigupError {
  readonly path: string;

  constructor(path: string, reason: string) {
    super(`Failed to back up ${path}: ${reason}`, "BACKUP_WRITE_FAILED", true);
    this.name = "BackupWriteFailedError";
    this.path = path;
  }
}

export class SessionNotFoundError extends RigupError {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super(`Backup session not found: ${sessionId}`, "SESSION_NOT_FOUND");
    this.name = "SessionNotFoundError";
    this.sessionId = sessionId;
  }
}

export class DocumentNotFoundError extends RigupError {
  readonly path: string;

  constructor(path: string) {
    super(`Configuration file not found: ${path}`, "DOCUMENT_NOT_FOUND");
    this.name = "DocumentNotFoundError";
    this.path = path;
  }
}

export class DocumentWriteFailedError extends RigupError {
  readonly path: string;

  constructor(path: string, reason: string) {
    super(`Failed to write ${path}: ${reason}`, "DOCUMENT_WRITE_FAILED", true);
    this.name = "DocumentWriteFailedError";
    this.path = path;
  }
}

export class AnchorNotFoundError extends RigupError {
  readonly anchor: string;

  constructor(anchor: string) {
    super(`Anchor line not found: ${anchor}`, "ANCHOR_NOT_FOUND");
    this.name = "AnchorNotFoundError";
    this.anchor = anchor;
  }
}

/** Surfaced as a warning: the first matching anchor is used. */
export class AmbiguousAnchorError extends RigupError {
  readonly anchor: string;
  readonly matches: number;

  constructor(anchor: string, matches: number) {
    super(
      `Anchor matched ${matches} lines, using the first: ${anchor}`,
      "AMBIGUOUS_ANCHOR",
    );
    this.name = "AmbiguousAnchorError";
    this.anchor = anchor;
    this.matches = matches;
  }
}

export class ConcurrentRunError extends RigupError {
  readonly ownerPid: number;

  constructor(lockPath: string, ownerPid: number) {
    super(
      `Another run (pid ${ownerPid}) holds ${lockPath}`,
      "CONCURRENT_RUN",
      true,
    );
    this.name = "ConcurrentRunError";
    this.ownerPid = ownerPid;
  }
}

export class UnknownModuleError extends RigupError {
  readonly moduleName: string;

  constructor(moduleName: string, known: string[]) {
    super(
      `Unknown module "${moduleName}" (available: ${known.join(", ")})`,
      "UNKNOWN_MODULE",
      true,
    );
    this.name = "UnknownModuleError";
    this.moduleName = moduleName;
  }
}

/** An external command (package install, clone) exited unsuccessfully. */
export class CommandFailedError extends RigupError {
  readonly command: string;
  readonly exitCode: number | null;

  constructor(command: string, exitCode: number | null, stderr = "") {
    const detail = stderr.trim() ? `: ${stderr.trim().split("\n").slice(-1)[0]}` : "";
    super(`Command failed (${exitCode ?? "not started"}): ${command}${detail}`, "COMMAND_FAILED");
    this.name = "CommandFailedError";
    this.command = command;
    this.exitCode = exitCode;
  }
}

export function isRigupError(err: unknown): err is RigupError {
  return err instanceof RigupError;
}

/** True for errors that must stop the run rather than fail one unit. */
export function isFatalError(err: unknown): boolean {
  return isRigupError(err) && err.fatal;
}
