/**
 * Idempotent mutator.
 *
 * Reads a document, folds a list of edits over it in memory, and writes
 * only when the result differs: backup first, then an atomic replace.
 * The same path runs in simulate mode with both writes turned into reports.
 */

import { promises as fs } from "fs";
import type { BackupEntry, BackupSession } from "../backup/types.js";
import { backupFile } from "../backup/session.js";
import { DocumentNotFoundError, DocumentWriteFailedError } from "../errors.js";
import { atomicReplace, type ExecutionMode } from "../fs/file-ops.js";
import { getErrorMessage, isNotFoundError } from "../logging/error-utils.js";
import type { Logger } from "../logging/logger.js";
import { parseDocument, renderDocument } from "./config-document.js";
import {
  planEdit,
  type AnchoredLineEdit,
  type AppendEdit,
  type BlockReplaceEdit,
  type DocumentEdit,
  type EditPlan,
  type KeyLineEdit,
} from "./edits.js";

/** What a mutation needs from the run. */
export interface MutationContext {
  session: BackupSession;
  mode: ExecutionMode;
  logger: Logger;
}

export interface MutateOptions {
  /** Fail with `DocumentNotFoundError` instead of starting from an empty file. */
  required?: boolean;
  /** Stored with the backup in the manifest. */
  description?: string;
}

export interface MutationResult {
  path: string;
  changed: boolean;
  /** True when the file was actually replaced (never in simulate mode). */
  written: boolean;
  plans: EditPlan[];
  backup: BackupEntry | null;
}

async function readText(path: string, required: boolean): Promise<string> {
  try {
    return await fs.readFile(path, "utf8");
  } catch (err) {
    if (isNotFoundError(err) && !required) {
      return "";
    }
    if (isNotFoundError(err)) {
      throw new DocumentNotFoundError(path);
    }
    throw err;
  }
}

export async function mutateDocument(
  ctx: MutationContext,
  path: string,
  edits: DocumentEdit[],
  options: MutateOptions = {},
): Promise<MutationResult> {
  const { required = false, description } = options;
  const { logger } = ctx;

  const original = await readText(path, required);
  let doc = parseDocument(original);
  const plans: EditPlan[] = [];

  for (const edit of edits) {
    const plan = planEdit(doc, edit);
    plans.push(plan);
    for (const warning of plan.warnings) {
      logger.warn(`${path}: ${warning}`);
    }
    if (plan.status === "skipped") {
      logger.warn(`${path}: ${plan.error ? plan.error.message : plan.message}`);
    } else {
      logger.debug(`${path}: ${plan.message}`);
    }
    doc = plan.document;
  }

  const updated = renderDocument(doc);
  if (updated === original) {
    return { path, changed: false, written: false, plans, backup: null };
  }

  const backup = await backupFile(ctx.session, path, description);
  let written: boolean;
  try {
    written = await atomicReplace(path, updated, { mode: ctx.mode, logger });
  } catch (err) {
    throw new DocumentWriteFailedError(path, getErrorMessage(err));
  }
  return { path, changed: true, written, plans, backup };
}

export function replaceBlock(
  ctx: MutationContext,
  path: string,
  edit: Omit<BlockReplaceEdit, "kind">,
  options?: MutateOptions,
): Promise<MutationResult> {
  return mutateDocument(ctx, path, [{ kind: "block-replace", ...edit }], options);
}

export function upsertKeyLine(
  ctx: MutationContext,
  path: string,
  edit: Omit<KeyLineEdit, "kind">,
  options?: MutateOptions,
): Promise<MutationResult> {
  return mutateDocument(ctx, path, [{ kind: "key-line", ...edit }], options);
}

export function appendIfAbsent(
  ctx: MutationContext,
  path: string,
  edit: Omit<AppendEdit, "kind">,
  options?: MutateOptions,
): Promise<MutationResult> {
  return mutateDocument(ctx, path, [{ kind: "append", ...edit }], options);
}

export function placeAnchoredLine(
  ctx: MutationContext,
  path: string,
  edit: Omit<AnchoredLineEdit, "kind">,
  options?: MutateOptions,
): Promise<MutationResult> {
  return mutateDocument(ctx, path, [{ kind: "anchored-line", ...edit }], options);
}

export function writeManagedFile(
  ctx: MutationContext,
  path: string,
  content: string,
  options?: MutateOptions,
): Promise<MutationResult> {
  return mutateDocument(ctx, path, [{ kind: "managed-content", content }], options);
}
