/**
 * Edit planners.
 *
 * Each planner is a pure function from a document to a plan: the document
 * after the edit plus a status. Lines the edit does not own are carried
 * over verbatim and in order.
 */

import { AmbiguousAnchorError, AnchorNotFoundError, type RigupError } from "../errors.js";
import { findLines, parseDocument, type ConfigDocument } from "./config-document.js";

/** Replace the region from `open` through `close` with `header`, `items`, `footer`. */
export interface BlockReplaceEdit {
  kind: "block-replace";
  open: RegExp;
  close: RegExp;
  /** The rendered block is inserted before the first line matching this. */
  anchor: RegExp;
  header: string;
  items: string[];
  footer: string;
  indent?: string;
}

/** Rewrite every line matching `key` to `line`. */
export interface KeyLineEdit {
  kind: "key-line";
  key: RegExp;
  line: string;
  comment?: string;
}

/** Append `lines` at end of file unless a line already contains `marker`. */
export interface AppendEdit {
  kind: "append";
  marker: string;
  lines: string[];
  comment?: string;
}

/** Keep exactly one line containing `key`, placed after `anchor`. */
export interface AnchoredLineEdit {
  kind: "anchored-line";
  key: string;
  line: string;
  anchor: RegExp;
  comment?: string;
  /** Matches a companion comment removed together with a stale line. Defaults to `comment`. */
  companion?: RegExp;
}

/** Own the whole file. */
export interface ManagedContentEdit {
  kind: "managed-content";
  content: string;
}

export type DocumentEdit =
  | BlockReplaceEdit
  | KeyLineEdit
  | AppendEdit
  | AnchoredLineEdit
  | ManagedContentEdit;

export type EditStatus = "satisfied" | "changed" | "skipped";

export interface EditPlan {
  status: EditStatus;
  document: ConfigDocument;
  message: string;
  /** Set when the edit was skipped because of a problem in the document. */
  error?: RigupError;
  warnings: string[];
}

function satisfied(doc: ConfigDocument, message: string): EditPlan {
  return { status: "satisfied", document: doc, message, warnings: [] };
}

function skipped(doc: ConfigDocument, message: string, error?: RigupError): EditPlan {
  return { status: "skipped", document: doc, message, warnings: [], ...(error ? { error } : {}) };
}

function changed(
  lines: string[],
  doc: ConfigDocument,
  message: string,
  warnings: string[] = [],
  endWithNewline = false,
): EditPlan {
  return {
    status: "changed",
    document: { lines, trailingNewline: endWithNewline || doc.trailingNewline || doc.lines.length === 0 },
    message,
    warnings,
  };
}

function locateAnchor(doc: ConfigDocument, anchor: RegExp): { index: number; warnings: string[] } | null {
  const matches = findLines(doc, anchor);
  if (matches.length === 0) {
    return null;
  }
  const warnings = matches.length > 1 ? [new AmbiguousAnchorError(anchor.source, matches.length).message] : [];
  return { index: matches[0], warnings };
}

function closesInline(line: string, edit: BlockReplaceEdit): boolean {
  const at = line.indexOf(edit.header);
  const rest = at >= 0 ? line.slice(at + edit.header.length) : line;
  return rest.includes(edit.footer);
}

/** Item words of an existing block, comments dropped. */
export function extractBlockItems(blockLines: string[], header: string, footer: string): string[] {
  let text = blockLines
    .map((l) => l.replace(/#.*$/, "").trim())
    .join(" ")
    .trim();
  if (text.startsWith(header)) text = text.slice(header.length);
  const end = text.lastIndexOf(footer);
  if (end >= 0) text = text.slice(0, end);
  return text.split(/\s+/).filter((word) => word !== "");
}

function renderBlock(edit: BlockReplaceEdit): string[] {
  const indent = edit.indent ?? "  ";
  return [edit.header, ...edit.items.map((item) => `${indent}${item}`), edit.footer];
}

export function planBlockReplace(doc: ConfigDocument, edit: BlockReplaceEdit): EditPlan {
  let lines = [...doc.lines];
  const start = lines.findIndex((l) => edit.open.test(l));

  if (start >= 0) {
    let end = start;
    if (!closesInline(lines[start], edit)) {
      end = lines.findIndex((l, i) => i > start && edit.close.test(l));
      if (end < 0) {
        return skipped(doc, `Block opened at line ${start + 1} is never closed, leaving it untouched`);
      }
    }

    const current = extractBlockItems(lines.slice(start, end + 1), edit.header, edit.footer);
    if (current.length === edit.items.length && current.every((item, i) => item === edit.items[i])) {
      return satisfied(doc, "Block already up to date");
    }
    lines = [...lines.slice(0, start), ...lines.slice(end + 1)];
  }

  const anchor = locateAnchor({ lines, trailingNewline: doc.trailingNewline }, edit.anchor);
  if (!anchor) {
    return skipped(doc, "Anchor line not found, block not written", new AnchorNotFoundError(edit.anchor.source));
  }

  lines.splice(anchor.index, 0, ...renderBlock(edit));
  return changed(lines, doc, start >= 0 ? "Block replaced" : "Block inserted", anchor.warnings);
}

export function planKeyLine(doc: ConfigDocument, edit: KeyLineEdit): EditPlan {
  const matches = findLines(doc, edit.key);
  if (matches.length === 0) {
    return skipped(doc, `No line matches ${edit.key.source}, nothing to update`);
  }

  const first = matches[0];
  const hasComment = !edit.comment || (first > 0 && doc.lines[first - 1] === edit.comment);
  if (hasComment && matches.every((i) => doc.lines[i] === edit.line)) {
    return satisfied(doc, "Line already set");
  }

  const lines = doc.lines.map((l, i) => (matches.includes(i) ? edit.line : l));
  if (edit.comment && !hasComment) {
    lines.splice(first, 0, edit.comment);
  }
  return changed(lines, doc, `Updated ${matches.length} line(s)`);
}

export function planAppend(doc: ConfigDocument, edit: AppendEdit): EditPlan {
  if (doc.lines.some((l) => l.includes(edit.marker))) {
    return satisfied(doc, `Already references ${edit.marker}`);
  }

  const lines = [...doc.lines];
  if (lines.length > 0) lines.push("");
  if (edit.comment) lines.push(edit.comment);
  lines.push(...edit.lines);
  return changed(lines, doc, `Appended ${edit.lines.length} line(s)`, [], true);
}

export function planAnchoredLine(doc: ConfigDocument, edit: AnchoredLineEdit): EditPlan {
  const keyed = doc.lines.filter((l) => l.includes(edit.key));
  if (keyed.length === 1 && keyed[0] === edit.line) {
    return satisfied(doc, "Line already present");
  }

  const companion = edit.companion;
  const isCompanion = (line: string): boolean =>
    companion ? companion.test(line) : edit.comment !== undefined && line === edit.comment;

  const drop = new Set<number>();
  doc.lines.forEach((line, i) => {
    if (!line.includes(edit.key)) return;
    drop.add(i);
    if (i > 0 && isCompanion(doc.lines[i - 1])) {
      drop.add(i - 1);
      if (i > 1 && doc.lines[i - 2].trim() === "") drop.add(i - 2);
    }
  });
  const lines = doc.lines.filter((_, i) => !drop.has(i));

  const anchor = locateAnchor({ lines, trailingNewline: doc.trailingNewline }, edit.anchor);
  if (!anchor) {
    return skipped(doc, "Anchor line not found, line not written", new AnchorNotFoundError(edit.anchor.source));
  }

  const inserted = ["", ...(edit.comment ? [edit.comment] : []), edit.line];
  lines.splice(anchor.index + 1, 0, ...inserted);
  return changed(lines, doc, keyed.length > 0 ? "Line replaced" : "Line inserted", anchor.warnings);
}

export function planManagedContent(doc: ConfigDocument, edit: ManagedContentEdit): EditPlan {
  const desired = parseDocument(edit.content);
  const same =
    desired.trailingNewline === doc.trailingNewline &&
    desired.lines.length === doc.lines.length &&
    desired.lines.every((l, i) => l === doc.lines[i]);
  if (same) {
    return satisfied(doc, "File already up to date");
  }
  return { status: "changed", document: desired, message: "File content replaced", warnings: [] };
}

export function planEdit(doc: ConfigDocument, edit: DocumentEdit): EditPlan {
  switch (edit.kind) {
    case "block-replace":
      return planBlockReplace(doc, edit);
    case "key-line":
      return planKeyLine(doc, edit);
    case "append":
      return planAppend(doc, edit);
    case "anchored-line":
      return planAnchoredLine(doc, edit);
    case "managed-content":
      return planManagedContent(doc, edit);
  }
}
