/**
 * MANIFEST.txt format.
 *
 * One mapping per line, `<original> -> <relative>`, optionally followed by
 * an indented `# description` line. Directory mappings end in `/` on both
 * sides. Blank and comment lines are ignored when parsing.
 */

import { isAbsolute, sep } from "path";
import type { BackupEntry, BackupEntryKind } from "./types.js";

export const MANIFEST_FILE = "MANIFEST.txt";

/** Prefix for paths stored from outside the home directory. */
export const OUTSIDE_HOME_PREFIX = "_root";

const MAPPING_PATTERN = /^(.+)\s+->\s+(.+)$/;

export interface ManifestMapping {
  original: string;
  relative: string;
  kind: BackupEntryKind;
}

export function formatManifestHeader(sessionId: string): string {
  return `# Backup Manifest - ${sessionId}\n# Created by rigup\n\n`;
}

export function formatManifestEntry(entry: BackupEntry): string {
  const suffix = entry.kind === "directory" ? "/" : "";
  let text = `${entry.original}${suffix} -> ${entry.relative}${suffix}\n`;
  if (entry.description) {
    text += `  # ${entry.description}\n`;
  }
  return text;
}

/**
 * Map an absolute path to its location inside a session: the home prefix
 * is stripped, anything else goes under `_root/`.
 */
export function relativePathFor(homeDir: string, absolutePath: string): string {
  const home = homeDir.endsWith(sep) ? homeDir : homeDir + sep;
  if (absolutePath.startsWith(home)) {
    return absolutePath.slice(home.length);
  }
  const stripped = absolutePath.replace(/^[/\\]+/, "");
  return `${OUTSIDE_HOME_PREFIX}/${stripped}`;
}

function stripTrailingSlash(value: string): string {
  return value.length > 1 ? value.replace(/\/+$/, "") : value;
}

/**
 * Parse manifest text into mappings, in file order.
 *
 * A line whose first non-blank character is `#` is never a mapping, even
 * when it contains `->`.
 */
export function parseManifest(text: string): ManifestMapping[] {
  const mappings: ManifestMapping[] = [];

  for (const rawLine of text.split("\n")) {
    const line = rawLine.trim();
    if (line === "" || line.startsWith("#")) continue;

    const match = MAPPING_PATTERN.exec(line);
    if (!match) continue;

    const [, left, right] = match;
    const kind: BackupEntryKind = left.endsWith("/") && right.endsWith("/") ? "directory" : "file";
    const original = stripTrailingSlash(left.trim());
    const relative = stripTrailingSlash(right.trim());

    // Relative paths never escape the session directory.
    if (!isAbsolute(original) || isAbsolute(relative) || relative.split("/").includes("..")) {
      continue;
    }

    mappings.push({ original, relative, kind });
  }

  return mappings;
}
