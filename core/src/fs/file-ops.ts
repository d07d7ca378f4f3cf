/**
 * File primitives shared by the backup engine and the document mutator.
 *
 * `atomicReplace` and the copy helpers used by the backup session are the
 * only places where configuration files are written.
 */

import { promises as fs } from "fs";
import { basename, dirname, join } from "path";
import { isNotFoundError } from "../logging/error-utils.js";
import type { Logger } from "../logging/logger.js";

export type ExecutionMode = "apply" | "simulate";

export async function pathExists(path: string): Promise<boolean> {
  try {
    await fs.stat(path);
    return true;
  } catch (err) {
    if (isNotFoundError(err)) {
      return false;
    }
    throw err;
  }
}

export async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await fs.stat(path)).isDirectory();
  } catch (err) {
    if (isNotFoundError(err)) {
      return false;
    }
    throw err;
  }
}

function tempPathFor(path: string): string {
  return join(dirname(path), `.${basename(path)}.${process.pid}.${Date.now()}.tmp`);
}

/**
 * The file a write to `path` should land in: a symlink's final target, so
 * links kept by a dotfile manager survive. A dangling link resolves to
 * itself.
 */
async function writeTarget(path: string): Promise<string> {
  try {
    return await fs.realpath(path);
  } catch (err) {
    if (isNotFoundError(err)) {
      return path;
    }
    throw err;
  }
}

/**
 * Fill a temp file beside `path` and rename it over `path`. The temp file
 * is removed when anything fails before the rename.
 */
async function replaceVia(
  path: string,
  fill: (tempPath: string) => Promise<void>,
): Promise<void> {
  await fs.mkdir(dirname(path), { recursive: true });
  const tempPath = tempPathFor(path);
  try {
    await fill(tempPath);
    await fs.rename(tempPath, path);
  } catch (err) {
    await fs.rm(tempPath, { force: true });
    throw err;
  }
}

/**
 * Replace `path` with `content` atomically. An existing file's mode bits
 * carry over to the new content. A symlinked `path` stays a link and its
 * target is replaced.
 *
 * Returns true when the file was written, false in simulate mode.
 */
export async function atomicReplace(
  path: string,
  content: string,
  options: { mode: ExecutionMode; logger: Logger },
): Promise<boolean> {
  const { mode, logger } = options;

  if (mode === "simulate") {
    logger.info(`[DRY RUN] Would write ${path}`);
    return false;
  }

  const target = await writeTarget(path);
  let fileMode: number | undefined;
  try {
    fileMode = (await fs.stat(target)).mode & 0o7777;
  } catch (err) {
    if (!isNotFoundError(err)) {
      throw err;
    }
  }

  await replaceVia(target, async (tempPath) => {
    await fs.writeFile(tempPath, content, "utf8");
    if (fileMode !== undefined) {
      await fs.chmod(tempPath, fileMode);
    }
  });

  logger.debug(`Wrote ${path}`);
  return true;
}

/**
 * Atomically put a copy of `source` (bytes, mode bits and times) at `dest`,
 * writing through a symlinked `dest`.
 */
export async function atomicCopy(source: string, dest: string): Promise<void> {
  await replaceVia(await writeTarget(dest), async (tempPath) => {
    await fs.copyFile(source, tempPath);
    await copyMetadata(source, tempPath);
  });
}

/**
 * Point `path` at `target` through a symlink, replacing whatever is there.
 * Returns false when the link already points at `target` or in simulate
 * mode.
 */
export async function replaceWithSymlink(
  path: string,
  target: string,
  options: { mode: ExecutionMode; logger: Logger },
): Promise<boolean> {
  const { mode, logger } = options;

  try {
    const stats = await fs.lstat(path);
    if (stats.isSymbolicLink() && (await fs.readlink(path)) === target) {
      return false;
    }
  } catch (err) {
    if (!isNotFoundError(err)) {
      throw err;
    }
  }

  if (mode === "simulate") {
    logger.info(`[DRY RUN] Would link ${path} -> ${target}`);
    return false;
  }

  await replaceVia(path, (tempPath) => fs.symlink(target, tempPath));
  logger.debug(`Linked ${path} -> ${target}`);
  return true;
}

async function copyMetadata(source: string, dest: string): Promise<void> {
  const stats = await fs.stat(source);
  await fs.chmod(dest, stats.mode & 0o7777);
  await fs.utimes(dest, stats.atime, stats.mtime);
}

/**
 * Copy a file with its mode bits and access/modification times.
 * Parent directories of `dest` are created. Symlinks are followed.
 */
export async function copyFilePreserving(source: string, dest: string): Promise<void> {
  await fs.mkdir(dirname(dest), { recursive: true });
  await fs.copyFile(source, dest);
  await copyMetadata(source, dest);
}

/**
 * Recursive copy keeping symlinks as links and preserving metadata of
 * files and directories.
 */
export async function copyDirectoryPreserving(source: string, dest: string): Promise<void> {
  await fs.mkdir(dest, { recursive: true });

  const entries = await fs.readdir(source, { withFileTypes: true });
  for (const entry of entries) {
    const from = join(source, entry.name);
    const to = join(dest, entry.name);

    if (entry.isSymbolicLink()) {
      const target = await fs.readlink(from);
      await fs.rm(to, { force: true, recursive: true });
      await fs.symlink(target, to);
    } else if (entry.isDirectory()) {
      await copyDirectoryPreserving(from, to);
    } else if (entry.isFile()) {
      await fs.copyFile(from, to);
      await copyMetadata(from, to);
    }
  }

  await copyMetadata(source, dest);
}

/**
 * Make `dest` an exact copy of the `source` tree. The copy is built in a
 * temp sibling and swapped in, so entries missing from `source` are gone
 * afterwards.
 */
export async function replaceDirectory(source: string, dest: string): Promise<void> {
  await fs.mkdir(dirname(dest), { recursive: true });
  const tempPath = tempPathFor(dest);
  try {
    await copyDirectoryPreserving(source, tempPath);
    await fs.rm(dest, { recursive: true, force: true });
    await fs.rename(tempPath, dest);
  } catch (err) {
    await fs.rm(tempPath, { recursive: true, force: true });
    throw err;
  }
}

/**
 * Count regular files below `dir`, recursively. Names in `exclude` are
 * ignored at the top level only.
 */
export async function countFiles(dir: string, exclude: string[] = []): Promise<number> {
  let count = 0;
  const entries = await fs.readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    if (exclude.includes(entry.name)) continue;
    if (entry.isDirectory()) {
      count += await countFiles(join(dir, entry.name));
    } else {
      count++;
    }
  }
  return count;
}
