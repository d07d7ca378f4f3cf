/**
 * Single-instance lock for apply-mode runs.
 *
 * The lock file holds the owner's pid. A lock whose owner is gone is
 * reclaimed.
 */

import { promises as fs } from "fs";
import { join } from "path";
import { ConcurrentRunError } from "../errors.js";
import type { ExecutionMode } from "../fs/file-ops.js";
import { isAlreadyExistsError, isNotFoundError } from "../logging/error-utils.js";
import { createLogger, type Logger } from "../logging/logger.js";

export const LOCK_FILE = ".rigup.lock";

export interface RunLock {
  path: string;
  pid: number;
  release: () => Promise<void>;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else.
    return err instanceof Error && "code" in err && err.code === "EPERM";
  }
}

async function readOwner(path: string): Promise<number | null> {
  try {
    const pid = Number.parseInt((await fs.readFile(path, "utf8")).trim(), 10);
    return Number.isInteger(pid) && pid > 0 ? pid : null;
  } catch (err) {
    if (isNotFoundError(err)) return null;
    throw err;
  }
}

/**
 * Take the run lock in `baseDir`. Simulate mode takes no lock and returns
 * null. Throws `ConcurrentRunError` while another live process owns it.
 */
export async function acquireRunLock(
  baseDir: string,
  options: { mode: ExecutionMode; logger?: Logger; pid?: number },
): Promise<RunLock | null> {
  const { mode, logger = createLogger(), pid = process.pid } = options;
  if (mode === "simulate") return null;

  const path = join(baseDir, LOCK_FILE);
  await fs.mkdir(baseDir, { recursive: true });

  for (let attempt = 0; attempt < 2; attempt++) {
    try {
      await fs.writeFile(path, `${pid}\n`, { flag: "wx" });
      logger.debug(`Acquired lock ${path}`);
      return {
        path,
        pid,
        release: async () => {
          if ((await readOwner(path)) === pid) {
            await fs.rm(path, { force: true });
          }
        },
      };
    } catch (err) {
      if (!isAlreadyExistsError(err)) throw err;
    }

    const owner = await readOwner(path);
    if (owner !== null && isProcessAlive(owner)) {
      throw new ConcurrentRunError(path, owner);
    }
    logger.warn(`Removing stale lock ${path}${owner !== null ? ` (pid ${owner})` : ""}`);
    await fs.rm(path, { force: true });
  }

  throw new ConcurrentRunError(path, (await readOwner(path)) ?? 0);
}
