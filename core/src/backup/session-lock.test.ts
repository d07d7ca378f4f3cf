/**
 * Tests for session-lock.ts
 */

import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import { promises as fs } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { ConcurrentRunError } from "../errors.js";
import { LOCK_FILE, acquireRunLock } from "./session-lock.js";

// Above the kernel's maximum pid, so never a live process.
const DEAD_PID = 999999999;

describe("acquireRunLock", () => {
  let baseDir: string;

  beforeEach(async () => {
    baseDir = await fs.mkdtemp(join(tmpdir(), "rigup-lock-"));
  });

  afterEach(async () => {
    await fs.rm(baseDir, { recursive: true, force: true });
  });

  it("writes the owner pid and removes the file on release", async () => {
    const lock = await acquireRunLock(baseDir, { mode: "apply", pid: 4242 });

    expect(await fs.readFile(join(baseDir, LOCK_FILE), "utf8")).toBe("4242\n");
    await lock?.release();
    await expect(fs.stat(join(baseDir, LOCK_FILE))).rejects.toThrow();
  });

  it("refuses while a live process owns the lock", async () => {
    await fs.writeFile(join(baseDir, LOCK_FILE), `${process.pid}\n`);

    await expect(acquireRunLock(baseDir, { mode: "apply", pid: 4242 })).rejects.toBeInstanceOf(
      ConcurrentRunError,
    );
  });

  it("reclaims a lock left by a dead process", async () => {
    await fs.writeFile(join(baseDir, LOCK_FILE), `${DEAD_PID}\n`);

    const lock = await acquireRunLock(baseDir, { mode: "apply", pid: 4242 });

    expect(lock?.pid).toBe(4242);
    expect(await fs.readFile(join(baseDir, LOCK_FILE), "utf8")).toBe("4242\n");
  });

  it("takes no lock in simulate mode", async () => {
    expect(await acquireRunLock(join(baseDir, "nested"), { mode: "simulate" })).toBeNull();
    await expect(fs.stat(join(baseDir, "nested"))).rejects.toThrow();
  });
});
