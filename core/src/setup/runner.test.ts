/**
 * Tests for runner.ts and the module registry
 */

import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import { promises as fs } from "fs";
import { makeProvisionContext, makeTempDir } from "../__tests__/test-helpers.js";
import { BackupWriteFailedError, UnknownModuleError } from "../errors.js";
import { MODULES, moduleNames } from "./registry.js";
import { hasFailures, runModules, selectModules } from "./runner.js";
import type { ModuleResult, ProvisionModule } from "./types.js";

function stub(name: string, apply: () => Promise<ModuleResult>, required = false): ProvisionModule {
  return { name, description: `${name} stub`, required, detect: async () => [], apply };
}

const okModule = (name: string): ProvisionModule =>
  stub(name, async () => ({ name, status: "ok", messages: [] }));

describe("registry", () => {
  it("lists the modules in their fixed order", () => {
    expect(moduleNames()).toEqual([
      "00-preflight",
      "01-homebrew",
      "02-core-tools",
      "02a-dev-tools",
      "03-zsh-base",
      "04-zsh-plugins",
      "05-oh-my-posh",
      "06-tmux",
      "07-fonts",
      "99-finalize",
    ]);
  });
});

describe("selectModules", () => {
  it("runs --module picks in the order given, by full or short name", () => {
    const picked = selectModules(MODULES, { only: ["zsh-plugins", "00-preflight"] });
    expect(moduleNames(picked)).toEqual(["04-zsh-plugins", "00-preflight"]);
  });

  it("rejects unknown --module names", () => {
    expect(() => selectModules(MODULES, { only: ["kitty"] })).toThrow(UnknownModuleError);
  });

  it("drops skipped modules and ignores unknown --skip names", () => {
    const picked = selectModules(MODULES, { skip: ["dev-tools", "07-fonts", "kitty"] });
    expect(moduleNames(picked)).toEqual([
      "00-preflight",
      "01-homebrew",
      "02-core-tools",
      "03-zsh-base",
      "04-zsh-plugins",
      "05-oh-my-posh",
      "06-tmux",
      "99-finalize",
    ]);
  });
});

describe("runModules", () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir("runner");
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("records a failure and moves on", async () => {
    const modules = [
      okModule("a"),
      stub("b", async () => {
        throw new Error("boom");
      }),
      okModule("c"),
    ];

    const report = await runModules(makeProvisionContext({ root }), modules);

    expect(report.results.map((r) => [r.name, r.status])).toEqual([
      ["a", "ok"],
      ["b", "failed"],
      ["c", "ok"],
    ]);
    expect(report.results[1].messages).toEqual(["boom"]);
    expect(report.abortedBy).toBeUndefined();
    expect(hasFailures(report)).toBe(true);
  });

  it("stops after a required module fails", async () => {
    const modules = [
      stub("a", async () => ({ name: "a", status: "failed", messages: ["no"] }), true),
      okModule("b"),
    ];

    const report = await runModules(makeProvisionContext({ root }), modules);

    expect(report.results).toHaveLength(1);
    expect(report.abortedBy?.name).toBe("a");
  });

  it("stops on a fatal error", async () => {
    const modules = [
      stub("a", async () => {
        throw new BackupWriteFailedError("/home/tester/.zshrc", "disk full");
      }),
      okModule("b"),
    ];

    const report = await runModules(makeProvisionContext({ root }), modules);

    expect(report.abortedBy?.messages).toEqual(["Failed to back up /home/tester/.zshrc: disk full"]);
    expect(report.results.map((r) => r.name)).toEqual(["a"]);
  });

  it("reports success when nothing failed", async () => {
    const report = await runModules(makeProvisionContext({ root }), [okModule("a"), okModule("b")]);
    expect(hasFailures(report)).toBe(false);
  });
});
