/**
 * Test helpers shared by core module tests
 */

import { promises as fs } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { initSession } from "../backup/session.js";
import { getDefaultConfig, type RigupConfig } from "../config/config-store.js";
import type { ProvisionContext } from "../context.js";
import { AutoDecisionProvider } from "../decisions/providers.js";
import type { DecisionProvider } from "../decisions/types.js";
import type { CommandResult, CommandRunner, RunOptions } from "../detect/command-runner.js";
import type { HostInfo } from "../detect/types.js";
import type { ExecutionMode } from "../fs/file-ops.js";
import { createLogger } from "../logging/logger.js";
import type { PackageKind, PackageManagerClient } from "../packages/types.js";

export interface RecordedCall {
  command: string;
  args: string[];
  options: RunOptions;
}

type Responder = Partial<CommandResult> | ((call: RecordedCall) => Partial<CommandResult>);

/**
 * CommandRunner answering from a table keyed by the full command line
 * ("brew --version"). Unknown commands behave like a missing binary.
 */
export class FakeCommandRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];
  private readonly responses = new Map<string, Responder>();

  constructor(responses: Record<string, Responder> = {}) {
    for (const [key, value] of Object.entries(responses)) {
      this.responses.set(key, value);
    }
  }

  respond(commandLine: string, response: Responder): this {
    this.responses.set(commandLine, response);
    return this;
  }

  commandLines(): string[] {
    return this.calls.map((c) => [c.command, ...c.args].join(" "));
  }

  async run(command: string, args: string[] = [], options: RunOptions = {}): Promise<CommandResult> {
    const call = { command, args, options };
    this.calls.push(call);
    const responder = this.responses.get([command, ...args].join(" "));
    if (responder === undefined) {
      return { ok: false, code: null, stdout: "", stderr: `${command}: command not found` };
    }
    const partial = typeof responder === "function" ? responder(call) : responder;
    return { ok: true, code: 0, stdout: "", stderr: "", ...partial };
  }
}

/** Successful command printing `stdout`. */
export const ok = (stdout = ""): Partial<CommandResult> => ({ ok: true, code: 0, stdout });

/** Failing command. */
export const fail = (code = 1): Partial<CommandResult> => ({ ok: false, code });

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(join(tmpdir(), `rigup-${prefix}-`));
}

/**
 * In-memory package manager. `install` marks packages installed and
 * returns the ones that were missing.
 */
export class FakePackageManager implements PackageManagerClient {
  readonly name = "fake";
  available: boolean;
  readonly installed: Set<string>;
  readonly installCalls: { pkgs: string[]; kind: PackageKind }[] = [];
  updates = 0;
  bootstraps = 0;
  activations = 0;

  constructor(options: { available?: boolean; installed?: string[] } = {}) {
    this.available = options.available ?? true;
    this.installed = new Set(options.installed ?? []);
  }

  async isAvailable(): Promise<boolean> {
    return this.available;
  }

  activate(): void {
    this.activations += 1;
  }

  async bootstrap(): Promise<void> {
    this.bootstraps += 1;
    this.available = true;
  }

  async update(): Promise<void> {
    this.updates += 1;
  }

  async isInstalled(pkg: string): Promise<boolean> {
    return this.installed.has(pkg);
  }

  async installedVersion(pkg: string): Promise<string | null> {
    return this.installed.has(pkg) ? "1.0.0" : null;
  }

  async install(pkgs: string[], kind: PackageKind = "formula"): Promise<string[]> {
    this.installCalls.push({ pkgs, kind });
    const missing = pkgs.filter((p) => !this.installed.has(p));
    missing.forEach((p) => this.installed.add(p));
    return missing;
  }

  async prefix(pkg?: string): Promise<string> {
    return pkg ? `/opt/homebrew/opt/${pkg}` : "/opt/homebrew";
  }
}

export const MAC_HOST: HostInfo = { platform: "darwin", arch: "arm64", osVersion: "14.4.1", translated: false };

export interface TestContextOptions {
  /** Temp directory holding `home/` and `backups/`. */
  root: string;
  mode?: ExecutionMode;
  runner?: FakeCommandRunner;
  packages?: FakePackageManager;
  decisions?: DecisionProvider;
  host?: HostInfo;
  config?: Partial<RigupConfig>;
  now?: Date;
}

/** A provisioning context rooted in a temp directory, with fakes for everything external. */
export function makeProvisionContext(options: TestContextOptions): ProvisionContext {
  const { root, mode = "apply", now = new Date(2024, 5, 1, 10, 0, 0) } = options;
  const homeDir = join(root, "home");
  const config: RigupConfig = { ...getDefaultConfig(homeDir), backupDir: join(root, "backups"), ...options.config };
  const logger = createLogger();
  return {
    session: initSession({ baseDir: config.backupDir, homeDir, mode, now, logger }),
    mode,
    logger,
    homeDir,
    username: "tester",
    host: options.host ?? MAC_HOST,
    config,
    decisions: options.decisions ?? new AutoDecisionProvider(),
    packages: options.packages ?? new FakePackageManager(),
    runner: options.runner ?? new FakeCommandRunner(),
    fontDirs: [join(homeDir, "Library/Fonts")],
  };
}
