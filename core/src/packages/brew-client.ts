/**
 * Homebrew implementation of the package-manager client.
 *
 * Read-only queries always run; anything that changes the system is only
 * reported in simulate mode.
 */

import { delimiter, join } from "path";
import type { CommandRunner } from "../detect/command-runner.js";
import { CommandFailedError } from "../errors.js";
import type { ExecutionMode } from "../fs/file-ops.js";
import { createLogger, type Logger } from "../logging/logger.js";
import type { PackageKind, PackageManagerClient } from "./types.js";

export const HOMEBREW_INSTALL_URL = "https://raw.githubusercontent.com/Homebrew/install/HEAD/install.sh";

/** Homebrew's install prefix for a CPU architecture. */
export function defaultBrewPrefix(arch: string): string {
  return arch === "arm64" ? "/opt/homebrew" : "/usr/local";
}

export interface BrewClientOptions {
  runner: CommandRunner;
  mode: ExecutionMode;
  arch: string;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
}

export class BrewClient implements PackageManagerClient {
  readonly name = "homebrew";
  private readonly runner: CommandRunner;
  private readonly mode: ExecutionMode;
  private readonly arch: string;
  private readonly logger: Logger;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: BrewClientOptions) {
    this.runner = options.runner;
    this.mode = options.mode;
    this.arch = options.arch;
    this.logger = options.logger ?? createLogger();
    this.env = options.env ?? process.env;
  }

  async isAvailable(): Promise<boolean> {
    return (await this.runner.run("brew", ["--version"])).ok;
  }

  /** Put the Homebrew bin directory on PATH for the rest of the run. */
  activate(): void {
    const bin = join(defaultBrewPrefix(this.arch), "bin");
    const entries = (this.env.PATH ?? "").split(delimiter).filter((p) => p !== "");
    if (!entries.includes(bin)) {
      this.env.PATH = [bin, ...entries].join(delimiter);
      this.logger.debug(`Added ${bin} to PATH`);
    }
  }

  async bootstrap(): Promise<void> {
    if (this.mode === "simulate") {
      this.logger.info("[DRY RUN] Would install Homebrew");
      return;
    }
    await this.mutate("/bin/bash", ["-c", `/bin/bash -c "$(curl -fsSL ${HOMEBREW_INSTALL_URL})"`]);
    this.activate();
  }

  async update(): Promise<void> {
    if (this.mode === "simulate") {
      this.logger.info("[DRY RUN] Would run: brew update");
      return;
    }
    await this.mutate("brew", ["update"]);
  }

  async isInstalled(pkg: string, kind: PackageKind = "formula"): Promise<boolean> {
    return (await this.runner.run("brew", ["list", `--${kind}`, pkg], { timeoutMs: 30000 })).ok;
  }

  async installedVersion(pkg: string): Promise<string | null> {
    const result = await this.runner.run("brew", ["list", "--versions", pkg], { timeoutMs: 30000 });
    if (!result.ok) return null;
    return result.stdout.trim().split(/\s+/)[1] ?? null;
  }

  async install(pkgs: string[], kind: PackageKind = "formula"): Promise<string[]> {
    const missing: string[] = [];
    for (const pkg of pkgs) {
      if (await this.isInstalled(pkg, kind)) {
        const version = kind === "formula" ? await this.installedVersion(pkg) : null;
        this.logger.success(`${pkg} already installed${version ? ` (${version})` : ""}`);
      } else {
        missing.push(pkg);
      }
    }

    if (missing.length === 0) {
      return [];
    }

    const args = ["install", ...(kind === "cask" ? ["--cask"] : []), ...missing];
    if (this.mode === "simulate") {
      this.logger.info(`[DRY RUN] Would run: brew ${args.join(" ")}`);
      return missing;
    }

    this.logger.substep(`Installing: ${missing.join(" ")}`);
    await this.mutate("brew", args);
    for (const pkg of missing) {
      this.logger.success(`${pkg} installed`);
    }
    return missing;
  }

  async prefix(pkg?: string): Promise<string> {
    const result = await this.runner.run("brew", ["--prefix", ...(pkg ? [pkg] : [])]);
    const value = result.stdout.trim();
    if (result.ok && value) {
      return value;
    }
    const base = defaultBrewPrefix(this.arch);
    return pkg ? join(base, "opt", pkg) : base;
  }

  private async mutate(command: string, args: string[]): Promise<void> {
    const result = await this.runner.run(command, args, { timeoutMs: 0, interactive: true, env: this.env });
    if (!result.ok) {
      throw new CommandFailedError([command, ...args].join(" "), result.code, result.stderr);
    }
  }
}
