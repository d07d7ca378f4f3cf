/**
 * Detectors for tools, configuration files and the host system.
 *
 * Every probe reports "not installed" on failure instead of throwing.
 */

import { promises as fs } from "fs";
import { join } from "path";
import { isDirectory, pathExists } from "../fs/file-ops.js";
import { DEFAULT_PROBE_TIMEOUT_MS, type CommandRunner } from "./command-runner.js";
import type { Capability, DetectionEnv, HostInfo } from "./types.js";

/** Oh My Tmux checkout locations, preferred first. */
export const OH_MY_TMUX_DIRS = [".local/share/tmux/oh-my-tmux", ".tmux"];
export const TMUX_CONFIG_PATHS = [".config/tmux/tmux.conf", ".tmux.conf"];
export const TMUX_LOCAL_CONFIG_PATHS = [".config/tmux/tmux.conf.local", ".tmux.conf.local"];

export function defaultFontDirs(homeDir: string): string[] {
  return [join(homeDir, "Library/Fonts"), "/Library/Fonts"];
}

async function probe(runner: CommandRunner, command: string, args: string[]): Promise<string | null> {
  const result = await runner.run(command, args, { timeoutMs: DEFAULT_PROBE_TIMEOUT_MS });
  return result.ok ? result.stdout.trim() : null;
}

const firstLine = (text: string): string => text.split("\n")[0].trim();
const word = (text: string, index: number): string | undefined => firstLine(text).split(/\s+/)[index];

/**
 * Version probe for a command on PATH. `pick` extracts the version from
 * its output.
 */
export async function detectCommand(
  runner: CommandRunner,
  name: string,
  command: string,
  args: string[],
  pick: (output: string) => string | undefined,
): Promise<Capability> {
  const output = await probe(runner, command, args);
  if (output === null) {
    return { name, installed: false };
  }
  const version = pick(output);
  return version ? { name, installed: true, version } : { name, installed: true };
}

export const detectHomebrew = (runner: CommandRunner): Promise<Capability> =>
  detectCommand(runner, "homebrew", "brew", ["--version"], (out) => word(out, 1));

export const detectZsh = (runner: CommandRunner): Promise<Capability> =>
  detectCommand(runner, "zsh", "zsh", ["--version"], (out) => word(out, 1));

export const detectTmux = (runner: CommandRunner): Promise<Capability> =>
  detectCommand(runner, "tmux", "tmux", ["-V"], (out) => word(out, 1));

export const detectFzf = (runner: CommandRunner): Promise<Capability> =>
  detectCommand(runner, "fzf", "fzf", ["--version"], (out) => word(out, 0));

export const detectOhMyPosh = (runner: CommandRunner): Promise<Capability> =>
  detectCommand(runner, "oh-my-posh", "oh-my-posh", ["--version"], (out) => firstLine(out) || "installed");

export const detectNode = (runner: CommandRunner): Promise<Capability> =>
  detectCommand(runner, "node", "node", ["--version"], (out) => firstLine(out).replace(/^v/, ""));

export const detectUv = (runner: CommandRunner): Promise<Capability> =>
  detectCommand(runner, "uv", "uv", ["--version"], (out) => word(out, 1));

/**
 * Run a file-system probe, reporting `name` as not installed when the
 * probe throws (unreadable paths, a file where a directory belongs).
 */
async function guarded(name: string, probeFs: () => Promise<Capability>): Promise<Capability> {
  try {
    return await probeFs();
  } catch {
    return { name, installed: false };
  }
}

export async function detectOhMyZsh(env: DetectionEnv): Promise<Capability> {
  return guarded("oh-my-zsh", async () => {
    const dir = join(env.homeDir, ".oh-my-zsh");
    if (!(await isDirectory(dir))) {
      return { name: "oh-my-zsh", installed: false };
    }
    let version = "installed";
    if (await isDirectory(join(dir, ".git"))) {
      version = (await probe(env.runner, "git", ["-C", dir, "describe", "--tags"])) || version;
    }
    return { name: "oh-my-zsh", installed: true, version, path: dir };
  });
}

export async function detectOhMyTmux(env: DetectionEnv): Promise<Capability> {
  return guarded("oh-my-tmux", async () => {
    for (const relative of OH_MY_TMUX_DIRS) {
      const dir = join(env.homeDir, relative);
      if ((await isDirectory(dir)) && (await pathExists(join(dir, ".tmux.conf")))) {
        return { name: "oh-my-tmux", installed: true, path: dir };
      }
    }
    return { name: "oh-my-tmux", installed: false };
  });
}

async function firstExisting(homeDir: string, candidates: string[]): Promise<string | null> {
  for (const relative of candidates) {
    const path = join(homeDir, relative);
    // A candidate that cannot be checked counts as absent.
    if (await pathExists(path).catch(() => false)) {
      return path;
    }
  }
  return null;
}

export async function detectZshrc(env: DetectionEnv): Promise<Capability> {
  return guarded("zshrc", async () => {
    const path = join(env.homeDir, ".zshrc");
    return (await pathExists(path)) ? { name: "zshrc", installed: true, path } : { name: "zshrc", installed: false };
  });
}

export async function detectTmuxConfig(env: DetectionEnv): Promise<Capability> {
  return guarded("tmux-config", async () => {
    const path = await firstExisting(env.homeDir, TMUX_CONFIG_PATHS);
    return path ? { name: "tmux-config", installed: true, path } : { name: "tmux-config", installed: false };
  });
}

export async function detectTmuxLocalConfig(env: DetectionEnv): Promise<Capability> {
  return guarded("tmux-local-config", async () => {
    const path = await firstExisting(env.homeDir, TMUX_LOCAL_CONFIG_PATHS);
    return path
      ? { name: "tmux-local-config", installed: true, path }
      : { name: "tmux-local-config", installed: false };
  });
}

/** The tmux local config carries the Solarized Dark theme. */
export async function detectSolarizedTheme(env: DetectionEnv): Promise<Capability> {
  return guarded("solarized-dark", async () => {
    const local = await detectTmuxLocalConfig(env);
    if (local.path) {
      const content = await fs.readFile(local.path, "utf8");
      if (content.includes("Solarized Dark")) {
        return { name: "solarized-dark", installed: true, path: local.path };
      }
    }
    return { name: "solarized-dark", installed: false };
  });
}

/**
 * Nerd Font files in the user or system font directory. With `fontName`,
 * only files whose name contains it count.
 */
export async function detectNerdFont(env: DetectionEnv, fontName?: string): Promise<Capability> {
  const name = fontName ? `nerd-font:${fontName}` : "nerd-font";
  for (const dir of env.fontDirs ?? defaultFontDirs(env.homeDir)) {
    const files = await fs.readdir(dir).catch((): string[] => []);
    const match = files.find((f) => f.includes("Nerd") && (!fontName || f.includes(fontName)));
    if (match) {
      return { name, installed: true, path: join(dir, match) };
    }
  }
  return { name, installed: false };
}

export async function detectXcodeCli(runner: CommandRunner): Promise<Capability> {
  const path = await probe(runner, "xcode-select", ["-p"]);
  return path ? { name: "xcode-cli", installed: true, path } : { name: "xcode-cli", installed: false };
}

export async function detectRosetta(runner: CommandRunner): Promise<boolean> {
  return (await probe(runner, "sysctl", ["-n", "sysctl.proc_translated"])) === "1";
}

/** Default shell recorded for the user in the directory service. */
export async function detectLoginShell(runner: CommandRunner, user: string): Promise<string | null> {
  const output = await probe(runner, "dscl", [".", "-read", `/Users/${user}`, "UserShell"]);
  if (!output) return null;
  return output.replace(/^UserShell:\s*/, "").trim() || null;
}

export async function detectHost(
  runner: CommandRunner,
  platform: NodeJS.Platform = process.platform,
): Promise<HostInfo> {
  const [arch, productVersion, kernel, translated] = await Promise.all([
    probe(runner, "uname", ["-m"]),
    platform === "darwin" ? probe(runner, "sw_vers", ["-productVersion"]) : Promise.resolve(null),
    probe(runner, "uname", ["-r"]),
    detectRosetta(runner),
  ]);
  return {
    platform,
    arch: arch || process.arch,
    osVersion: productVersion || kernel || "unknown",
    translated,
  };
}
