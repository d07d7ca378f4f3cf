/**
 * rigup configuration
 *
 * Optional `~/.rigup/config.json`. Every field is optional; anything missing
 * or of the wrong type falls back to its default. Environment variables
 * override the file, and CLI flags override both.
 */

import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { join } from "path";
import { getErrorMessage } from "../logging/error-utils.js";
import { createLogger, type Logger } from "../logging/logger.js";

export type FontMode = "minimal" | "full" | "ask";

export interface RigupConfig {
  backupDir: string;
  keepBackups: number;
  updatePackageManager: boolean;
  zshPlugins: string[];
  promptTheme: string;
  fontMode: FontMode;
}

export const DEFAULT_ZSH_PLUGINS = [
  "git",
  "docker",
  "docker-compose",
  "python",
  "virtualenv",
  "uv",
  "npm",
  "nvm",
  "z",
];

export const DEFAULT_PROMPT_THEME = "di4am0nd";

/** Home directory, honouring RIGUP_HOME. */
export function resolveHomeDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.RIGUP_HOME || homedir();
}

export function getConfigPath(homeDir: string): string {
  return join(homeDir, ".rigup", "config.json");
}

export function getDefaultConfig(homeDir: string): RigupConfig {
  return {
    backupDir: join(homeDir, ".rigup-backups"),
    keepBackups: 5,
    updatePackageManager: true,
    zshPlugins: [...DEFAULT_ZSH_PLUGINS],
    promptTheme: DEFAULT_PROMPT_THEME,
    fontMode: "ask",
  };
}

function expandHome(path: string, homeDir: string): string {
  if (path === "~") return homeDir;
  return path.startsWith("~/") ? join(homeDir, path.slice(2)) : path;
}

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((v) => typeof v === "string" && v.trim() !== "");

const isFontMode = (value: unknown): value is FontMode =>
  value === "minimal" || value === "full" || value === "ask";

/** Merge a parsed config file over the defaults, field by field. */
export function parseConfig(raw: unknown, homeDir: string): RigupConfig {
  const defaults = getDefaultConfig(homeDir);
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) {
    return defaults;
  }
  const parsed: Record<string, unknown> = { ...raw };

  return {
    backupDir:
      typeof parsed.backupDir === "string" && parsed.backupDir
        ? expandHome(parsed.backupDir, homeDir)
        : defaults.backupDir,
    keepBackups:
      typeof parsed.keepBackups === "number" && Number.isInteger(parsed.keepBackups) && parsed.keepBackups >= 0
        ? parsed.keepBackups
        : defaults.keepBackups,
    updatePackageManager:
      typeof parsed.updatePackageManager === "boolean" ? parsed.updatePackageManager : defaults.updatePackageManager,
    zshPlugins: isStringArray(parsed.zshPlugins) ? parsed.zshPlugins : defaults.zshPlugins,
    promptTheme:
      typeof parsed.promptTheme === "string" && /^[\w.-]+$/.test(parsed.promptTheme)
        ? parsed.promptTheme
        : defaults.promptTheme,
    fontMode: isFontMode(parsed.fontMode) ? parsed.fontMode : defaults.fontMode,
  };
}

export interface LoadConfigOptions {
  homeDir: string;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

export function loadConfig(options: LoadConfigOptions): RigupConfig {
  const { homeDir, env = process.env, logger = createLogger() } = options;
  const path = getConfigPath(homeDir);

  let config = getDefaultConfig(homeDir);
  if (existsSync(path)) {
    try {
      config = parseConfig(JSON.parse(readFileSync(path, "utf8")), homeDir);
    } catch (err) {
      logger.warn(`Ignoring ${path}: ${getErrorMessage(err)}`);
    }
  }

  if (env.RIGUP_BACKUP_DIR) {
    config.backupDir = expandHome(env.RIGUP_BACKUP_DIR, homeDir);
  }
  return config;
}
