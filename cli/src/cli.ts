#!/usr/bin/env node
/**
 * rigup CLI
 *
 * Provisions a macOS terminal environment from ordered modules, backing up
 * every file it changes.
 *
 * Commands:
 *   rigup              - Run the install modules (default)
 *   rigup restore <id> - Restore a backup session
 *   rigup backups      - List backup sessions
 *   rigup modules      - List the install modules
 *   rigup detect       - Show what is installed
 */

import { Command, InvalidArgumentError } from "commander";
import {
  runBackups,
  runDetect,
  runInstall,
  runModulesList,
  runRestore,
  type InstallOptions,
  type RestoreCommandOptions,
} from "./commands/index.js";

const VERSION = "0.3.0";

export function parseCount(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return Number.parseInt(value, 10);
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("rigup")
    .description("Set up zsh, tmux, Oh My Posh and Nerd Fonts on macOS")
    .version(VERSION);

  program
    .command("install", { isDefault: true })
    .description("Run the install modules in order")
    .option("-n, --dry-run", "Show what would change without changing anything")
    .option("-y, --yes", "Accept the default answer to every question")
    .option("--verbose", "Show debug output")
    .option("--skip-backup", "Do not back up files before changing them")
    .option("--no-update", "Do not update Homebrew")
    .option("-m, --module <name...>", "Run only these modules, in the order given")
    .option("-s, --skip <name...>", "Skip these modules")
    .option("--keep-backups <n>", "Number of backup sessions to keep", parseCount)
    .action(async (options: InstallOptions) => {
      process.exitCode = await runInstall(options);
    });

  program
    .command("restore <sessionId>")
    .description("Restore the files saved in a backup session")
    .option("-n, --dry-run", "Show what would be restored")
    .option("--verbose", "Show debug output")
    .action(async (sessionId: string, options: RestoreCommandOptions) => {
      process.exitCode = await runRestore(sessionId, options);
    });

  program
    .command("backups")
    .description("List backup sessions")
    .action(async () => {
      process.exitCode = await runBackups();
    });

  program
    .command("modules")
    .description("List the install modules in run order")
    .action(() => {
      process.exitCode = runModulesList();
    });

  program
    .command("detect")
    .description("Show installed tools and configuration")
    .action(async () => {
      process.exitCode = await runDetect();
    });

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      console.error(err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
    });
}
