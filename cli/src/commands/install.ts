/**
 * Install command: run the provisioning modules.
 */

import { userInfo } from "os";
import {
  AutoDecisionProvider,
  BrewClient,
  ExecCommandRunner,
  MODULES,
  acquireRunLock,
  detectHost,
  finalizeSession,
  getErrorMessage,
  hasFailures,
  initSession,
  loadConfig,
  resolveHomeDir,
  runModules,
  selectModules,
  type DecisionProvider,
  type ExecutionMode,
  type HostInfo,
  type PackageManagerClient,
  type ProvisionContext,
  type ProvisionModule,
  type RunLock,
} from "@rigup/core";
import { InquirerDecisionProvider } from "../prompts/inquirer-decisions.js";
import { formatRunSummary, palette } from "../report.js";
import { commandLogger, printer, type CommandDeps } from "./shared.js";

export interface InstallOptions {
  dryRun?: boolean;
  yes?: boolean;
  verbose?: boolean;
  skipBackup?: boolean;
  /** False with --no-update. */
  update?: boolean;
  module?: string[];
  skip?: string[];
  keepBackups?: number;
}

export interface InstallDeps extends CommandDeps {
  decisions?: DecisionProvider;
  packages?: PackageManagerClient;
  host?: HostInfo;
  username?: string;
  now?: Date;
  modules?: readonly ProvisionModule[];
  fontDirs?: string[];
}

function defaultDecisions(yes: boolean): DecisionProvider {
  // Without a terminal nobody can answer, so behave like --yes.
  if (yes || !process.stdin.isTTY) {
    return new AutoDecisionProvider();
  }
  return new InquirerDecisionProvider();
}

/**
 * Returns the process exit code.
 */
export async function runInstall(options: InstallOptions, deps: InstallDeps = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const print = printer(deps);
  const logger = commandLogger(deps, options.verbose);
  const mode: ExecutionMode = options.dryRun ? "simulate" : "apply";

  const homeDir = resolveHomeDir(env);
  const config = loadConfig({ homeDir, env, logger });
  if (options.keepBackups !== undefined) {
    config.keepBackups = options.keepBackups;
  }
  if (options.update === false) {
    config.updatePackageManager = false;
  }

  let modules: ProvisionModule[];
  try {
    modules = selectModules(deps.modules ?? MODULES, { only: options.module, skip: options.skip }, logger);
  } catch (err) {
    logger.error(getErrorMessage(err));
    return 1;
  }

  if (mode === "simulate") {
    logger.info("Dry run: nothing will be changed");
  }

  const runner = deps.runner ?? new ExecCommandRunner();
  const host = deps.host ?? (await detectHost(runner));
  const ctx: ProvisionContext = {
    session: initSession({
      baseDir: config.backupDir,
      homeDir,
      mode,
      enabled: !options.skipBackup,
      logger,
      ...(deps.now ? { now: deps.now } : {}),
    }),
    mode,
    logger,
    homeDir,
    username: deps.username ?? (env.USER || userInfo().username),
    host,
    config,
    decisions: deps.decisions ?? defaultDecisions(options.yes ?? false),
    packages: deps.packages ?? new BrewClient({ runner, mode, arch: host.arch, logger, env }),
    runner,
    ...(deps.fontDirs ? { fontDirs: deps.fontDirs } : {}),
  };

  let lock: RunLock | null;
  try {
    lock = await acquireRunLock(config.backupDir, { mode, logger });
  } catch (err) {
    logger.error(getErrorMessage(err));
    return 1;
  }

  try {
    const report = await runModules(ctx, modules);
    const backup = await finalizeSession(ctx.session);
    for (const line of formatRunSummary(report, backup, mode, palette(deps.color ?? true))) {
      print(line);
    }
    return hasFailures(report) ? 1 : 0;
  } finally {
    await lock?.release();
  }
}
