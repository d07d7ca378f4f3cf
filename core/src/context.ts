/**
 * Per-run provisioning context.
 *
 * Created once by the CLI and passed to every module; nothing in the core
 * reads process-wide state for these values.
 */

import type { RigupConfig } from "./config/config-store.js";
import type { DecisionProvider } from "./decisions/types.js";
import type { CommandRunner } from "./detect/command-runner.js";
import type { DetectionEnv, HostInfo } from "./detect/types.js";
import type { MutationContext } from "./document/mutator.js";
import type { PackageManagerClient } from "./packages/types.js";

export interface ProvisionContext extends MutationContext {
  homeDir: string;
  /** Login name, used for the default-shell lookup. */
  username: string;
  host: HostInfo;
  config: RigupConfig;
  decisions: DecisionProvider;
  packages: PackageManagerClient;
  runner: CommandRunner;
  /** Overrides the Nerd Font search directories. */
  fontDirs?: string[];
}

export function detectionEnv(ctx: ProvisionContext): DetectionEnv {
  return ctx.fontDirs
    ? { runner: ctx.runner, homeDir: ctx.homeDir, fontDirs: ctx.fontDirs }
    : { runner: ctx.runner, homeDir: ctx.homeDir };
}
