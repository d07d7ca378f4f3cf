/**
 * Helpers shared by the provisioning modules.
 */

import type { ProvisionContext } from "../../context.js";
import type { Capability } from "../../detect/types.js";
import type { MutationResult } from "../../document/mutator.js";
import { PreconditionMissingError } from "../../errors.js";
import type { ModuleResult, ModuleStatus } from "../types.js";

export function moduleResult(name: string, status: ModuleStatus, messages: string[] = []): ModuleResult {
  return { name, status, messages };
}

/**
 * Gate on a tool an earlier module installs. In simulate mode the earlier
 * install only happened on paper, so a missing tool skips instead of failing.
 */
export function requireTool(ctx: ProvisionContext, capability: Capability, installedBy: string): boolean {
  if (capability.installed) return true;
  if (ctx.mode === "simulate") {
    ctx.logger.info(`[DRY RUN] ${capability.name} is not installed yet (${installedBy} would install it)`);
    return false;
  }
  throw new PreconditionMissingError(
    capability.name,
    `${capability.name} not found. Run the ${installedBy} module first.`,
  );
}

/** Messages for a mutation: what changed, plus any edit that could not be applied. */
export function describeMutation(result: MutationResult, simulate: boolean): string[] {
  const messages = result.plans
    .filter((p) => p.status === "skipped")
    .map((p) => (p.error ? p.error.message : p.message));
  if (result.changed) {
    messages.unshift(simulate ? `Would update ${result.path}` : `Updated ${result.path}`);
  } else {
    messages.unshift(`${result.path} already configured`);
  }
  return messages;
}
