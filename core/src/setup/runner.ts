/**
 * Module selection and the sequential run loop.
 */

import type { ProvisionContext } from "../context.js";
import { UnknownModuleError, isFatalError } from "../errors.js";
import { getErrorMessage } from "../logging/error-utils.js";
import type { Logger } from "../logging/logger.js";
import type { ModuleResult, ProvisionModule, RunReport } from "./types.js";

export interface ModuleSelection {
  /** Run only these, in the order given. */
  only?: string[];
  skip?: string[];
}

/** Accept `04-zsh-plugins` as well as the short `zsh-plugins`. */
function matches(module: ProvisionModule, name: string): boolean {
  return module.name === name || module.name.replace(/^\d+[a-z]?-/, "") === name;
}

function lookup(modules: readonly ProvisionModule[], name: string): ProvisionModule {
  const found = modules.find((m) => matches(m, name));
  if (!found) {
    throw new UnknownModuleError(name, modules.map((m) => m.name));
  }
  return found;
}

/**
 * Resolve `--module` / `--skip` against the registry. Unknown `--module`
 * names are errors; unknown `--skip` names only warn.
 */
export function selectModules(
  modules: readonly ProvisionModule[],
  selection: ModuleSelection,
  logger?: Logger,
): ProvisionModule[] {
  const { only = [], skip = [] } = selection;
  const picked = only.length > 0 ? only.map((name) => lookup(modules, name)) : [...modules];

  const skipped = new Set<ProvisionModule>();
  for (const name of skip) {
    const found = modules.find((m) => matches(m, name));
    if (found) {
      skipped.add(found);
    } else {
      logger?.warn(`Unknown module in --skip: ${name}`);
    }
  }

  const seen = new Set<ProvisionModule>();
  return picked.filter((m) => {
    if (skipped.has(m) || seen.has(m)) return false;
    seen.add(m);
    return true;
  });
}

function failure(module: ProvisionModule, err: unknown): ModuleResult {
  const error = err instanceof Error ? err : new Error(getErrorMessage(err));
  return { name: module.name, status: "failed", messages: [error.message], error };
}

/**
 * Run modules in order. A failing module is recorded and the run moves on,
 * unless the module is required or the error is fatal.
 */
export async function runModules(
  ctx: ProvisionContext,
  modules: readonly ProvisionModule[],
): Promise<RunReport> {
  const { logger } = ctx;
  const results: ModuleResult[] = [];

  for (const module of modules) {
    logger.step(`${module.name}: ${module.description}`);
    let result: ModuleResult;
    try {
      result = await module.apply(ctx);
    } catch (err) {
      result = failure(module, err);
    }
    results.push(result);

    if (result.status !== "failed") continue;
    logger.error(`${module.name} failed: ${result.messages.join("; ")}`);

    if (module.required || isFatalError(result.error)) {
      logger.error("Stopping: later modules depend on this one");
      return { results, abortedBy: result };
    }
  }

  return { results };
}

export function hasFailures(report: RunReport): boolean {
  return report.abortedBy !== undefined || report.results.some((r) => r.status === "failed");
}
