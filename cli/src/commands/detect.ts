/**
 * Detect command: report what is installed, without changing anything.
 */

import { ExecCommandRunner, collectDetectionSummary, resolveHomeDir } from "@rigup/core";
import { formatDetectionSummary, palette } from "../report.js";
import { printer, type CommandDeps } from "./shared.js";

export interface DetectDeps extends CommandDeps {
  platform?: NodeJS.Platform;
  fontDirs?: string[];
}

export async function runDetect(deps: DetectDeps = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const print = printer(deps);
  const runner = deps.runner ?? new ExecCommandRunner();

  const summary = await collectDetectionSummary(
    { runner, homeDir: resolveHomeDir(env), ...(deps.fontDirs ? { fontDirs: deps.fontDirs } : {}) },
    deps.platform,
  );
  formatDetectionSummary(summary, palette(deps.color ?? true)).forEach((line) => print(line));
  return 0;
}
