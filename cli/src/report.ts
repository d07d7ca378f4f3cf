/**
 * Plain-text reports printed by the commands.
 */

import chalk from "chalk";
import type {
  Capability,
  DetectionSummary,
  ExecutionMode,
  FinalizeResult,
  HostInfo,
  ProvisionModule,
  RestoreResult,
  RunReport,
  SessionSummary,
} from "@rigup/core";

export type Palette = InstanceType<typeof chalk.Instance>;

export function palette(color = true): Palette {
  return color ? chalk : new chalk.Instance({ level: 0 });
}

function describeHost(host: HostInfo): string {
  const os = host.platform === "darwin" ? `macOS ${host.osVersion}` : `${host.platform} ${host.osVersion}`;
  return `${os} (${host.arch}${host.translated ? ", Rosetta" : ""})`;
}

function capabilityLine(cap: Capability, optional: boolean, c: Palette): string {
  if (!cap.installed) {
    return optional ? `  ${c.yellow("○")} ${cap.name} (not installed)` : `  ${c.red("✗")} ${cap.name} (not installed)`;
  }
  const version = cap.version && cap.version !== "installed" ? ` ${cap.version}` : "";
  const path = cap.path ? c.dim(` (${cap.path})`) : "";
  return `  ${c.green("✓")} ${cap.name}${version}${path}`;
}

export function formatDetectionSummary(summary: DetectionSummary, c: Palette = palette()): string[] {
  const lines = [c.bold("System"), `  ${describeHost(summary.host)}`];
  for (const group of summary.groups) {
    lines.push("", c.bold(group.title));
    for (const cap of group.capabilities) {
      lines.push(capabilityLine(cap, group.optional ?? false, c));
    }
  }
  return lines;
}

export function formatSessionList(sessions: SessionSummary[]): string[] {
  return sessions.map((s) => `${s.id} (${s.fileCount} files)`);
}

export function formatModuleList(modules: readonly ProvisionModule[]): string[] {
  return modules.map((m) => `  ${m.name.padEnd(16)}${m.description}`);
}

export function formatRunSummary(
  report: RunReport,
  backup: FinalizeResult,
  mode: ExecutionMode,
  c: Palette = palette(),
): string[] {
  const lines = ["", c.bold("Summary")];
  for (const result of report.results) {
    if (result.status === "ok") {
      lines.push(`  ${c.green("✓")} ${result.name}`);
    } else if (result.status === "skipped") {
      lines.push(`  ${c.yellow("-")} ${result.name} (skipped)`);
    } else {
      lines.push(`  ${c.red("✗")} ${result.name}: ${result.messages.join("; ")}`);
    }
  }

  if (report.abortedBy) {
    lines.push("", c.red(`Stopped after ${report.abortedBy.name}`));
  }
  if (backup.fileCount > 0) {
    lines.push("", `Backups: ${backup.fileCount} files in session ${backup.id}`);
    lines.push(`Restore with: rigup restore ${backup.id}`);
  }
  if (mode === "simulate") {
    lines.push("", c.yellow("Dry run: no changes were made"));
  }
  return lines;
}

export function formatRestoreSummary(result: RestoreResult, mode: ExecutionMode): string[] {
  const verb = mode === "simulate" ? "Would restore" : "Restored";
  const lines = [`${verb} ${result.restored.length} item(s) from ${result.sessionId}`];
  if (result.skipped.length > 0) {
    lines.push(`Skipped ${result.skipped.length} item(s) with a missing backup copy`);
  }
  for (const failure of result.failed) {
    lines.push(`Failed: ${failure.path}: ${failure.error}`);
  }
  return lines;
}
