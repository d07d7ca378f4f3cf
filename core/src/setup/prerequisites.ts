/**
 * Host prerequisite checks run by the preflight module.
 */

import type { CommandRunner } from "../detect/command-runner.js";
import { detectXcodeCli } from "../detect/detectors.js";
import type { HostInfo } from "../detect/types.js";
import type { PrerequisiteResult } from "./types.js";

export const MIN_MACOS_MAJOR = 12;

const SUPPORTED_ARCHS = ["arm64", "x86_64"];

export function checkOperatingSystem(host: HostInfo): PrerequisiteResult {
  if (host.platform !== "darwin") {
    return {
      name: "Operating system",
      status: "fail",
      message: `This tool is designed for macOS only (found ${host.platform})`,
    };
  }

  const major = Number.parseInt(host.osVersion.split(".")[0], 10);
  if (Number.isNaN(major) || major < MIN_MACOS_MAJOR) {
    return {
      name: "Operating system",
      status: "fail",
      version: host.osVersion,
      message: `macOS ${MIN_MACOS_MAJOR} (Monterey) or later is required`,
    };
  }

  return { name: "Operating system", status: "pass", version: `macOS ${host.osVersion}` };
}

export function checkArchitecture(host: HostInfo): PrerequisiteResult {
  if (!SUPPORTED_ARCHS.includes(host.arch)) {
    return {
      name: "Architecture",
      status: "fail",
      version: host.arch,
      message: `Unsupported architecture: ${host.arch}`,
    };
  }
  if (host.translated) {
    return {
      name: "Architecture",
      status: "warn",
      version: host.arch,
      message: "Running under Rosetta 2 translation; a native terminal is recommended",
    };
  }
  const label = host.arch === "arm64" ? "Apple Silicon (arm64)" : "Intel (x86_64)";
  return { name: "Architecture", status: "pass", version: label };
}

export async function checkXcodeCli(runner: CommandRunner): Promise<PrerequisiteResult> {
  const xcode = await detectXcodeCli(runner);
  if (!xcode.installed) {
    return {
      name: "Xcode Command Line Tools",
      status: "fail",
      message: "Xcode Command Line Tools are not installed",
    };
  }
  return { name: "Xcode Command Line Tools", status: "pass", version: xcode.path };
}

/**
 * Check all prerequisites and return structured results.
 */
export async function checkPrerequisites(host: HostInfo, runner: CommandRunner): Promise<PrerequisiteResult[]> {
  return [checkOperatingSystem(host), checkArchitecture(host), await checkXcodeCli(runner)];
}
