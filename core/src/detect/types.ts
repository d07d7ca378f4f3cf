/**
 * Types for state detection.
 */

import type { CommandRunner } from "./command-runner.js";

/** A named fact about the host. Never persisted. */
export interface Capability {
  name: string;
  installed: boolean;
  version?: string;
  path?: string;
}

/** Read-only probe: no side effects, bounded run time. */
export type Detector = () => Promise<Capability>;

export interface HostInfo {
  platform: NodeJS.Platform;
  /** `uname -m` style: arm64, x86_64. */
  arch: string;
  /** Product version (macOS) or kernel release elsewhere. */
  osVersion: string;
  /** Running under Rosetta translation. */
  translated: boolean;
}

export interface DetectionEnv {
  runner: CommandRunner;
  homeDir: string;
  /** Directories searched for Nerd Fonts. */
  fontDirs?: string[];
}
