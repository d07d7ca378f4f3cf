/**
 * Grouped detection summary for the `detect` command and the final report.
 */

import {
  detectFzf,
  detectHomebrew,
  detectHost,
  detectNerdFont,
  detectNode,
  detectOhMyPosh,
  detectOhMyTmux,
  detectOhMyZsh,
  detectSolarizedTheme,
  detectTmux,
  detectUv,
  detectZsh,
} from "./detectors.js";
import type { Capability, DetectionEnv, HostInfo } from "./types.js";

export interface CapabilityGroup {
  title: string;
  capabilities: Capability[];
  /** Absent entries are informational, not problems. */
  optional?: boolean;
}

export interface DetectionSummary {
  host: HostInfo;
  groups: CapabilityGroup[];
}

export async function collectDetectionSummary(
  env: DetectionEnv,
  platform: NodeJS.Platform = process.platform,
): Promise<DetectionSummary> {
  const { runner } = env;
  const [host, core, shell, dev, tmux, fonts] = await Promise.all([
    detectHost(runner, platform),
    Promise.all([detectHomebrew(runner), detectZsh(runner), detectTmux(runner), detectFzf(runner)]),
    Promise.all([detectOhMyZsh(env), detectOhMyPosh(runner)]),
    Promise.all([detectNode(runner), detectUv(runner)]),
    Promise.all([detectOhMyTmux(env), detectSolarizedTheme(env)]),
    Promise.all([detectNerdFont(env)]),
  ]);

  return {
    host,
    groups: [
      { title: "Core Tools", capabilities: core },
      { title: "Shell Enhancements", capabilities: shell },
      { title: "Development Tools", capabilities: dev, optional: true },
      { title: "Tmux Configuration", capabilities: tmux },
      { title: "Fonts", capabilities: fonts },
    ],
  };
}
