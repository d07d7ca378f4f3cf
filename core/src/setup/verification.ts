/**
 * Post-installation verification checks.
 */

import type { ProvisionContext } from "../context.js";
import { detectionEnv } from "../context.js";
import {
  detectFzf,
  detectNerdFont,
  detectOhMyPosh,
  detectOhMyTmux,
  detectOhMyZsh,
  detectSolarizedTheme,
  detectTmux,
  detectTmuxLocalConfig,
  detectZsh,
} from "../detect/detectors.js";
import type { Capability } from "../detect/types.js";
import type { VerificationResult } from "./types.js";

function toolCheck(label: string, capability: Capability): VerificationResult {
  if (!capability.installed) {
    return { check: label, status: "fail", message: `${label} not found` };
  }
  return {
    check: label,
    status: "pass",
    message: capability.version ? `${label} ${capability.version}` : `${label} installed`,
  };
}

/**
 * Run all verification checks after installation.
 */
export async function verifyInstallation(ctx: ProvisionContext): Promise<VerificationResult[]> {
  const env = detectionEnv(ctx);
  const { runner } = ctx;
  const results: VerificationResult[] = [
    toolCheck("zsh", await detectZsh(runner)),
    toolCheck("tmux", await detectTmux(runner)),
    toolCheck("fzf", await detectFzf(runner)),
    toolCheck("oh-my-posh", await detectOhMyPosh(runner)),
    toolCheck("Oh-My-Zsh", await detectOhMyZsh(env)),
    toolCheck("Oh-My-Tmux", await detectOhMyTmux(env)),
  ];

  const solarized = await detectSolarizedTheme(env);
  if (solarized.installed) {
    results.push({ check: "tmux theme", status: "pass", message: "Solarized Dark theme configured" });
  } else if ((await detectTmuxLocalConfig(env)).installed) {
    results.push({ check: "tmux theme", status: "warn", message: "tmux.conf.local uses a custom theme" });
  } else {
    results.push({ check: "tmux theme", status: "fail", message: "tmux.conf.local not found" });
  }

  const font = await detectNerdFont(env);
  results.push(
    font.installed
      ? { check: "Nerd Font", status: "pass", message: "Nerd Font installed" }
      : { check: "Nerd Font", status: "warn", message: "No Nerd Font found; icons may not render" },
  );

  return results;
}
