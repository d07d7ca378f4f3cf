/**
 * Detect Module
 *
 * Read-only probes for installed tools, configuration files and the host.
 */

export type { Capability, Detector, DetectionEnv, HostInfo } from "./types.js";
export {
  ExecCommandRunner,
  DEFAULT_PROBE_TIMEOUT_MS,
  type CommandRunner,
  type CommandResult,
  type RunOptions,
} from "./command-runner.js";
export {
  OH_MY_TMUX_DIRS,
  TMUX_CONFIG_PATHS,
  TMUX_LOCAL_CONFIG_PATHS,
  defaultFontDirs,
  detectCommand,
  detectHomebrew,
  detectZsh,
  detectTmux,
  detectFzf,
  detectOhMyPosh,
  detectNode,
  detectUv,
  detectOhMyZsh,
  detectOhMyTmux,
  detectZshrc,
  detectTmuxConfig,
  detectTmuxLocalConfig,
  detectSolarizedTheme,
  detectNerdFont,
  detectXcodeCli,
  detectRosetta,
  detectLoginShell,
  detectHost,
} from "./detectors.js";
export { collectDetectionSummary, type CapabilityGroup, type DetectionSummary } from "./summary.js";
