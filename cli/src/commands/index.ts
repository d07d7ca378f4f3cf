export { runInstall, type InstallOptions, type InstallDeps } from "./install.js";
export { runRestore, type RestoreCommandOptions } from "./restore.js";
export { runBackups } from "./backups.js";
export { runModulesList } from "./modules.js";
export { runDetect, type DetectDeps } from "./detect.js";
export type { CommandDeps } from "./shared.js";
