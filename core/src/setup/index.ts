/**
 * Setup Module
 *
 * Provisioning modules, their fixed order and the run loop.
 */

export type {
  ModuleResult,
  ModuleStatus,
  PrerequisiteResult,
  ProvisionModule,
  RunReport,
  VerificationResult,
} from "./types.js";

export {
  MIN_MACOS_MAJOR,
  checkArchitecture,
  checkOperatingSystem,
  checkPrerequisites,
  checkXcodeCli,
} from "./prerequisites.js";
export { verifyInstallation } from "./verification.js";

export * from "./modules/index.js";
export { MODULES, moduleNames } from "./registry.js";
export { hasFailures, runModules, selectModules, type ModuleSelection } from "./runner.js";
