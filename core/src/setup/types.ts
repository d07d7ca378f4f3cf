/**
 * Types for the provisioning modules.
 */

import type { ProvisionContext } from "../context.js";
import type { Capability } from "../detect/types.js";

export interface PrerequisiteResult {
  name: string;
  status: "pass" | "fail" | "warn";
  version?: string;
  message?: string;
}

export interface VerificationResult {
  check: string;
  status: "pass" | "fail" | "warn";
  message: string;
}

export type ModuleStatus = "ok" | "skipped" | "failed";

export interface ModuleResult {
  name: string;
  status: ModuleStatus;
  messages: string[];
  /** Set when the module failed. */
  error?: Error;
}

/** One named unit of provisioning work, run in a fixed order. */
export interface ProvisionModule {
  name: string;
  description: string;
  /** A failure stops the run instead of moving on to the next module. */
  required?: boolean;
  /** Current state, read-only. */
  detect(ctx: ProvisionContext): Promise<Capability[]>;
  /** Reconcile towards the target state. Throws on failure. */
  apply(ctx: ProvisionContext): Promise<ModuleResult>;
}

export interface RunReport {
  results: ModuleResult[];
  /** Set when a fatal error or a required module stopped the run. */
  abortedBy?: ModuleResult;
}
