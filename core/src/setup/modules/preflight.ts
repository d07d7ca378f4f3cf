import { detectXcodeCli } from "../../detect/detectors.js";
import { PreconditionMissingError } from "../../errors.js";
import { checkArchitecture, checkOperatingSystem, checkXcodeCli } from "../prerequisites.js";
import type { PrerequisiteResult, ProvisionModule } from "../types.js";
import { moduleResult } from "./shared.js";

const NAME = "00-preflight";

function describe(check: PrerequisiteResult): string {
  return check.message ?? `${check.name}: ${check.version ?? "ok"}`;
}

/**
 * macOS version, CPU architecture and Xcode Command Line Tools.
 */
export const preflightModule: ProvisionModule = {
  name: NAME,
  description: "System checks and prerequisites",
  required: true,

  async detect(ctx) {
    return [await detectXcodeCli(ctx.runner)];
  },

  async apply(ctx) {
    const { logger } = ctx;
    const messages: string[] = [];

    logger.substep("Checking macOS version");
    const os = checkOperatingSystem(ctx.host);
    if (os.status === "fail") {
      throw new PreconditionMissingError("macos", describe(os));
    }
    logger.success(os.version ?? os.name);
    messages.push(describe(os));

    logger.substep("Checking CPU architecture");
    const arch = checkArchitecture(ctx.host);
    if (arch.status === "fail") {
      throw new PreconditionMissingError("architecture", describe(arch));
    }
    if (arch.status === "warn") {
      logger.warn(describe(arch));
    } else {
      logger.success(arch.version ?? arch.name);
    }
    messages.push(describe(arch));

    logger.substep("Checking Xcode Command Line Tools");
    const xcode = await checkXcodeCli(ctx.runner);
    if (xcode.status === "pass") {
      logger.success("Xcode CLI tools installed");
      messages.push("Xcode CLI tools installed");
      return moduleResult(NAME, "ok", messages);
    }

    if (ctx.mode === "simulate") {
      logger.info("[DRY RUN] Would run: xcode-select --install");
      messages.push("Xcode CLI tools would be installed");
      return moduleResult(NAME, "ok", messages);
    }

    // The installer is a GUI dialog; the run cannot continue until it is done.
    await ctx.runner.run("xcode-select", ["--install"], { timeoutMs: 0 });
    throw new PreconditionMissingError(
      "xcode-cli",
      "Xcode Command Line Tools are required. Complete the installer dialog, then run rigup again.",
    );
  },
};
