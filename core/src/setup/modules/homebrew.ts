import { detectHomebrew } from "../../detect/detectors.js";
import { PreconditionMissingError } from "../../errors.js";
import type { ProvisionModule } from "../types.js";
import { moduleResult } from "./shared.js";

const NAME = "01-homebrew";

export const homebrewModule: ProvisionModule = {
  name: NAME,
  description: "Homebrew package manager",
  required: true,

  async detect(ctx) {
    return [await detectHomebrew(ctx.runner)];
  },

  async apply(ctx) {
    const { logger, packages } = ctx;
    const brew = await detectHomebrew(ctx.runner);

    if (brew.installed) {
      packages.activate();
      logger.success(`Homebrew already installed (${brew.version ?? "unknown version"})`);
      if (!ctx.config.updatePackageManager) {
        logger.info("Skipping Homebrew update");
        return moduleResult(NAME, "ok", ["Homebrew already installed"]);
      }
      logger.substep("Updating Homebrew");
      await packages.update();
      return moduleResult(NAME, "ok", ["Homebrew already installed", "Homebrew updated"]);
    }

    logger.info("Homebrew not found, installing...");
    await packages.bootstrap();
    if (ctx.mode === "simulate") {
      return moduleResult(NAME, "ok", ["Homebrew would be installed"]);
    }

    packages.activate();
    if (!(await packages.isAvailable())) {
      throw new PreconditionMissingError("homebrew", "Homebrew installation finished but brew is not on PATH");
    }
    logger.success("Homebrew installed");
    return moduleResult(NAME, "ok", ["Homebrew installed"]);
  },
};
