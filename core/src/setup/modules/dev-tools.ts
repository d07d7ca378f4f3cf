import { detectHomebrew, detectNode, detectUv } from "../../detect/detectors.js";
import type { CommandRunner } from "../../detect/command-runner.js";
import type { Capability } from "../../detect/types.js";
import type { ProvisionModule } from "../types.js";
import { moduleResult, requireTool } from "./shared.js";

const NAME = "02a-dev-tools";

interface DevTool {
  name: string;
  description: string;
  formula: string;
  detect(runner: CommandRunner): Promise<Capability>;
}

export const DEV_TOOLS: DevTool[] = [
  { name: "uv", description: "Python package/project manager", formula: "uv", detect: detectUv },
  { name: "node", description: "Node.js JavaScript runtime", formula: "node", detect: detectNode },
];

type InstallChoice = "all" | "select" | "skip";

/**
 * Optional tools. Only offered when someone can answer; auto-yes runs skip
 * the module entirely.
 */
export const devToolsModule: ProvisionModule = {
  name: NAME,
  description: "Optional development tools (uv, node)",

  async detect(ctx) {
    return Promise.all(DEV_TOOLS.map((tool) => tool.detect(ctx.runner)));
  },

  async apply(ctx) {
    const { logger, decisions } = ctx;
    if (!requireTool(ctx, await detectHomebrew(ctx.runner), "01-homebrew")) {
      return moduleResult(NAME, "skipped", ["Homebrew not installed yet"]);
    }

    const missing: DevTool[] = [];
    for (const tool of DEV_TOOLS) {
      const capability = await tool.detect(ctx.runner);
      if (capability.installed) {
        logger.success(`${tool.name} - already installed (${capability.version ?? "unknown version"})`);
      } else {
        logger.info(`${tool.name} - not installed (${tool.description})`);
        missing.push(tool);
      }
    }

    if (missing.length === 0) {
      logger.success("All development tools already installed");
      return moduleResult(NAME, "ok", ["All development tools already installed"]);
    }

    if (!decisions.interactive) {
      logger.info("Skipping optional dev tools in non-interactive mode");
      return moduleResult(NAME, "skipped", ["Optional dev tools are only offered interactively"]);
    }

    const names = missing.map((t) => t.name).join(" ");
    const choice = await decisions.select<InstallChoice>(
      "Install missing tools?",
      [
        { name: `Install all missing tools (${names})`, value: "all" },
        { name: "Select which tools to install", value: "select" },
        { name: "Skip", value: "skip" },
      ],
      "all",
    );

    let selected: DevTool[] = [];
    if (choice === "all") {
      selected = missing;
    } else if (choice === "select") {
      for (const tool of missing) {
        if (await decisions.confirm(`Install ${tool.name} (${tool.description})?`, true)) {
          selected.push(tool);
        }
      }
    }

    if (selected.length === 0) {
      logger.info("Skipping development tools installation");
      return moduleResult(NAME, "skipped", ["No development tools selected"]);
    }

    logger.substep(`Installing: ${selected.map((t) => t.name).join(" ")}`);
    const installed = await ctx.packages.install(selected.map((t) => t.formula));
    const verb = ctx.mode === "simulate" ? "Would install" : "Installed";
    return moduleResult(NAME, "ok", [`${verb}: ${installed.join(" ")}`]);
  },
};
