import { detectFzf, detectHomebrew, detectOhMyPosh, detectTmux, detectZsh } from "../../detect/detectors.js";
import type { ProvisionModule } from "../types.js";
import { moduleResult, requireTool } from "./shared.js";

const NAME = "02-core-tools";

export const CORE_FORMULAS = [
  "tmux",
  "fzf",
  "fzf-tab",
  "zsh-autosuggestions",
  "zsh-syntax-highlighting",
  "oh-my-posh",
];

export const coreToolsModule: ProvisionModule = {
  name: NAME,
  description: "Core CLI tools (tmux, fzf, zsh plugins, oh-my-posh)",

  async detect(ctx) {
    const { runner } = ctx;
    return Promise.all([detectZsh(runner), detectTmux(runner), detectFzf(runner), detectOhMyPosh(runner)]);
  },

  async apply(ctx) {
    if (!requireTool(ctx, await detectHomebrew(ctx.runner), "01-homebrew")) {
      return moduleResult(NAME, "skipped", [`Would install: ${CORE_FORMULAS.join(" ")}`]);
    }

    const installed = await ctx.packages.install(CORE_FORMULAS);
    if (installed.length === 0) {
      ctx.logger.success("All core tools already installed");
      return moduleResult(NAME, "ok", ["All core tools already installed"]);
    }
    const verb = ctx.mode === "simulate" ? "Would install" : "Installed";
    return moduleResult(NAME, "ok", [`${verb}: ${installed.join(" ")}`]);
  },
};
