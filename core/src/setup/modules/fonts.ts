import { detectionEnv, type ProvisionContext } from "../../context.js";
import { detectHomebrew, detectNerdFont } from "../../detect/detectors.js";
import type { ProvisionModule } from "../types.js";
import { moduleResult, requireTool } from "./shared.js";

const NAME = "07-fonts";

export const MINIMAL_FONTS = ["meslo-lg"];
export const FULL_FONTS = ["hack", "meslo-lg", "fira-code"];

type FontChoice = "minimal" | "full" | "skip";

export const fontCask = (font: string): string => `font-${font}-nerd-font`;

export const FONT_INSTRUCTIONS = [
  "To use Nerd Fonts, select one in your terminal app:",
  "  iTerm2:   Preferences -> Profiles -> Text -> Font",
  "  Terminal: Preferences -> Profiles -> Font",
  "  VS Code:  Settings -> Terminal.Integrated.Font.Family",
  "Recommended: MesloLGS NF, Hack Nerd Font, FiraCode Nerd Font",
];

async function chooseFonts(ctx: ProvisionContext): Promise<FontChoice> {
  const { fontMode } = ctx.config;
  if (fontMode !== "ask") return fontMode;
  if (!ctx.decisions.interactive) return "minimal";
  return ctx.decisions.select<FontChoice>(
    "Font installation",
    [
      { name: "Minimal - MesloLG Nerd Font only (recommended)", value: "minimal" },
      { name: "Full - Hack, MesloLG and FiraCode Nerd Fonts", value: "full" },
      { name: "Skip - don't install fonts", value: "skip" },
    ],
    "minimal",
  );
}

export const fontsModule: ProvisionModule = {
  name: NAME,
  description: "Nerd Fonts",

  async detect(ctx) {
    return [await detectNerdFont(detectionEnv(ctx))];
  },

  async apply(ctx) {
    const { logger } = ctx;

    const existing = await detectNerdFont(detectionEnv(ctx));
    if (existing.installed) {
      logger.success("Nerd Font already installed");
      if (!(await ctx.decisions.confirm("Install additional Nerd Fonts?", true))) {
        return moduleResult(NAME, "ok", ["Nerd Font already installed"]);
      }
    }

    const choice = await chooseFonts(ctx);
    if (choice === "skip") {
      logger.info("Skipping font installation");
      return moduleResult(NAME, "skipped", ["Font installation skipped"]);
    }

    const casks = (choice === "full" ? FULL_FONTS : MINIMAL_FONTS).map(fontCask);
    if (!requireTool(ctx, await detectHomebrew(ctx.runner), "01-homebrew")) {
      return moduleResult(NAME, "skipped", [`Would install: ${casks.join(" ")}`]);
    }

    logger.substep(`Installing fonts: ${casks.join(" ")}`);
    const installed = await ctx.packages.install(casks, "cask");
    for (const line of FONT_INSTRUCTIONS) {
      logger.log(line);
    }

    if (installed.length === 0) {
      return moduleResult(NAME, "ok", ["Selected Nerd Fonts already installed"]);
    }
    const verb = ctx.mode === "simulate" ? "Would install" : "Installed";
    return moduleResult(NAME, "ok", [`${verb}: ${installed.join(" ")}`]);
  },
};
