import { promises as fs } from "fs";
import { join } from "path";
import { detectionEnv } from "../../context.js";
import { detectOhMyPosh, detectZshrc } from "../../detect/detectors.js";
import type { DocumentEdit } from "../../document/edits.js";
import { mutateDocument } from "../../document/mutator.js";
import { isNotFoundError } from "../../logging/error-utils.js";
import type { ProvisionModule } from "../types.js";
import { describeMutation, moduleResult, requireTool } from "./shared.js";

const NAME = "05-oh-my-posh";

export const OMP_INIT_KEY = "oh-my-posh init";
const OMZ_SOURCE_LINE = /source "?\$ZSH\/oh-my-zsh\.sh"?/;

export function ompInitLine(theme: string): string {
  return `eval "$(oh-my-posh init zsh --config $(brew --prefix oh-my-posh)/themes/${theme}.omp.json)"`;
}

export function ohMyPoshEdits(theme: string, includeInit: boolean): DocumentEdit[] {
  const edits: DocumentEdit[] = [];
  if (includeInit) {
    edits.push({
      kind: "anchored-line",
      key: OMP_INIT_KEY,
      line: ompInitLine(theme),
      anchor: OMZ_SOURCE_LINE,
      comment: `# Oh My Posh configuration (${theme} theme)`,
      companion: /^# Oh My Posh configuration/,
    });
  }
  edits.push({
    kind: "key-line",
    key: /^ZSH_THEME=/,
    line: 'ZSH_THEME=""',
    comment: "# Disable oh-my-zsh theme (using Oh My Posh instead)",
  });
  return edits;
}

async function readIfPresent(path: string): Promise<string> {
  try {
    return await fs.readFile(path, "utf8");
  } catch (err) {
    if (isNotFoundError(err)) return "";
    throw err;
  }
}

export const ohMyPoshModule: ProvisionModule = {
  name: NAME,
  description: "Oh-My-Posh prompt theme",

  async detect(ctx) {
    return [await detectOhMyPosh(ctx.runner)];
  },

  async apply(ctx) {
    const { logger } = ctx;
    const theme = ctx.config.promptTheme;
    if (!requireTool(ctx, await detectOhMyPosh(ctx.runner), "02-core-tools")) {
      return moduleResult(NAME, "skipped", ["oh-my-posh not installed yet"]);
    }

    const zshrc = join(ctx.homeDir, ".zshrc");
    if (!(await detectZshrc(detectionEnv(ctx))).installed && ctx.mode === "simulate") {
      logger.info(`[DRY RUN] ${zshrc} does not exist yet (03-zsh-base would create it)`);
      return moduleResult(NAME, "skipped", [`${zshrc} not found`]);
    }

    // A different theme is the user's choice until they agree to switch.
    const initLines = (await readIfPresent(zshrc)).split("\n").filter((l) => l.includes(OMP_INIT_KEY));
    let includeInit = true;
    if (initLines.length > 0 && !initLines.some((l) => l.includes(`${theme}.omp.json`))) {
      logger.info("Oh-My-Posh configured with a different theme");
      includeInit = await ctx.decisions.confirm(`Update to ${theme} theme?`, true);
    }

    logger.substep("Configuring Oh-My-Posh in zshrc");
    const result = await mutateDocument(ctx, zshrc, ohMyPoshEdits(theme, includeInit), {
      required: true,
      description: "before oh-my-posh configuration",
    });
    if (result.written) {
      logger.success(`Oh-My-Posh configured with ${theme} theme`);
    } else if (!result.changed) {
      logger.success(`Oh-My-Posh already configured with ${theme} theme`);
    }
    const messages = describeMutation(result, ctx.mode === "simulate");
    if (!includeInit) messages.push("Kept the existing Oh-My-Posh theme");
    return moduleResult(NAME, "ok", messages);
  },
};
