import { join } from "path";
import { detectionEnv, type ProvisionContext } from "../../context.js";
import { detectZshrc } from "../../detect/detectors.js";
import type { AppendEdit, DocumentEdit } from "../../document/edits.js";
import { mutateDocument } from "../../document/mutator.js";
import { defaultBrewPrefix } from "../../packages/brew-client.js";
import type { ProvisionModule } from "../types.js";
import { describeMutation, moduleResult } from "./shared.js";

const NAME = "04-zsh-plugins";

export const PLUGINS_OPEN = /^plugins=\(/;
export const PLUGINS_CLOSE = /^\)/;
export const OH_MY_ZSH_SOURCE = /^source.*oh-my-zsh\.sh/;

/** Homebrew-installed plugins sourced directly from .zshrc. */
export function brewPluginSources(arch: string): { plugin: string; path: string }[] {
  const prefix = defaultBrewPrefix(arch);
  return [
    { plugin: "fzf-tab", path: join(prefix, "opt/fzf-tab/share/fzf-tab/fzf-tab.zsh") },
    {
      plugin: "zsh-autosuggestions",
      path: join(prefix, "share/zsh-autosuggestions/zsh-autosuggestions.zsh"),
    },
    {
      plugin: "zsh-syntax-highlighting",
      path: join(prefix, "share/zsh-syntax-highlighting/zsh-syntax-highlighting.zsh"),
    },
  ];
}

export function zshPluginEdits(ctx: ProvisionContext): DocumentEdit[] {
  const appends: AppendEdit[] = brewPluginSources(ctx.host.arch).map(({ plugin, path }) => ({
    kind: "append",
    marker: path,
    comment: `# ${plugin} (Homebrew)`,
    lines: [`source "${path}"`],
  }));

  return [
    {
      kind: "block-replace",
      open: PLUGINS_OPEN,
      close: PLUGINS_CLOSE,
      anchor: OH_MY_ZSH_SOURCE,
      header: "plugins=(",
      items: ctx.config.zshPlugins,
      footer: ")",
    },
    ...appends,
  ];
}

export const zshPluginsModule: ProvisionModule = {
  name: NAME,
  description: "Oh-My-Zsh plugins and Homebrew zsh plugins",

  async detect(ctx) {
    return [await detectZshrc(detectionEnv(ctx))];
  },

  async apply(ctx) {
    const zshrc = join(ctx.homeDir, ".zshrc");
    const present = await detectZshrc(detectionEnv(ctx));
    if (!present.installed && ctx.mode === "simulate") {
      ctx.logger.info(`[DRY RUN] ${zshrc} does not exist yet (03-zsh-base would create it)`);
      return moduleResult(NAME, "skipped", [`${zshrc} not found`]);
    }

    ctx.logger.substep(`Configuring plugins: ${ctx.config.zshPlugins.join(" ")}`);
    const result = await mutateDocument(ctx, zshrc, zshPluginEdits(ctx), {
      required: true,
      description: "before plugin configuration",
    });
    if (!result.changed) {
      ctx.logger.success("Zsh plugins already configured");
    } else if (result.written) {
      ctx.logger.success("Zsh plugins configured");
    }
    return moduleResult(NAME, "ok", describeMutation(result, ctx.mode === "simulate"));
  },
};
