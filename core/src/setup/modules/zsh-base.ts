import { join } from "path";
import { backupFile } from "../../backup/session.js";
import { detectionEnv } from "../../context.js";
import { detectLoginShell, detectOhMyZsh, detectZsh } from "../../detect/detectors.js";
import { CommandFailedError } from "../../errors.js";
import type { ProvisionContext } from "../../context.js";
import type { ProvisionModule } from "../types.js";
import { moduleResult } from "./shared.js";

const NAME = "03-zsh-base";

export const OH_MY_ZSH_INSTALL_URL = "https://raw.githubusercontent.com/ohmyzsh/ohmyzsh/master/tools/install.sh";
const ZSH_PATH = "/bin/zsh";

async function ensureDefaultShell(ctx: ProvisionContext, messages: string[]): Promise<void> {
  const { logger } = ctx;
  logger.substep("Checking default shell");

  const shell = await detectLoginShell(ctx.runner, ctx.username);
  if (shell === null) {
    logger.warn("Could not read the default shell");
    return;
  }
  if (shell.includes("zsh")) {
    logger.success("Default shell is zsh");
    return;
  }

  logger.warn(`Current shell is ${shell}`);
  if (!(await ctx.decisions.confirm("Change default shell to zsh?", true))) {
    logger.info("Keeping current shell");
    messages.push(`Default shell left as ${shell}`);
    return;
  }
  if (ctx.mode === "simulate") {
    logger.info(`[DRY RUN] Would run: chsh -s ${ZSH_PATH}`);
    messages.push("Default shell would change to zsh");
    return;
  }

  const result = await ctx.runner.run("chsh", ["-s", ZSH_PATH], { timeoutMs: 0, interactive: true });
  if (!result.ok) {
    throw new CommandFailedError(`chsh -s ${ZSH_PATH}`, result.code, result.stderr);
  }
  logger.success("Default shell changed to zsh");
  messages.push("Default shell changed to zsh");
}

async function ensureOhMyZsh(ctx: ProvisionContext, messages: string[]): Promise<void> {
  const { logger } = ctx;
  logger.substep("Checking Oh-My-Zsh");

  const omz = await detectOhMyZsh(detectionEnv(ctx));
  if (omz.installed) {
    logger.success(`Oh-My-Zsh already installed (${omz.version ?? "installed"})`);
    messages.push("Oh-My-Zsh already installed");
    return;
  }

  // The installer rewrites .zshrc when KEEP_ZSHRC is ignored; keep a copy either way.
  await backupFile(ctx.session, join(ctx.homeDir, ".zshrc"), "existing zshrc before oh-my-zsh install");

  if (ctx.mode === "simulate") {
    logger.info("[DRY RUN] Would install Oh-My-Zsh");
    messages.push("Oh-My-Zsh would be installed");
    return;
  }

  const script = `sh -c "$(curl -fsSL ${OH_MY_ZSH_INSTALL_URL})"`;
  const result = await ctx.runner.run("sh", ["-c", script], {
    timeoutMs: 0,
    interactive: true,
    env: { ...process.env, HOME: ctx.homeDir, RUNZSH: "no", KEEP_ZSHRC: "yes" },
  });
  if (!result.ok) {
    throw new CommandFailedError("Oh-My-Zsh installer", result.code, result.stderr);
  }
  logger.success("Oh-My-Zsh installed");
  messages.push("Oh-My-Zsh installed");
}

export const zshBaseModule: ProvisionModule = {
  name: NAME,
  description: "Default shell and Oh-My-Zsh",

  async detect(ctx) {
    return [await detectZsh(ctx.runner), await detectOhMyZsh(detectionEnv(ctx))];
  },

  async apply(ctx) {
    const messages: string[] = [];
    await ensureDefaultShell(ctx, messages);
    await ensureOhMyZsh(ctx, messages);
    return moduleResult(NAME, "ok", messages);
  },
};
