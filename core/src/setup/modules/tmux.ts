import { promises as fs } from "fs";
import { dirname, join } from "path";
import { backupFile } from "../../backup/session.js";
import { detectionEnv, type ProvisionContext } from "../../context.js";
import { detectOhMyTmux, detectTmux, detectTmuxLocalConfig } from "../../detect/detectors.js";
import { writeManagedFile } from "../../document/mutator.js";
import { CommandFailedError } from "../../errors.js";
import { replaceWithSymlink } from "../../fs/file-ops.js";
import { isNotFoundError } from "../../logging/error-utils.js";
import type { ProvisionModule } from "../types.js";
import { describeMutation, moduleResult, requireTool } from "./shared.js";

const NAME = "06-tmux";

export const OH_MY_TMUX_REPO = "https://github.com/gpakosz/.tmux.git";
export const OH_MY_TMUX_DIR = ".local/share/tmux/oh-my-tmux";
export const TMUX_CONF = ".config/tmux/tmux.conf";
export const TMUX_LOCAL_CONF = ".config/tmux/tmux.conf.local";

const TEMPLATE_PATH = join(__dirname, "../../../templates/tmux.conf.local");

export async function loadTmuxTemplate(): Promise<string> {
  return fs.readFile(TEMPLATE_PATH, "utf8");
}

async function linksTo(path: string, target: string): Promise<boolean> {
  try {
    const stats = await fs.lstat(path);
    return stats.isSymbolicLink() && (await fs.readlink(path)) === target;
  } catch (err) {
    if (isNotFoundError(err)) return false;
    throw err;
  }
}

async function ensureOhMyTmux(ctx: ProvisionContext, messages: string[]): Promise<string> {
  const { logger } = ctx;
  logger.substep("Installing Oh-My-Tmux");

  const existing = await detectOhMyTmux(detectionEnv(ctx));
  if (existing.path) {
    logger.success(`Oh-My-Tmux already installed at ${existing.path}`);
    messages.push("Oh-My-Tmux already installed");
    return existing.path;
  }

  const dir = join(ctx.homeDir, OH_MY_TMUX_DIR);
  if (ctx.mode === "simulate") {
    logger.info(`[DRY RUN] Would clone ${OH_MY_TMUX_REPO} into ${dir}`);
    messages.push("Oh-My-Tmux would be installed");
    return dir;
  }

  await fs.mkdir(dirname(dir), { recursive: true });
  const result = await ctx.runner.run("git", ["clone", OH_MY_TMUX_REPO, dir], { timeoutMs: 0, interactive: true });
  if (!result.ok) {
    throw new CommandFailedError(`git clone ${OH_MY_TMUX_REPO}`, result.code, result.stderr);
  }
  logger.success("Oh-My-Tmux installed");
  messages.push("Oh-My-Tmux installed");
  return dir;
}

async function linkTmuxConf(ctx: ProvisionContext, omtDir: string, messages: string[]): Promise<void> {
  const { logger } = ctx;
  logger.substep("Configuring tmux.conf");

  const conf = join(ctx.homeDir, TMUX_CONF);
  const target = join(omtDir, ".tmux.conf");
  if (await linksTo(conf, target)) {
    logger.success("tmux.conf already linked to Oh-My-Tmux");
    return;
  }

  await backupFile(ctx.session, conf, "existing tmux.conf");
  if (await replaceWithSymlink(conf, target, { mode: ctx.mode, logger })) {
    logger.success("tmux.conf linked to Oh-My-Tmux");
    messages.push(`Linked ${conf}`);
  } else {
    messages.push(`Would link ${conf} -> ${target}`);
  }
}

async function writeLocalConf(ctx: ProvisionContext, messages: string[]): Promise<void> {
  const { logger } = ctx;
  logger.substep("Configuring tmux.conf.local with Solarized Dark");

  const localConf = join(ctx.homeDir, TMUX_LOCAL_CONF);
  const template = await loadTmuxTemplate();

  const current = await detectTmuxLocalConfig(detectionEnv(ctx));
  if (current.path === localConf) {
    const content = await fs.readFile(localConf, "utf8");
    if (content === template) {
      logger.success("tmux.conf.local already configured with Solarized Dark");
      messages.push("tmux.conf.local already configured");
      return;
    }
    if (content.includes("Solarized Dark")) {
      logger.info("tmux.conf.local already uses a Solarized Dark theme");
      if (!(await ctx.decisions.confirm("Overwrite existing configuration?", true))) {
        messages.push("Kept the existing tmux.conf.local");
        return;
      }
    }
  }

  const result = await writeManagedFile(ctx, localConf, template, { description: "existing tmux.conf.local" });
  if (result.written) {
    logger.success("Solarized Dark theme applied");
  }
  messages.push(...describeMutation(result, ctx.mode === "simulate"));
}

export const tmuxModule: ProvisionModule = {
  name: NAME,
  description: "Tmux with Oh-My-Tmux and the Solarized Dark theme",

  async detect(ctx) {
    const env = detectionEnv(ctx);
    return [await detectTmux(ctx.runner), await detectOhMyTmux(env), await detectTmuxLocalConfig(env)];
  },

  async apply(ctx) {
    if (!requireTool(ctx, await detectTmux(ctx.runner), "02-core-tools")) {
      return moduleResult(NAME, "skipped", ["tmux not installed yet"]);
    }

    const messages: string[] = [];
    const omtDir = await ensureOhMyTmux(ctx, messages);
    await linkTmuxConf(ctx, omtDir, messages);
    await writeLocalConf(ctx, messages);
    return moduleResult(NAME, "ok", messages);
  },
};
