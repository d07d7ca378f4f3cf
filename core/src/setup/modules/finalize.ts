import { pruneOldSessions } from "../../backup/retention.js";
import { finalizeSession } from "../../backup/session.js";
import type { ProvisionContext } from "../../context.js";
import type { ProvisionModule, VerificationResult } from "../types.js";
import { verifyInstallation } from "../verification.js";
import { moduleResult } from "./shared.js";

const NAME = "99-finalize";

export const NEXT_STEPS = [
  "Restart your terminal or run: source ~/.zshrc",
  "Set your terminal font to a Nerd Font (e.g. MesloLGS NF)",
  "Start tmux with: tmux",
];

function report(ctx: ProvisionContext, result: VerificationResult): void {
  const line = `${result.check}: ${result.message}`;
  if (result.status === "pass") ctx.logger.success(line);
  else if (result.status === "warn") ctx.logger.warn(line);
  else ctx.logger.error(line);
}

/**
 * Verification, backup summary, retention and next steps. Always the last
 * module; selected by default even when nothing else changed.
 */
export const finalizeModule: ProvisionModule = {
  name: NAME,
  description: "Verification and cleanup",

  async detect() {
    return [];
  },

  async apply(ctx) {
    const { logger, session } = ctx;
    const messages: string[] = [];

    logger.substep("Verifying installation");
    const checks = await verifyInstallation(ctx);
    checks.forEach((check) => report(ctx, check));
    const failed = checks.filter((c) => c.status === "fail");
    const passed = checks.filter((c) => c.status === "pass").length;
    messages.push(`Verification: ${passed} passed, ${failed.length} failed`);

    const backup = await finalizeSession(session);
    if (backup.fileCount > 0) {
      logger.info(`Backups saved to ${session.rootDir} (${backup.fileCount} files)`);
      messages.push(`Backup session ${backup.id}: ${backup.fileCount} files`);
    } else if (session.mode === "simulate" && session.entries.length > 0) {
      messages.push(`Would back up ${session.entries.length} files`);
    }

    // Never prune the session this run just wrote.
    const keep = backup.fileCount > 0 ? Math.max(1, ctx.config.keepBackups) : ctx.config.keepBackups;
    const pruned = await pruneOldSessions(session.baseDir, keep, { mode: ctx.mode, logger });
    if (pruned.removed.length > 0) {
      const verb = pruned.simulated ? "Would remove" : "Removed";
      messages.push(`${verb} ${pruned.removed.length} old backup session(s)`);
    }

    logger.log("");
    logger.log("Next steps:");
    NEXT_STEPS.forEach((step, i) => logger.log(`  ${i + 1}. ${step}`));

    // A simulated run leaves tools uninstalled, so failures there say nothing.
    if (failed.length > 0 && ctx.mode === "apply") {
      return moduleResult(NAME, "failed", [...messages, ...failed.map((f) => `${f.check}: ${f.message}`)]);
    }
    logger.success("Setup complete!");
    return moduleResult(NAME, "ok", messages);
  },
};
