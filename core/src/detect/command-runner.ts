/**
 * Subprocess execution behind an interface, so detectors and installers
 * can be exercised with a fake in tests.
 */

import { execFile as execFileCb, spawn } from "child_process";
import { promisify } from "util";

const execFileAsync = promisify(execFileCb);

/** Probe timeout for detectors. */
export const DEFAULT_PROBE_TIMEOUT_MS = 5000;

export interface RunOptions {
  /** 0 disables the timeout. */
  timeoutMs?: number;
  /** Attach the child to the terminal (installers, password prompts). */
  interactive?: boolean;
  env?: NodeJS.ProcessEnv;
}

export interface CommandResult {
  ok: boolean;
  /** Exit code, or null when the command could not start or was killed. */
  code: number | null;
  stdout: string;
  stderr: string;
}

export interface CommandRunner {
  run(command: string, args?: string[], options?: RunOptions): Promise<CommandResult>;
}

function field(err: object, key: "stdout" | "stderr"): string {
  if (key in err) {
    const value: unknown = Reflect.get(err, key);
    return typeof value === "string" ? value : "";
  }
  return "";
}

function exitCode(err: object): number | null {
  const code: unknown = "code" in err ? err.code : undefined;
  return typeof code === "number" ? code : null;
}

export class ExecCommandRunner implements CommandRunner {
  async run(command: string, args: string[] = [], options: RunOptions = {}): Promise<CommandResult> {
    const { timeoutMs = DEFAULT_PROBE_TIMEOUT_MS, interactive = false, env } = options;

    if (interactive) {
      return this.runInteractive(command, args, env);
    }

    try {
      const { stdout, stderr } = await execFileAsync(command, args, {
        encoding: "utf8",
        timeout: timeoutMs,
        env: env ?? process.env,
        maxBuffer: 16 * 1024 * 1024,
      });
      return { ok: true, code: 0, stdout, stderr };
    } catch (err) {
      if (err && typeof err === "object") {
        return { ok: false, code: exitCode(err), stdout: field(err, "stdout"), stderr: field(err, "stderr") };
      }
      return { ok: false, code: null, stdout: "", stderr: String(err) };
    }
  }

  private runInteractive(command: string, args: string[], env?: NodeJS.ProcessEnv): Promise<CommandResult> {
    return new Promise((resolve) => {
      const proc = spawn(command, args, { stdio: "inherit", env: env ?? process.env });
      proc.on("error", (err) => {
        resolve({ ok: false, code: null, stdout: "", stderr: err.message });
      });
      proc.on("close", (code) => {
        resolve({ ok: code === 0, code, stdout: "", stderr: "" });
      });
    });
  }
}
