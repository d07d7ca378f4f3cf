/**
 * Tests for the modules that install through the package manager:
 * preflight, homebrew, core-tools, dev-tools and fonts.
 */

import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import { promises as fs } from "fs";
import { join } from "path";
import {
  FakeCommandRunner,
  FakePackageManager,
  MAC_HOST,
  makeProvisionContext,
  makeTempDir,
  ok,
} from "../../__tests__/test-helpers.js";
import { ScriptedDecisionProvider } from "../../decisions/providers.js";
import { PreconditionMissingError } from "../../errors.js";
import { CORE_FORMULAS, coreToolsModule } from "./core-tools.js";
import { devToolsModule } from "./dev-tools.js";
import { fontsModule } from "./fonts.js";
import { homebrewModule } from "./homebrew.js";
import { preflightModule } from "./preflight.js";

const BREW = { "brew --version": ok("Homebrew 4.2.1\n") };

let root: string;

beforeEach(async () => {
  root = await makeTempDir("install");
});

afterEach(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

describe("preflightModule", () => {
  const xcode = { "xcode-select -p": ok("/Library/Developer/CommandLineTools\n") };

  it("passes on a supported Mac", async () => {
    const runner = new FakeCommandRunner(xcode);

    const result = await preflightModule.apply(makeProvisionContext({ root, runner }));

    expect(result).toEqual({
      name: "00-preflight",
      status: "ok",
      messages: [
        "Operating system: macOS 14.4.1",
        "Architecture: Apple Silicon (arm64)",
        "Xcode CLI tools installed",
      ],
    });
  });

  it("rejects other systems and old macOS releases", async () => {
    const runner = new FakeCommandRunner(xcode);
    const linux = { ...MAC_HOST, platform: "linux" as const, osVersion: "6.8.0" };
    const bigSur = { ...MAC_HOST, osVersion: "11.7.10" };

    await expect(preflightModule.apply(makeProvisionContext({ root, runner, host: linux }))).rejects.toThrow(
      "This tool is designed for macOS only (found linux)",
    );
    await expect(preflightModule.apply(makeProvisionContext({ root, runner, host: bigSur }))).rejects.toThrow(
      "macOS 12 (Monterey) or later is required",
    );
  });

  it("warns under Rosetta", async () => {
    const runner = new FakeCommandRunner(xcode);
    const host = { ...MAC_HOST, arch: "x86_64", translated: true };

    const result = await preflightModule.apply(makeProvisionContext({ root, runner, host }));

    expect(result.messages[1]).toBe("Running under Rosetta 2 translation; a native terminal is recommended");
  });

  it("starts the Xcode installer and stops the run", async () => {
    const runner = new FakeCommandRunner({ "xcode-select --install": ok() });

    await expect(preflightModule.apply(makeProvisionContext({ root, runner }))).rejects.toBeInstanceOf(
      PreconditionMissingError,
    );
    expect(runner.commandLines()).toEqual(["xcode-select -p", "xcode-select --install"]);

    const dry = new FakeCommandRunner();
    const simulated = await preflightModule.apply(makeProvisionContext({ root, runner: dry, mode: "simulate" }));
    expect(simulated.status).toBe("ok");
    expect(dry.commandLines()).toEqual(["xcode-select -p"]);
  });
});

describe("homebrewModule", () => {
  it("activates and updates an existing install", async () => {
    const packages = new FakePackageManager();
    const runner = new FakeCommandRunner(BREW);

    const result = await homebrewModule.apply(makeProvisionContext({ root, runner, packages }));

    expect(result.messages).toEqual(["Homebrew already installed", "Homebrew updated"]);
    expect(packages.activations).toBe(1);
    expect(packages.updates).toBe(1);
  });

  it("skips the update with updatePackageManager off", async () => {
    const packages = new FakePackageManager();
    const runner = new FakeCommandRunner(BREW);

    await homebrewModule.apply(
      makeProvisionContext({ root, runner, packages, config: { updatePackageManager: false } }),
    );

    expect(packages.updates).toBe(0);
  });

  it("bootstraps a missing install", async () => {
    const packages = new FakePackageManager({ available: false });

    const result = await homebrewModule.apply(makeProvisionContext({ root, packages }));

    expect(result.messages).toEqual(["Homebrew installed"]);
    expect(packages.bootstraps).toBe(1);
    expect(packages.activations).toBe(1);
  });
});

describe("coreToolsModule", () => {
  it("installs the missing formulas", async () => {
    const packages = new FakePackageManager({ installed: ["tmux"] });
    const runner = new FakeCommandRunner(BREW);

    const result = await coreToolsModule.apply(makeProvisionContext({ root, runner, packages }));

    expect(packages.installCalls).toEqual([{ pkgs: CORE_FORMULAS, kind: "formula" }]);
    expect(result.messages).toEqual([
      "Installed: fzf fzf-tab zsh-autosuggestions zsh-syntax-highlighting oh-my-posh",
    ]);
  });

  it("needs Homebrew", async () => {
    await expect(coreToolsModule.apply(makeProvisionContext({ root }))).rejects.toBeInstanceOf(
      PreconditionMissingError,
    );
    const simulated = await coreToolsModule.apply(makeProvisionContext({ root, mode: "simulate" }));
    expect(simulated.status).toBe("skipped");
  });
});

describe("devToolsModule", () => {
  const withUv = (): FakeCommandRunner => new FakeCommandRunner({ ...BREW, "uv --version": ok("uv 0.4.18\n") });

  it("is skipped when nobody can answer", async () => {
    const packages = new FakePackageManager();

    const result = await devToolsModule.apply(makeProvisionContext({ root, runner: withUv(), packages }));

    expect(result.status).toBe("skipped");
    expect(packages.installCalls).toEqual([]);
  });

  it("installs every missing tool on request", async () => {
    const packages = new FakePackageManager();
    const decisions = new ScriptedDecisionProvider(["all"]);

    const result = await devToolsModule.apply(makeProvisionContext({ root, runner: withUv(), packages, decisions }));

    expect(decisions.asked).toEqual([{ kind: "select", message: "Install missing tools?" }]);
    expect(packages.installCalls).toEqual([{ pkgs: ["node"], kind: "formula" }]);
    expect(result.messages).toEqual(["Installed: node"]);
  });

  it("asks tool by tool in select mode", async () => {
    const packages = new FakePackageManager();
    const decisions = new ScriptedDecisionProvider(["select", false, true]);
    const runner = new FakeCommandRunner(BREW);

    await devToolsModule.apply(makeProvisionContext({ root, runner, packages, decisions }));

    expect(decisions.asked.map((q) => q.message)).toEqual([
      "Install missing tools?",
      "Install uv (Python package/project manager)?",
      "Install node (Node.js JavaScript runtime)?",
    ]);
    expect(packages.installCalls).toEqual([{ pkgs: ["node"], kind: "formula" }]);
  });

  it("does nothing when everything is present", async () => {
    const runner = new FakeCommandRunner({ ...BREW, "uv --version": ok("uv 0.4.18\n"), "node --version": ok("v20.11.0\n") });
    const decisions = new ScriptedDecisionProvider();

    const result = await devToolsModule.apply(makeProvisionContext({ root, runner, decisions }));

    expect(result.messages).toEqual(["All development tools already installed"]);
    expect(decisions.asked).toEqual([]);
  });
});

describe("fontsModule", () => {
  it("installs the minimal set without asking under auto-yes", async () => {
    const packages = new FakePackageManager();
    const runner = new FakeCommandRunner(BREW);

    const result = await fontsModule.apply(makeProvisionContext({ root, runner, packages }));

    expect(packages.installCalls).toEqual([{ pkgs: ["font-meslo-lg-nerd-font"], kind: "cask" }]);
    expect(result.messages).toEqual(["Installed: font-meslo-lg-nerd-font"]);
  });

  it("installs the full set when chosen", async () => {
    const packages = new FakePackageManager();
    const runner = new FakeCommandRunner(BREW);
    const decisions = new ScriptedDecisionProvider(["full"]);

    await fontsModule.apply(makeProvisionContext({ root, runner, packages, decisions }));

    expect(packages.installCalls[0].pkgs).toEqual([
      "font-hack-nerd-font",
      "font-meslo-lg-nerd-font",
      "font-fira-code-nerd-font",
    ]);
  });

  it("follows fontMode from the config", async () => {
    const packages = new FakePackageManager();
    const runner = new FakeCommandRunner(BREW);

    await fontsModule.apply(makeProvisionContext({ root, runner, packages, config: { fontMode: "full" } }));

    expect(packages.installCalls[0].pkgs).toHaveLength(3);
  });

  it("asks before adding fonts next to an existing Nerd Font", async () => {
    const fonts = join(root, "home", "Library/Fonts");
    await fs.mkdir(fonts, { recursive: true });
    await fs.writeFile(join(fonts, "MesloLGS Nerd Font Regular.ttf"), "");
    const packages = new FakePackageManager();
    const decisions = new ScriptedDecisionProvider([false]);

    const result = await fontsModule.apply(makeProvisionContext({ root, packages, decisions }));

    expect(decisions.asked).toEqual([{ kind: "confirm", message: "Install additional Nerd Fonts?" }]);
    expect(result.messages).toEqual(["Nerd Font already installed"]);
    expect(packages.installCalls).toEqual([]);
  });
});
