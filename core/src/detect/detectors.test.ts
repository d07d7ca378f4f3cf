/**
 * Tests for detectors.ts
 */

import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import { promises as fs } from "fs";
import { join } from "path";
import { FakeCommandRunner, fail, makeTempDir, ok } from "../__tests__/test-helpers.js";
import {
  detectHomebrew,
  detectHost,
  detectLoginShell,
  detectNerdFont,
  detectNode,
  detectOhMyPosh,
  detectOhMyTmux,
  detectOhMyZsh,
  detectSolarizedTheme,
  detectTmux,
  detectTmuxLocalConfig,
  detectUv,
  detectXcodeCli,
  detectZsh,
} from "./detectors.js";

describe("command detectors", () => {
  it("parses versions from each tool's output", async () => {
    const runner = new FakeCommandRunner({
      "brew --version": ok("Homebrew 4.2.1\nHomebrew/homebrew-core (git revision abc)\n"),
      "zsh --version": ok("zsh 5.9 (arm-apple-darwin22.1.0)\n"),
      "tmux -V": ok("tmux 3.4\n"),
      "node --version": ok("v20.11.0\n"),
      "uv --version": ok("uv 0.4.18 (Homebrew 2024-09-30)\n"),
      "oh-my-posh --version": ok("19.8.3\n"),
    });

    expect(await detectHomebrew(runner)).toEqual({ name: "homebrew", installed: true, version: "4.2.1" });
    expect(await detectZsh(runner)).toEqual({ name: "zsh", installed: true, version: "5.9" });
    expect(await detectTmux(runner)).toEqual({ name: "tmux", installed: true, version: "3.4" });
    expect(await detectNode(runner)).toEqual({ name: "node", installed: true, version: "20.11.0" });
    expect(await detectUv(runner)).toEqual({ name: "uv", installed: true, version: "0.4.18" });
    expect(await detectOhMyPosh(runner)).toEqual({ name: "oh-my-posh", installed: true, version: "19.8.3" });
  });

  it("reports missing or failing tools as not installed", async () => {
    const runner = new FakeCommandRunner({ "tmux -V": fail(127) });

    expect(await detectHomebrew(runner)).toEqual({ name: "homebrew", installed: false });
    expect(await detectTmux(runner)).toEqual({ name: "tmux", installed: false });
  });

  it("bounds every probe with a timeout", async () => {
    const runner = new FakeCommandRunner();
    await detectZsh(runner);
    expect(runner.calls[0].options.timeoutMs).toBe(5000);
  });

  it("reads the xcode tools path", async () => {
    const runner = new FakeCommandRunner({ "xcode-select -p": ok("/Library/Developer/CommandLineTools\n") });
    expect(await detectXcodeCli(runner)).toEqual({
      name: "xcode-cli",
      installed: true,
      path: "/Library/Developer/CommandLineTools",
    });
  });

  it("reads the login shell from the directory service", async () => {
    const runner = new FakeCommandRunner({ "dscl . -read /Users/dev UserShell": ok("UserShell: /bin/zsh\n") });
    expect(await detectLoginShell(runner, "dev")).toBe("/bin/zsh");
  });

  it("describes the host", async () => {
    const runner = new FakeCommandRunner({
      "uname -m": ok("arm64\n"),
      "uname -r": ok("23.4.0\n"),
      "sw_vers -productVersion": ok("14.4.1\n"),
      "sysctl -n sysctl.proc_translated": ok("0\n"),
    });

    expect(await detectHost(runner, "darwin")).toEqual({
      platform: "darwin",
      arch: "arm64",
      osVersion: "14.4.1",
      translated: false,
    });
  });
});

describe("file detectors", () => {
  let home: string;

  beforeEach(async () => {
    home = await makeTempDir("detect");
  });

  afterEach(async () => {
    await fs.rm(home, { recursive: true, force: true });
  });

  it("finds oh-my-zsh and falls back to 'installed' without git metadata", async () => {
    const runner = new FakeCommandRunner();
    expect(await detectOhMyZsh({ runner, homeDir: home })).toEqual({ name: "oh-my-zsh", installed: false });

    await fs.mkdir(join(home, ".oh-my-zsh"));
    expect(await detectOhMyZsh({ runner, homeDir: home })).toEqual({
      name: "oh-my-zsh",
      installed: true,
      version: "installed",
      path: join(home, ".oh-my-zsh"),
    });
  });

  it("prefers the XDG oh-my-tmux checkout", async () => {
    const runner = new FakeCommandRunner();
    for (const dir of [".tmux", ".local/share/tmux/oh-my-tmux"]) {
      await fs.mkdir(join(home, dir), { recursive: true });
      await fs.writeFile(join(home, dir, ".tmux.conf"), "# oh my tmux\n");
    }

    expect(await detectOhMyTmux({ runner, homeDir: home })).toEqual({
      name: "oh-my-tmux",
      installed: true,
      path: join(home, ".local/share/tmux/oh-my-tmux"),
    });
  });

  it("requires the theme name in the local tmux config", async () => {
    const runner = new FakeCommandRunner();
    await fs.writeFile(join(home, ".tmux.conf.local"), "# theme: default\n");
    expect((await detectSolarizedTheme({ runner, homeDir: home })).installed).toBe(false);

    await fs.writeFile(join(home, ".tmux.conf.local"), "# Solarized Dark Theme\n");
    expect((await detectSolarizedTheme({ runner, homeDir: home })).installed).toBe(true);
  });

  it("matches Nerd Font files by name", async () => {
    const runner = new FakeCommandRunner();
    const fonts = join(home, "Library/Fonts");
    await fs.mkdir(fonts, { recursive: true });
    await fs.writeFile(join(fonts, "MesloLGSNerdFont-Regular.ttf"), "");
    const env = { runner, homeDir: home, fontDirs: [fonts] };

    expect(await detectNerdFont(env)).toEqual({
      name: "nerd-font",
      installed: true,
      path: join(fonts, "MesloLGSNerdFont-Regular.ttf"),
    });
    expect((await detectNerdFont(env, "Hack")).installed).toBe(false);
  });

  it("skips a candidate below a regular file and keeps looking", async () => {
    const runner = new FakeCommandRunner();
    await fs.writeFile(join(home, ".config"), "");
    await fs.writeFile(join(home, ".tmux.conf.local"), "# Solarized Dark\n");

    expect(await detectTmuxLocalConfig({ runner, homeDir: home })).toEqual({
      name: "tmux-local-config",
      installed: true,
      path: join(home, ".tmux.conf.local"),
    });
  });

  it("reports a directory where the theme file belongs as not installed", async () => {
    const runner = new FakeCommandRunner();
    await fs.mkdir(join(home, ".tmux.conf.local"));

    expect(await detectSolarizedTheme({ runner, homeDir: home })).toEqual({
      name: "solarized-dark",
      installed: false,
    });
  });

  it("treats a font path that is not a directory as empty", async () => {
    const runner = new FakeCommandRunner();
    await fs.writeFile(join(home, "Fonts"), "");

    expect(await detectNerdFont({ runner, homeDir: home, fontDirs: [join(home, "Fonts")] })).toEqual({
      name: "nerd-font",
      installed: false,
    });
  });
});
