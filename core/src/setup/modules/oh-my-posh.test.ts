/**
 * Tests for oh-my-posh.ts
 */

import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import { promises as fs } from "fs";
import { join } from "path";
import { FakeCommandRunner, makeProvisionContext, makeTempDir, ok } from "../../__tests__/test-helpers.js";
import { ScriptedDecisionProvider } from "../../decisions/providers.js";
import { PreconditionMissingError } from "../../errors.js";
import { ohMyPoshModule, ompInitLine } from "./oh-my-posh.js";

const DI4AM0ND_INIT =
  'eval "$(oh-my-posh init zsh --config $(brew --prefix oh-my-posh)/themes/di4am0nd.omp.json)"';
const ATOMIC_INIT = 'eval "$(oh-my-posh init zsh --config $(brew --prefix oh-my-posh)/themes/atomic.omp.json)"';

describe("ohMyPoshModule", () => {
  let root: string;
  let zshrc: string;
  let runner: FakeCommandRunner;

  beforeEach(async () => {
    root = await makeTempDir("omp");
    zshrc = join(root, "home", ".zshrc");
    await fs.mkdir(join(root, "home"), { recursive: true });
    runner = new FakeCommandRunner({ "oh-my-posh --version": ok("19.8.3\n") });
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("builds the init line for a theme", () => {
    expect(ompInitLine("di4am0nd")).toBe(DI4AM0ND_INIT);
  });

  it("adds the init line after the oh-my-zsh source line and clears ZSH_THEME", async () => {
    await fs.writeFile(
      zshrc,
      'export ZSH="$HOME/.oh-my-zsh"\nZSH_THEME="robbyrussell"\nplugins=(git)\nsource $ZSH/oh-my-zsh.sh\n',
    );
    const expected = [
      'export ZSH="$HOME/.oh-my-zsh"',
      "# Disable oh-my-zsh theme (using Oh My Posh instead)",
      'ZSH_THEME=""',
      "plugins=(git)",
      "source $ZSH/oh-my-zsh.sh",
      "",
      "# Oh My Posh configuration (di4am0nd theme)",
      DI4AM0ND_INIT,
      "",
    ].join("\n");

    await ohMyPoshModule.apply(makeProvisionContext({ root, runner }));
    expect(await fs.readFile(zshrc, "utf8")).toBe(expected);

    const again = await ohMyPoshModule.apply(makeProvisionContext({ root, runner }));
    expect(again.messages).toEqual([`${zshrc} already configured`]);
    expect(await fs.readFile(zshrc, "utf8")).toBe(expected);
  });

  it("keeps a different theme when the user declines", async () => {
    const original = `source $ZSH/oh-my-zsh.sh\n# Oh My Posh configuration (atomic theme)\n${ATOMIC_INIT}\n`;
    await fs.writeFile(zshrc, original);
    const decisions = new ScriptedDecisionProvider([false]);

    const result = await ohMyPoshModule.apply(makeProvisionContext({ root, runner, decisions }));

    expect(decisions.asked).toEqual([{ kind: "confirm", message: "Update to di4am0nd theme?" }]);
    expect(result.messages).toEqual([
      `${zshrc} already configured`,
      "No line matches ^ZSH_THEME=, nothing to update",
      "Kept the existing Oh-My-Posh theme",
    ]);
    expect(await fs.readFile(zshrc, "utf8")).toBe(original);
  });

  it("replaces a different theme together with its comment", async () => {
    await fs.writeFile(zshrc, `source $ZSH/oh-my-zsh.sh\n# Oh My Posh configuration (atomic theme)\n${ATOMIC_INIT}\n`);
    const decisions = new ScriptedDecisionProvider([true]);

    await ohMyPoshModule.apply(makeProvisionContext({ root, runner, decisions }));

    expect(await fs.readFile(zshrc, "utf8")).toBe(
      `source $ZSH/oh-my-zsh.sh\n\n# Oh My Posh configuration (di4am0nd theme)\n${DI4AM0ND_INIT}\n`,
    );
  });

  it("needs oh-my-posh installed", async () => {
    await fs.writeFile(zshrc, "source $ZSH/oh-my-zsh.sh\n");
    const missing = new FakeCommandRunner();

    await expect(ohMyPoshModule.apply(makeProvisionContext({ root, runner: missing }))).rejects.toBeInstanceOf(
      PreconditionMissingError,
    );
    const simulated = await ohMyPoshModule.apply(makeProvisionContext({ root, runner: missing, mode: "simulate" }));
    expect(simulated.status).toBe("skipped");
  });
});
