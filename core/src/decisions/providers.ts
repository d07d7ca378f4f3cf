/**
 * Non-interactive decision providers.
 */

import type { Choice, DecisionProvider } from "./types.js";

/** Answers every question with its default (`--yes`). */
export class AutoDecisionProvider implements DecisionProvider {
  readonly interactive = false;

  async confirm(_message: string, defaultValue: boolean): Promise<boolean> {
    return defaultValue;
  }

  async select<T extends string>(_message: string, _choices: Choice<T>[], defaultValue: T): Promise<T> {
    return defaultValue;
  }
}

export type ScriptedAnswer = boolean | string;

export interface AskedQuestion {
  kind: "confirm" | "select";
  message: string;
}

/**
 * Replays a fixed list of answers in order. Once the list is used up,
 * questions resolve to their defaults. Every question is recorded.
 */
export class ScriptedDecisionProvider implements DecisionProvider {
  readonly interactive = true;
  readonly asked: AskedQuestion[] = [];
  private readonly answers: ScriptedAnswer[];

  constructor(answers: ScriptedAnswer[] = []) {
    this.answers = [...answers];
  }

  async confirm(message: string, defaultValue: boolean): Promise<boolean> {
    this.asked.push({ kind: "confirm", message });
    const answer = this.answers.shift();
    if (answer === undefined) return defaultValue;
    if (typeof answer !== "boolean") {
      throw new Error(`Scripted answer for "${message}" must be a boolean, got "${answer}"`);
    }
    return answer;
  }

  async select<T extends string>(message: string, choices: Choice<T>[], defaultValue: T): Promise<T> {
    this.asked.push({ kind: "select", message });
    const answer = this.answers.shift();
    if (answer === undefined) return defaultValue;
    const choice = choices.find((c) => c.value === answer);
    if (!choice) {
      throw new Error(`Scripted answer "${String(answer)}" is not one of: ${choices.map((c) => c.value).join(", ")}`);
    }
    return choice.value;
  }
}
