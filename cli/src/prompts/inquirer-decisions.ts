/**
 * Interactive decision provider backed by inquirer.
 */

import inquirer from "inquirer";
import type { Choice, DecisionProvider } from "@rigup/core";

export type PromptFn = (questions: inquirer.QuestionCollection) => Promise<inquirer.Answers>;

export class InquirerDecisionProvider implements DecisionProvider {
  readonly interactive = true;
  private readonly prompt: PromptFn;

  constructor(prompt: PromptFn = (questions) => inquirer.prompt(questions)) {
    this.prompt = prompt;
  }

  async confirm(message: string, defaultValue: boolean): Promise<boolean> {
    const { answer }: { answer?: unknown } = await this.prompt([
      { type: "confirm", name: "answer", message, default: defaultValue },
    ]);
    return typeof answer === "boolean" ? answer : defaultValue;
  }

  async select<T extends string>(message: string, choices: Choice<T>[], defaultValue: T): Promise<T> {
    const { answer }: { answer?: unknown } = await this.prompt([
      { type: "list", name: "answer", message, choices, default: defaultValue },
    ]);
    return choices.find((c) => c.value === answer)?.value ?? defaultValue;
  }
}
