/**
 * Decision provider contract.
 *
 * Every question a provisioning module asks goes through this interface, so
 * the same module runs interactively, unattended (auto-yes) or from a script.
 */

export interface Choice<T extends string> {
  name: string;
  value: T;
}

export interface DecisionProvider {
  /** False for providers that never ask a person. */
  readonly interactive: boolean;
  confirm(message: string, defaultValue: boolean): Promise<boolean>;
  select<T extends string>(message: string, choices: Choice<T>[], defaultValue: T): Promise<T>;
}
