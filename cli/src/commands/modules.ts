import { MODULES } from "@rigup/core";
import { formatModuleList } from "../report.js";
import { printer, type CommandDeps } from "./shared.js";

export function runModulesList(deps: CommandDeps = {}): number {
  const print = printer(deps);
  print("Modules, in run order:");
  formatModuleList(MODULES).forEach((line) => print(line));
  return 0;
}
