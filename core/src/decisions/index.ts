export type { Choice, DecisionProvider } from "./types.js";
export {
  AutoDecisionProvider,
  ScriptedDecisionProvider,
  type ScriptedAnswer,
  type AskedQuestion,
} from "./providers.js";
