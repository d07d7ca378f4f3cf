/**
 * Document Module
 *
 * Line-based configuration documents, edit planners and the mutator that
 * applies them with backup and atomic replace.
 */

export {
  parseDocument,
  renderDocument,
  findLines,
  type ConfigDocument,
} from "./config-document.js";

export {
  planEdit,
  planBlockReplace,
  planKeyLine,
  planAppend,
  planAnchoredLine,
  planManagedContent,
  extractBlockItems,
  type DocumentEdit,
  type BlockReplaceEdit,
  type KeyLineEdit,
  type AppendEdit,
  type AnchoredLineEdit,
  type ManagedContentEdit,
  type EditPlan,
  type EditStatus,
} from "./edits.js";

export {
  mutateDocument,
  replaceBlock,
  upsertKeyLine,
  appendIfAbsent,
  placeAnchoredLine,
  writeManagedFile,
  type MutationContext,
  type MutateOptions,
  type MutationResult,
} from "./mutator.js";
