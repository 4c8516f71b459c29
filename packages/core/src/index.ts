/**
 * @argtree/core - declarative command-line option parsing
 */

export * from "./types/result.js";
export * from "./types/value-kind.js";
export * from "./types/option.js";
export * from "./types/command.js";
export * from "./types/session.js";
export * from "./types/errors.js";
export * from "./settings.js";
export { type ConversionFailure, type ConversionStatus, convertValue, convertTo } from "./convert.js";
export { type ListItemFailure, splitPieces, splitList } from "./split.js";
export {
  type ExclusivityTracker,
  createExclusivityTracker,
  resetExclusivity,
  checkExclusivity,
} from "./exclusivity.js";
export { type SessionHandle, type SessionState, createSession } from "./session.js";
export { executeOption } from "./executor.js";
export { validateCommand, buildCommandTree } from "./tree.js";
export { findSubcommand, resolveChain, commandPath, treeDepth } from "./navigator.js";
export type { ParseOutcome } from "./dispatch.js";
export { type RunFailure, parse, run } from "./parse.js";
