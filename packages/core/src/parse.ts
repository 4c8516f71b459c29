/**
 * Parse entry point
 */

import { type ParseOutcome, parseCommandLevel } from "./dispatch.js";
import {
  type ParserSettings,
  type SettingsOverrides,
  resolveSettings,
} from "./settings.js";
import { createSession } from "./session.js";
import { buildCommandTree } from "./tree.js";
import type { CommandDecl, CommandNode } from "./types/command.js";
import type { DeclarationIssue, ParseError } from "./types/errors.js";
import { type Result, error } from "./types/result.js";

/**
 * Parse argv against an initialized command tree. argv[0] is the program
 * name; an empty argv stands for the root's name alone. The argv array is
 * never modified.
 */
export const parse = (
  root: CommandNode,
  argv: readonly string[],
  settings: ParserSettings = resolveSettings()
): Result<ParseOutcome, ParseError> => {
  const handle = createSession(settings, root);
  const tokens = argv.length > 0 ? argv : [root.name];
  return parseCommandLevel(handle, root, tokens);
};

export type RunFailure =
  | { readonly stage: "declaration"; readonly issues: readonly DeclarationIssue[] }
  | { readonly stage: "parse"; readonly error: ParseError };

/**
 * Build the tree for a declaration and parse argv against it in one step
 */
export const run = (
  decl: CommandDecl,
  argv: readonly string[],
  overrides: SettingsOverrides = {}
): Result<ParseOutcome, RunFailure> => {
  const tree = buildCommandTree(decl);
  if (!tree.ok) {
    return error({ stage: "declaration", issues: tree.error });
  }
  const parsed = parse(tree.value, argv, resolveSettings(overrides));
  return parsed.ok ? parsed : error({ stage: "parse", error: parsed.error });
};
