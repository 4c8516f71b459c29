/**
 * Command tree navigation
 */

import type { CommandNode } from "./types/command.js";
import { type ParseError, createParseError } from "./types/errors.js";
import { type Result, ok, error } from "./types/result.js";

export const findSubcommand = (
  command: CommandNode,
  name: string
): CommandNode | undefined =>
  command.children.find((child) => child.name === name);

/**
 * Follow a chain of subcommand names from the root. An empty chain
 * resolves to the root itself.
 */
export const resolveChain = (
  root: CommandNode,
  names: readonly string[]
): Result<CommandNode, ParseError> => {
  let command = root;
  for (const name of names) {
    const next = findSubcommand(command, name);
    if (!next) {
      return error(
        createParseError(
          "unknown-command",
          `Unknown command: "${name}"`,
          name,
          command
        )
      );
    }
    command = next;
  }
  return ok(command);
};

/**
 * Names from the root down to the command
 */
export const commandPath = (command: CommandNode): string[] => {
  const names: string[] = [];
  for (
    let current: CommandNode | undefined = command;
    current;
    current = current.parent
  ) {
    names.unshift(current.name);
  }
  return names;
};

/**
 * Depth of the deepest command below (and including) the given one
 */
export const treeDepth = (command: CommandNode): number =>
  command.children.reduce(
    (deepest, child) => Math.max(deepest, treeDepth(child)),
    command.depth
  );
