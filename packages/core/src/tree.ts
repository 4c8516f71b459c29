/**
 * Command tree initialization and declaration checks
 */

import type { CommandDecl, CommandNode } from "./types/command.js";
import type { DeclarationIssue } from "./types/errors.js";
import type { OptionEntry } from "./types/option.js";
import { type Result, ok, error } from "./types/result.js";

const optionLabel = (option: OptionEntry, index: number): string =>
  option.longName
    ? `--${option.longName}`
    : option.shortName
      ? `-${option.shortName}`
      : `option #${index + 1}`;

const checkOption = (
  option: OptionEntry,
  index: number,
  path: readonly string[]
): DeclarationIssue[] => {
  const issues: DeclarationIssue[] = [];
  const at = [...path, optionLabel(option, index)];
  const report = (message: string): void => {
    issues.push({ path: at, message });
  };

  if (option.shortName === undefined && option.longName === undefined) {
    report("an option needs a short name or a long name");
  }
  if (
    option.shortName !== undefined &&
    (Array.from(option.shortName).length !== 1 || option.shortName === "-")
  ) {
    report(`short name must be a single character other than "-"`);
  }
  if (
    option.longName !== undefined &&
    (option.longName === "" || option.longName.includes("="))
  ) {
    report(`long name must be non-empty and must not contain "="`);
  }
  if (
    option.argName !== undefined &&
    option.argName.startsWith("[") &&
    !option.argName.endsWith("]")
  ) {
    report(`optional argument name "${option.argName}" must end with "]"`);
  }
  if (option.argName === "") {
    report("argument name must not be empty");
  }
  if (option.kind !== undefined && option.argName === undefined) {
    report("an option with a value kind needs an argument name");
  }
  const shape = option.callback?.shape;
  if (option.delimiters !== undefined) {
    if (option.delimiters === "") {
      report("delimiters must not be empty");
    }
    if (option.kind === undefined) {
      report("a list option needs a value kind");
    }
    if (shape === "typed") {
      report(`a list option cannot use a "typed" callback`);
    }
  } else if (shape === "typed-array" || shape === "raw-array") {
    report(`"${shape}" callbacks need a list option`);
  }
  if (
    option.count !== undefined &&
    (option.delimiters === undefined || option.store === undefined)
  ) {
    report("a count slot needs delimiters and a store slot");
  }
  if (
    option.group !== undefined &&
    (!Number.isInteger(option.group) || option.group < 0)
  ) {
    report("group must be a non-negative integer");
  }
  return issues;
};

/**
 * Check a command declaration and all of its subcommands
 */
export const validateCommand = (
  decl: CommandDecl,
  path: readonly string[] = []
): DeclarationIssue[] => {
  const at = [...path, decl.name || "(unnamed)"];
  const issues: DeclarationIssue[] = [];

  if (!decl.name) {
    issues.push({ path: at, message: "a command needs a name" });
  }

  (decl.options ?? []).forEach((option, index) => {
    issues.push(...checkOption(option, index, at));
  });

  const seen = new Set<string>();
  for (const subcommand of decl.subcommands ?? []) {
    if (seen.has(subcommand.name)) {
      issues.push({
        path: at,
        message: `duplicate subcommand "${subcommand.name}"`,
      });
    }
    seen.add(subcommand.name);
    issues.push(...validateCommand(subcommand, at));
  }

  return issues;
};

const buildNode = (
  decl: CommandDecl,
  parent: CommandNode | undefined,
  depth: number
): CommandNode => {
  const children: CommandNode[] = [];
  const node: CommandNode = {
    name: decl.name,
    decl,
    options: decl.options ?? [],
    children,
    parent,
    depth,
  };
  for (const subcommand of decl.subcommands ?? []) {
    children.push(buildNode(subcommand, node, depth + 1));
  }
  return node;
};

/**
 * Check a declaration and build the command tree with parent links
 */
export const buildCommandTree = (
  decl: CommandDecl
): Result<CommandNode, readonly DeclarationIssue[]> => {
  const issues = validateCommand(decl);
  if (issues.length > 0) {
    return error(issues);
  }
  return ok(buildNode(decl, undefined, 1));
};
