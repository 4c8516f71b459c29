/**
 * Shared command tree and output sink for help tests
 */

import {
  type CommandDecl,
  type CommandNode,
  buildCommandTree,
  formatDeclarationIssue,
} from "@argtree/core";

export const sampleDecl: CommandDecl = {
  name: "prog",
  about: "prog - process files",
  description: "Processes every FILE in order.",
  operands: "FILE...",
  options: [
    { shortName: "a", longName: "all", description: "Include hidden files." },
    {
      shortName: "o",
      longName: "output",
      argName: "FILE",
      kind: "string",
      description: "Write the result to FILE.",
    },
    {
      longName: "level",
      argName: "[N]",
      kind: "int",
      description: "Set the level.",
    },
    { shortName: "V", longName: "verbose", group: 1 },
    { shortName: "q", longName: "quiet", group: 1, description: "Print nothing." },
    { longName: "debug", hidden: true },
  ],
  subcommands: [
    { name: "list", about: "List files." },
    { name: "copy", operands: "SRC DST", about: "Copy a file." },
  ],
};

export const buildTree = (decl: CommandDecl): CommandNode => {
  const built = buildCommandTree(decl);
  if (!built.ok) {
    throw new Error(built.error.map(formatDeclarationIssue).join("\n"));
  }
  return built.value;
};

export const memorySink = () => {
  const chunks: string[] = [];
  return {
    chunks,
    write: (chunk: string): void => {
      chunks.push(chunk);
    },
    text: (): string => chunks.join(""),
  };
};
