/**
 * Command declarations and the initialized command tree
 */

import type { OptionDecl, OptionEntry } from "./option.js";
import type { ParserSession } from "./session.js";

/**
 * Runs once parsing at a command completes. operands[0] is the program name.
 */
export type CommandHandler = (
  operands: readonly string[],
  session: ParserSession
) => void;

export type CommandDecl = {
  readonly name: string;
  /** One-line summary shown above the usage and in command lists */
  readonly about?: string;
  readonly description?: string;
  /** Replaces the generated usage line */
  readonly usage?: string;
  /** Operand synopsis, e.g. "FILE..." */
  readonly operands?: string;
  readonly options?: readonly OptionDecl[];
  readonly subcommands?: readonly CommandDecl[];
  readonly handler?: CommandHandler;
};

export type CommandNode = {
  readonly name: string;
  readonly decl: CommandDecl;
  readonly options: readonly OptionEntry[];
  readonly children: readonly CommandNode[];
  /** Back-reference set once when the tree is built */
  readonly parent: CommandNode | undefined;
  /** 1 for the root */
  readonly depth: number;
};
