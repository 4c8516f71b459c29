/**
 * Complete help text, help option and help command
 */

import {
  type CommandHandler,
  type CommandNode,
  type OptionDecl,
  type ParseError,
  type ParserSettings,
  formatParseError,
  resolveChain,
} from "@argtree/core";
import { formatHeading } from "./heading.js";
import { formatOptionList } from "./option-list.js";
import { formatSubcommandList } from "./subcommand-list.js";
import { formatUsage } from "./usage.js";
import { wrapText } from "./wrap.js";

/**
 * Anything text can be written to; process.stdout and process.stderr fit
 */
export type Output = {
  write(chunk: string): unknown;
};

/**
 * Help written to the error stream leaves out the about text
 */
export type HelpTarget = "stdout" | "stderr";

export const formatHelp = (
  command: CommandNode,
  settings: ParserSettings,
  target: HelpTarget = "stdout"
): string => {
  const { help } = settings;
  const { about, description } = command.decl;
  let text = "";

  if (target !== "stderr" && about !== undefined) {
    text += wrapText(about, 0, 0, help.maxLineWidth, help.wordWrap);
  }
  text += formatUsage(command, settings);
  if (description !== undefined) {
    text += `\n${wrapText(description, 0, 0, help.maxLineWidth, help.wordWrap)}`;
  }
  if (command.options.length > 0) {
    text += `\n${formatHeading("options", help.letterCase)}\n`;
    text += formatOptionList(command.options, settings);
  }
  if (settings.subcommands && command.children.length > 0) {
    text += `\n${formatHeading("commands", help.letterCase)}\n`;
    text += formatSubcommandList(command.children, settings);
  }
  return text;
};

export const printHelp = (
  out: Output,
  command: CommandNode,
  settings: ParserSettings,
  target: HelpTarget = "stdout"
): void => {
  out.write(formatHelp(command, settings, target));
};

export const printUsage = (
  out: Output,
  command: CommandNode,
  settings: ParserSettings
): void => {
  out.write(formatUsage(command, settings));
};

/**
 * Write "error: ..." and, when printHelpOnError is set, the help of the
 * command the error was detected in
 */
export const printParseError = (
  err: Output,
  parseError: ParseError,
  settings: ParserSettings
): void => {
  err.write(`${formatParseError(parseError)}\n`);
  if (settings.printHelpOnError && parseError.command) {
    err.write("\n");
    printHelp(err, parseError.command, settings, "stderr");
  }
};

/**
 * -h, --help: print the help of the command being parsed and stop
 */
export const helpOption = (
  out: Output,
  description = "Display this help text and exit."
): OptionDecl => ({
  shortName: "h",
  longName: "help",
  description,
  callback: {
    shape: "none",
    fn: (session) => {
      const command = session.activeCommand ?? session.root;
      if (command) {
        printHelp(out, command, session.settings);
      }
      session.exit(0);
    },
  },
});

export type HelpStreams = {
  readonly out: Output;
  readonly err: Output;
};

/**
 * Handler for a "help [COMMAND]..." subcommand: the operands name a chain of
 * subcommands from the root
 */
export const helpCommand =
  ({ out, err }: HelpStreams): CommandHandler =>
  (operands, session) => {
    const { root } = session;
    if (!root) {
      return;
    }
    const chain = resolveChain(root, operands.slice(1));
    if (!chain.ok) {
      printParseError(err, chain.error, session.settings);
      session.exit(1);
      return;
    }
    printHelp(out, chain.value, session.settings);
  };
