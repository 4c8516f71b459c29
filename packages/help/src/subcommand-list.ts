/**
 * Subcommand list rendering
 */

import type { CommandNode, ParserSettings } from "@argtree/core";
import { formatDescription } from "./option-list.js";

const labelOf = (command: CommandNode): string =>
  command.decl.operands ? `${command.name} ${command.decl.operands}` : command.name;

export const formatSubcommandList = (
  commands: readonly CommandNode[],
  settings: ParserSettings
): string => {
  const { indentation, maxDividerWidth } = settings.help;
  const widest = commands.reduce(
    (width, command) => Math.max(width, labelOf(command).length),
    0
  );
  const divider = Math.min(widest + indentation * 2, maxDividerWidth);
  const padding = " ".repeat(indentation);

  return commands
    .map((command) => {
      const line = `${padding}${labelOf(command)}${padding}`;
      if (command.decl.about === undefined) {
        return `${line.trimEnd()}\n`;
      }
      return `${line.padEnd(divider)}${formatDescription(command.decl.about, line.length, divider, settings)}`;
    })
    .join("");
};
