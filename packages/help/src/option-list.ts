/**
 * Option list rendering: names and arguments in a column, descriptions
 * aligned at a divider
 */

import type { OptionEntry, ParserSettings } from "@argtree/core";
import { isVisible } from "./usage.js";
import { wrapText } from "./wrap.js";

type OptionLabel = {
  /** Names alone, e.g. "-o, --output" */
  readonly names: string;
  /** Names followed by the argument, e.g. "-o, --output FILE" */
  readonly full: string;
};

const labelOf = (option: OptionEntry, settings: ParserSettings): OptionLabel => {
  const long = settings.longOptions ? option.longName : undefined;
  let names = "";
  if (option.shortName) {
    names += `-${option.shortName}`;
    if (long) {
      names += ", ";
    }
  } else if (settings.help.uniqueLongOptionColumn && settings.longOptions) {
    names += "    ";
  }
  if (long) {
    names += `--${long}`;
  }

  const { argName } = option;
  let argument = "";
  if (argName !== undefined) {
    if (argName.startsWith("[") && settings.attachedArguments) {
      argument = long ? `[=${argName.slice(1)}` : argName;
    } else {
      argument = ` ${argName}`;
    }
  }
  return { names, full: `${names}${argument}` };
};

/**
 * Column at which descriptions start. It snaps to the widest name column
 * within the maximum divider width, widens for arguments, and never exceeds
 * the maximum.
 */
const dividerWidth = (
  labels: readonly OptionLabel[],
  settings: ParserSettings
): number => {
  const { indentation, maxDividerWidth } = settings.help;
  let divider = 0;
  for (const label of labels) {
    const names = indentation * 2 + label.names.length;
    if (names > divider && names <= maxDividerWidth) {
      divider = names;
    }
    const full = indentation * 2 + label.full.length;
    if (full > divider) {
      divider = full;
    }
  }
  return Math.min(divider, maxDividerWidth);
};

/**
 * Lay out a description after a label that ends at column `column`
 */
export const formatDescription = (
  description: string | undefined,
  column: number,
  divider: number,
  settings: ParserSettings
): string => {
  const { maxLineWidth, floatingDescriptions, wordWrap } = settings.help;
  if (description === undefined) {
    return "\n";
  }
  if (column > divider && !floatingDescriptions) {
    return `\n${" ".repeat(divider)}${wrapText(description, divider, divider, maxLineWidth, wordWrap)}`;
  }
  return wrapText(
    description,
    Math.max(column, divider),
    divider,
    maxLineWidth,
    wordWrap
  );
};

export const formatOptionList = (
  options: readonly OptionEntry[],
  settings: ParserSettings
): string => {
  const rows = options
    .filter((option) => isVisible(option, settings))
    .map((option) => ({ option, label: labelOf(option, settings) }));
  const divider = dividerWidth(
    rows.map((row) => row.label),
    settings
  );
  const padding = " ".repeat(settings.help.indentation);

  return rows
    .map(({ option, label }) => {
      const line = `${padding}${label.full}${padding}`;
      if (option.description === undefined) {
        return `${line.trimEnd()}\n`;
      }
      return `${line.padEnd(divider)}${formatDescription(option.description, line.length, divider, settings)}`;
    })
    .join("");
};
