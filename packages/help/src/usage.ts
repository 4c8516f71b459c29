/**
 * Usage line rendering
 */

import {
  type CommandNode,
  type OptionEntry,
  type ParserSettings,
  commandPath,
} from "@argtree/core";
import { formatHeading } from "./heading.js";
import { wrapText } from "./wrap.js";

// Column where the usage text starts, after "Usage: "
const USAGE_INDENT = 7;

export const isVisible = (
  option: OptionEntry,
  settings: ParserSettings
): boolean => !(settings.hiddenOptions && option.hidden === true);

/**
 * One option as shown in a usage line: "-o FILE", "-l[N]", "--level[=N]"
 */
export const formatOptionUsage = (
  option: OptionEntry,
  settings: ParserSettings
): string => {
  const name = option.shortName
    ? `-${option.shortName}`
    : settings.longOptions && option.longName
      ? `--${option.longName}`
      : "";
  const { argName } = option;
  if (argName === undefined) {
    return name;
  }
  if (!argName.startsWith("[")) {
    return `${name} ${argName}`;
  }
  return option.shortName ? `${name}${argName}` : `${name}[=${argName.slice(1)}`;
};

const formatOptionEntries = (
  options: readonly OptionEntry[],
  settings: ParserSettings
): string => {
  const visible = options.filter(
    (option) =>
      isVisible(option, settings) &&
      (option.shortName !== undefined ||
        (settings.longOptions && option.longName !== undefined))
  );
  const printedGroups = new Set<number>();
  let entries = "";

  for (const option of visible) {
    const group = settings.mutualExclusion ? (option.group ?? 0) : 0;
    if (group === 0) {
      entries += ` [${formatOptionUsage(option, settings)}]`;
      continue;
    }
    if (printedGroups.has(group)) {
      continue;
    }
    printedGroups.add(group);
    const members = visible
      .filter((member) => member.group === group)
      .map((member) => formatOptionUsage(member, settings));
    entries += ` [${members.join("|")}]`;
  }
  return entries;
};

/**
 * "Usage: prog sub [-a] [-o FILE] [-q|-V] FILE...", wrapped to the line width
 */
export const formatUsage = (
  command: CommandNode,
  settings: ParserSettings
): string => {
  const { help } = settings;
  const heading = formatHeading("usage", help.letterCase);

  let body: string;
  if (command.decl.usage !== undefined) {
    body = ` ${command.decl.usage}`;
  } else {
    body = ` ${commandPath(command).join(" ")}`;
    if (command.options.length > 0) {
      body +=
        help.usageStyle === "compact"
          ? ` [${help.compactOptionsLabel}]`
          : formatOptionEntries(command.options, settings);
    }
    if (command.decl.operands) {
      body += ` ${command.decl.operands}`;
    }
  }

  return `${heading}${wrapText(body, USAGE_INDENT, USAGE_INDENT, help.maxLineWidth, help.wordWrap)}`;
};
