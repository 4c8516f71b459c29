/**
 * @argtree/help - usage and help text for argtree command trees
 */

export { wrapText } from "./wrap.js";
export { formatHeading } from "./heading.js";
export { formatUsage, formatOptionUsage } from "./usage.js";
export { formatOptionList } from "./option-list.js";
export { formatSubcommandList } from "./subcommand-list.js";
export {
  type Output,
  type HelpTarget,
  type HelpStreams,
  formatHelp,
  printHelp,
  printUsage,
  printParseError,
  helpOption,
  helpCommand,
} from "./help.js";
