/**
 * Parser and help settings
 */

export type LetterCase = "capitalized" | "lower" | "upper";

export type UsageStyle = "detailed" | "compact";

export type HelpSettings = {
  readonly maxLineWidth: number;
  /** Widest column the option and command names may take */
  readonly maxDividerWidth: number;
  readonly indentation: number;
  /** Case of the "Usage:", "Options:" and "Commands:" headings */
  readonly letterCase: LetterCase;
  /** "detailed" lists every option in the usage line */
  readonly usageStyle: UsageStyle;
  /** Placeholder used in the usage line by the "compact" style */
  readonly compactOptionsLabel: string;
  /** Indent long-only options so long names line up */
  readonly uniqueLongOptionColumn: boolean;
  /** Start overlong descriptions on the same line instead of the next */
  readonly floatingDescriptions: boolean;
  readonly wordWrap: boolean;
};

/**
 * "session" keeps mutually exclusive groups across subcommand descents,
 * "command" starts over at every subcommand
 */
export type ExclusivityScope = "session" | "command";

export type ParserSettings = {
  readonly longOptions: boolean;
  /** "--name=value" and "-oVALUE" */
  readonly attachedArguments: boolean;
  readonly subcommands: boolean;
  readonly mutualExclusion: boolean;
  readonly exclusivityScope: ExclusivityScope;
  /** Honor the hidden flag of options in generated help */
  readonly hiddenOptions: boolean;
  readonly printHelpOnError: boolean;
  readonly help: HelpSettings;
};

export type SettingsOverrides = Partial<Omit<ParserSettings, "help">> & {
  readonly help?: Partial<HelpSettings>;
};

export const defaultHelpSettings: HelpSettings = {
  maxLineWidth: 80,
  maxDividerWidth: 30,
  indentation: 2,
  letterCase: "capitalized",
  usageStyle: "detailed",
  compactOptionsLabel: "OPTIONS",
  uniqueLongOptionColumn: true,
  floatingDescriptions: true,
  wordWrap: true,
};

export const defaultSettings: ParserSettings = {
  longOptions: true,
  attachedArguments: true,
  subcommands: true,
  mutualExclusion: true,
  exclusivityScope: "session",
  hiddenOptions: true,
  printHelpOnError: false,
  help: defaultHelpSettings,
};

/**
 * Merge overrides onto the defaults (or onto a base)
 */
export const resolveSettings = (
  overrides: SettingsOverrides = {},
  base: ParserSettings = defaultSettings
): ParserSettings => ({
  longOptions: overrides.longOptions ?? base.longOptions,
  attachedArguments: overrides.attachedArguments ?? base.attachedArguments,
  subcommands: overrides.subcommands ?? base.subcommands,
  mutualExclusion: overrides.mutualExclusion ?? base.mutualExclusion,
  exclusivityScope: overrides.exclusivityScope ?? base.exclusivityScope,
  hiddenOptions: overrides.hiddenOptions ?? base.hiddenOptions,
  printHelpOnError: overrides.printHelpOnError ?? base.printHelpOnError,
  help: { ...base.help, ...overrides.help },
});
