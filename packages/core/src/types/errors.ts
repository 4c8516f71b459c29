/**
 * Parse errors
 */

import type { CommandNode } from "./command.js";

export type ParseErrorKind =
  | "unknown-option"
  | "unknown-command"
  | "missing-argument"
  | "unwanted-argument"
  | "invalid-argument" // conversion syntax error
  | "argument-out-of-range" // conversion range error
  | "mutually-exclusive";

export type ParseError = {
  readonly kind: ParseErrorKind;
  readonly message: string;
  /** Offending token, option name, argument or list item */
  readonly token?: string;
  /** Command being parsed when the error was detected */
  readonly command?: CommandNode;
};

export const createParseError = (
  kind: ParseErrorKind,
  message: string,
  token?: string,
  command?: CommandNode
): ParseError => ({
  kind,
  message,
  token,
  command,
});

export const formatParseError = (parseError: ParseError): string =>
  `error: ${parseError.message}`;

/**
 * Problem found in a command declaration before parsing
 */
export type DeclarationIssue = {
  /** Command names from the root, then the option if any */
  readonly path: readonly string[];
  readonly message: string;
};

export const formatDeclarationIssue = (issue: DeclarationIssue): string =>
  `${issue.path.join(" > ")}: ${issue.message}`;
