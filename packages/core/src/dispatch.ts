/**
 * Token dispatch for one command level
 */

import { resetExclusivity } from "./exclusivity.js";
import { parseLongOption } from "./long-option.js";
import { findSubcommand } from "./navigator.js";
import type { DispatchContext } from "./run-option.js";
import {
  type SessionHandle,
  enterCommand,
  rewindToOperands,
} from "./session.js";
import { parseShortOptions } from "./short-options.js";
import type { CommandNode } from "./types/command.js";
import { type ParseError, createParseError } from "./types/errors.js";
import { type Result, ok, error } from "./types/result.js";
import type { ParserSession } from "./types/session.js";

export type ParseOutcome = {
  /** Command whose level finished parsing */
  readonly command: CommandNode;
  /** Program name followed by the operands of that level */
  readonly operands: readonly string[];
  /** A callback or handler called exit() */
  readonly halted: boolean;
  readonly exitCode: number;
  readonly session: ParserSession;
};

const isOptionToken = (token: string): boolean =>
  token.length > 1 && token.startsWith("-");

/**
 * Walk the tokens of one command level. tokens[0] is the program name.
 * A matching subcommand token hands the remaining tokens to that
 * subcommand's level; the handler of the last level reached runs once its
 * operands are collected.
 */
export const parseCommandLevel = (
  handle: SessionHandle,
  command: CommandNode,
  tokens: readonly string[]
): Result<ParseOutcome, ParseError> => {
  const { session, state } = handle;
  const { settings } = session;
  const [programName = command.name] = tokens;
  const context: DispatchContext = { session, state, command };
  const operands: string[] = [programName];
  let operandsOnly = false;

  enterCommand(state, command, tokens);

  const outcome = (): ParseOutcome => ({
    command,
    operands,
    halted: state.halted,
    exitCode: state.exitCode,
    session,
  });

  while (!state.halted && state.index < state.tokens.length) {
    const token = state.tokens[state.index];
    if (token === undefined) {
      break;
    }

    if (!operandsOnly && token === "--") {
      operandsOnly = true;
    } else if (!operandsOnly && isOptionToken(token)) {
      const parsed =
        settings.longOptions && token.startsWith("--")
          ? parseLongOption(token, context)
          : parseShortOptions(token, context);
      if (!parsed.ok) {
        return parsed;
      }
    } else if (settings.subcommands && command.children.length > 0) {
      const subcommand = findSubcommand(command, token);
      if (!subcommand) {
        return error(
          createParseError(
            "unknown-command",
            `Unknown command: "${token}"`,
            token,
            command
          )
        );
      }
      if (settings.exclusivityScope === "command") {
        resetExclusivity(state.exclusivity);
      }
      return parseCommandLevel(handle, subcommand, [
        programName,
        ...state.tokens.slice(state.index + 1),
      ]);
    } else {
      operands.push(token);
    }

    // A callback may have moved the cursor to the end already
    if (state.index < state.tokens.length) {
      state.index += 1;
    }
  }

  if (state.halted) {
    return ok(outcome());
  }

  rewindToOperands(state, operands);
  command.decl.handler?.(operands, session);
  return ok(outcome());
};
