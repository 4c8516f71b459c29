/**
 * Short option clusters: "-a", "-abc", "-oVALUE", "-o VALUE"
 */

import { type DispatchContext, runOption } from "./run-option.js";
import { type ParseError, createParseError } from "./types/errors.js";
import { argumentShape } from "./types/option.js";
import { type Result, ok, error } from "./types/result.js";

export const parseShortOptions = (
  token: string,
  context: DispatchContext
): Result<void, ParseError> => {
  const { session, command } = context;
  const characters = Array.from(token.slice(1));

  for (const [index, character] of characters.entries()) {
    const option = command.options.find(
      (candidate) => candidate.shortName === character
    );
    if (!option) {
      return error(
        createParseError(
          "unknown-option",
          characters.length >= 2
            ? `Unknown option: "-${character}" (in sequence "${token}")`
            : `Unknown option: "${token}"`,
          `-${character}`,
          command
        )
      );
    }

    // Whatever follows the option character is either more options or,
    // for options taking an argument, the argument itself
    const rest = characters.slice(index + 1).join("");
    const shape = argumentShape(option);
    let argument: string | undefined;
    if (rest !== "") {
      if (shape !== "none") {
        if (!session.settings.attachedArguments) {
          return error(
            createParseError(
              "missing-argument",
              `Option -${character} (in sequence "${token}") requires an argument.`,
              `-${character}`,
              command
            )
          );
        }
        argument = rest;
      }
    } else if (shape === "required") {
      argument = session.shift();
      if (argument === undefined) {
        return error(
          createParseError(
            "missing-argument",
            `Option -${character} requires an argument.`,
            `-${character}`,
            command
          )
        );
      }
    }

    const ran = runOption(option, argument, context);
    if (!ran.ok) {
      return ran;
    }
    if (session.halted || argument !== undefined) {
      break;
    }
  }

  return ok(undefined);
};
