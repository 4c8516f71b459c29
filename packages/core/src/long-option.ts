/**
 * Long option recognition: "--name", "--name=value", "--name value"
 */

import { type DispatchContext, runOption } from "./run-option.js";
import { type ParseError, createParseError } from "./types/errors.js";
import { argumentShape } from "./types/option.js";
import { type Result, error } from "./types/result.js";

export const parseLongOption = (
  token: string,
  context: DispatchContext
): Result<void, ParseError> => {
  const { session, command } = context;
  const body = token.slice(2);
  const separator = session.settings.attachedArguments ? body.indexOf("=") : -1;
  const name = separator >= 0 ? body.slice(0, separator) : body;
  const attached = separator >= 0 ? body.slice(separator + 1) : undefined;

  const option = command.options.find(
    (candidate) => candidate.longName !== undefined && candidate.longName === name
  );
  if (!option) {
    return error(
      createParseError(
        "unknown-option",
        `Unknown option: "--${name}"`,
        `--${name}`,
        command
      )
    );
  }

  const shape = argumentShape(option);
  let argument = attached;
  if (attached !== undefined) {
    if (shape === "none") {
      return error(
        createParseError(
          "unwanted-argument",
          `Unwanted option-argument: "${attached}"`,
          attached,
          command
        )
      );
    }
  } else if (shape === "required") {
    argument = session.shift();
    if (argument === undefined) {
      return error(
        createParseError(
          "missing-argument",
          `Option "--${name}" requires an argument.`,
          `--${name}`,
          command
        )
      );
    }
  }

  return runOption(option, argument, context);
};
