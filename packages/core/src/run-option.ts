/**
 * Shared step of long and short option handling
 */

import { checkExclusivity } from "./exclusivity.js";
import { executeOption } from "./executor.js";
import type { SessionState } from "./session.js";
import type { CommandNode } from "./types/command.js";
import type { ParseError } from "./types/errors.js";
import type { OptionEntry } from "./types/option.js";
import type { Result } from "./types/result.js";
import type { ParserSession } from "./types/session.js";

export type DispatchContext = {
  readonly session: ParserSession;
  readonly state: SessionState;
  readonly command: CommandNode;
};

/**
 * Check a matched option against its group, then execute it
 */
export const runOption = (
  option: OptionEntry,
  argument: string | undefined,
  context: DispatchContext
): Result<void, ParseError> => {
  const { session, state, command } = context;
  if (session.settings.mutualExclusion) {
    const checked = checkExclusivity(
      state.exclusivity,
      option,
      command,
      session.settings.longOptions
    );
    if (!checked.ok) {
      return checked;
    }
  }
  return executeOption(option, argument, session);
};
