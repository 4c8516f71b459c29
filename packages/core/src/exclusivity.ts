/**
 * Mutual exclusivity tracking for option groups
 */

import type { CommandNode } from "./types/command.js";
import { type ParseError, createParseError } from "./types/errors.js";
import { type OptionEntry, describeOption } from "./types/option.js";
import { type Result, ok, error } from "./types/result.js";

export type ExclusivityTracker = {
  /** First option seen per group */
  readonly seen: Map<number, OptionEntry>;
};

export const createExclusivityTracker = (): ExclusivityTracker => ({
  seen: new Map(),
});

export const resetExclusivity = (tracker: ExclusivityTracker): void => {
  tracker.seen.clear();
};

/**
 * Record an option of a group, failing if another option of the same group
 * was already given. Group 0 means no group.
 */
export const checkExclusivity = (
  tracker: ExclusivityTracker,
  option: OptionEntry,
  command?: CommandNode,
  longOptions = true
): Result<void, ParseError> => {
  const group = option.group ?? 0;
  if (group === 0) {
    return ok(undefined);
  }
  const previous = tracker.seen.get(group);
  if (previous === undefined) {
    tracker.seen.set(group, option);
    return ok(undefined);
  }
  if (previous === option) {
    return ok(undefined);
  }
  const first = describeOption(previous, longOptions);
  const second = describeOption(option, longOptions);
  return error(
    createParseError(
      "mutually-exclusive",
      `Options ${first} and ${second} are mutually exclusive.`,
      second,
      command
    )
  );
};
