/**
 * Parser session creation and cursor primitives
 */

import { type ExclusivityTracker, createExclusivityTracker } from "./exclusivity.js";
import { type ParserSettings, defaultSettings } from "./settings.js";
import type { CommandNode } from "./types/command.js";
import type { ParserSession } from "./types/session.js";

/**
 * Mutable state behind a ParserSession, owned by the parse call
 */
export type SessionState = {
  tokens: readonly string[];
  index: number;
  active: CommandNode | undefined;
  halted: boolean;
  exitCode: number;
  readonly root: CommandNode | undefined;
  readonly exclusivity: ExclusivityTracker;
};

export type SessionHandle = {
  readonly session: ParserSession;
  readonly state: SessionState;
};

export const createSession = (
  settings: ParserSettings = defaultSettings,
  root?: CommandNode
): SessionHandle => {
  const state: SessionState = {
    tokens: [],
    index: 0,
    active: undefined,
    halted: false,
    exitCode: 0,
    root,
    exclusivity: createExclusivityTracker(),
  };

  const session: ParserSession = {
    settings,
    root,
    get activeCommand() {
      return state.active;
    },
    get tokens() {
      return state.tokens;
    },
    get position() {
      return state.index;
    },
    get halted() {
      return state.halted;
    },
    get exitCode() {
      return state.exitCode;
    },
    shift: () => {
      if (state.index >= state.tokens.length) {
        return undefined;
      }
      state.index += 1;
      return state.tokens[state.index];
    },
    unshift: () => {
      if (state.index <= 0) {
        return undefined;
      }
      state.index -= 1;
      return state.tokens[state.index];
    },
    current: () => state.tokens[state.index],
    exit: (code = 0) => {
      state.halted = true;
      state.exitCode = code;
    },
  };

  return { session, state };
};

/**
 * Point the session at a command level: cursor on the first token after the
 * program name
 */
export const enterCommand = (
  state: SessionState,
  command: CommandNode,
  tokens: readonly string[]
): void => {
  state.active = command;
  state.tokens = tokens;
  state.index = 1;
};

/**
 * Hand the compacted operand vector to the cursor, positioned at its start
 */
export const rewindToOperands = (
  state: SessionState,
  operands: readonly string[]
): void => {
  state.tokens = operands;
  state.index = 0;
};
