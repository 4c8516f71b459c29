/**
 * Parser session: the state of a single parse call
 */

import type { ParserSettings } from "../settings.js";
import type { CommandNode } from "./command.js";

export type ParserSession = {
  readonly settings: ParserSettings;
  readonly root: CommandNode | undefined;
  /** Command whose options are being parsed, or whose handler runs */
  readonly activeCommand: CommandNode | undefined;
  /** Token vector the cursor walks */
  readonly tokens: readonly string[];
  readonly position: number;
  readonly halted: boolean;
  readonly exitCode: number;
  /** Advance the cursor and return the new current token */
  readonly shift: () => string | undefined;
  /** Move the cursor back and return the new current token */
  readonly unshift: () => string | undefined;
  readonly current: () => string | undefined;
  /** Stop parsing after the running callback or handler returns */
  readonly exit: (code?: number) => void;
};
