/**
 * Type definitions for CLI
 */

import type { SettingsOverrides } from "@argtree/core";
import type { Output } from "@argtree/help";

/**
 * Settings file (argtree.json). Every field is optional and overrides the
 * parser defaults.
 */
export type ArgtreeConfig = SettingsOverrides & {
  readonly $schema?: string;
};

/**
 * Streams and process context the CLI runs against
 */
export type CliIo = {
  readonly out: Output;
  readonly err: Output;
  readonly cwd: string;
  readonly env: Readonly<Record<string, string | undefined>>;
};
