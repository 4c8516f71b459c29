/**
 * CLI command dispatcher
 */

import {
  type ParserSettings,
  buildCommandTree,
  formatDeclarationIssue,
  parse,
  resolveSettings,
} from "@argtree/core";
import { printParseError } from "@argtree/help";
import { loadConfig, resolveCliSettings, resolveConfigPath } from "../config.js";
import type { CliIo } from "../types.js";
import { PROGRAM_NAME } from "./constants.js";
import { createProgram } from "./program.js";

export const processIo = (): CliIo => ({
  out: process.stdout,
  err: process.stderr,
  cwd: process.cwd(),
  env: process.env,
});

const loadSettings = (io: CliIo): ParserSettings | string => {
  const configPath = resolveConfigPath(io.cwd, io.env);
  if (!configPath) {
    return resolveSettings();
  }
  const configResult = loadConfig(configPath);
  if (!configResult.ok) {
    return configResult.error;
  }
  return resolveCliSettings(configResult.value);
};

/**
 * Main CLI entry point. Returns the process exit code: 0 on success, 1 on
 * configuration and parse errors, otherwise the code a command exits with.
 */
export const runCli = async (
  args: readonly string[],
  io: CliIo = processIo()
): Promise<number> => {
  const settings = loadSettings(io);
  if (typeof settings === "string") {
    io.err.write(`error: ${settings}\n`);
    return 1;
  }

  const tree = buildCommandTree(createProgram(io).decl);
  if (!tree.ok) {
    for (const issue of tree.error) {
      io.err.write(`error: ${formatDeclarationIssue(issue)}\n`);
    }
    return 1;
  }

  const parsed = parse(tree.value, [PROGRAM_NAME, ...args], settings);
  if (!parsed.ok) {
    printParseError(io.err, parsed.error, settings);
    return 1;
  }
  return parsed.value.exitCode;
};
