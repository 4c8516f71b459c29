/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname } from "node:path";
import {
  type ExclusivityScope,
  type HelpSettings,
  type LetterCase,
  type ParserSettings,
  type Result,
  type UsageStyle,
  ok,
  error,
  resolveSettings,
} from "@argtree/core";
import type { ArgtreeConfig } from "./types.js";

export const CONFIG_FILE_NAME = "argtree.json";

export const CONFIG_ENV_VAR = "ARGTREE_CONFIG";

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isLetterCase = (value: unknown): value is LetterCase =>
  value === "capitalized" || value === "lower" || value === "upper";

const isUsageStyle = (value: unknown): value is UsageStyle =>
  value === "detailed" || value === "compact";

const isExclusivityScope = (value: unknown): value is ExclusivityScope =>
  value === "session" || value === "command";

const isCount = (value: unknown, minimum: number): value is number =>
  typeof value === "number" && Number.isInteger(value) && value >= minimum;

const validateHelp = (
  value: unknown,
  source: string
): Result<Partial<HelpSettings>, string> => {
  if (!isRecord(value)) {
    return error(`${source}: 'help' must be an object`);
  }
  const help: Mutable<Partial<HelpSettings>> = {};
  for (const [key, field] of Object.entries(value)) {
    switch (key) {
      case "maxLineWidth":
      case "maxDividerWidth":
        if (!isCount(field, 1)) {
          return error(`${source}: 'help.${key}' must be a positive integer`);
        }
        help[key] = field;
        break;
      case "indentation":
        if (!isCount(field, 0)) {
          return error(
            `${source}: 'help.indentation' must be a non-negative integer`
          );
        }
        help.indentation = field;
        break;
      case "letterCase":
        if (!isLetterCase(field)) {
          return error(
            `${source}: 'help.letterCase' must be "capitalized", "lower" or "upper"`
          );
        }
        help.letterCase = field;
        break;
      case "usageStyle":
        if (!isUsageStyle(field)) {
          return error(
            `${source}: 'help.usageStyle' must be "detailed" or "compact"`
          );
        }
        help.usageStyle = field;
        break;
      case "compactOptionsLabel":
        if (typeof field !== "string") {
          return error(`${source}: 'help.compactOptionsLabel' must be a string`);
        }
        help.compactOptionsLabel = field;
        break;
      case "uniqueLongOptionColumn":
      case "floatingDescriptions":
      case "wordWrap":
        if (typeof field !== "boolean") {
          return error(`${source}: 'help.${key}' must be a boolean`);
        }
        help[key] = field;
        break;
      default:
        return error(`${source}: unknown help setting '${key}'`);
    }
  }
  return ok(help);
};

/**
 * Check parsed JSON against the settings file schema
 */
export const validateConfig = (
  value: unknown,
  source = CONFIG_FILE_NAME
): Result<ArgtreeConfig, string> => {
  if (!isRecord(value)) {
    return error(`${source}: expected a JSON object`);
  }
  const config: Mutable<ArgtreeConfig> = {};
  for (const [key, field] of Object.entries(value)) {
    switch (key) {
      case "$schema":
        if (typeof field !== "string") {
          return error(`${source}: '$schema' must be a string`);
        }
        config.$schema = field;
        break;
      case "longOptions":
      case "attachedArguments":
      case "subcommands":
      case "mutualExclusion":
      case "hiddenOptions":
      case "printHelpOnError":
        if (typeof field !== "boolean") {
          return error(`${source}: '${key}' must be a boolean`);
        }
        config[key] = field;
        break;
      case "exclusivityScope":
        if (!isExclusivityScope(field)) {
          return error(
            `${source}: 'exclusivityScope' must be "session" or "command"`
          );
        }
        config.exclusivityScope = field;
        break;
      case "help": {
        const help = validateHelp(field, source);
        if (!help.ok) {
          return help;
        }
        config.help = help.value;
        break;
      }
      default:
        return error(`${source}: unknown setting '${key}'`);
    }
  }
  return ok(config);
};

/**
 * Load and validate a settings file
 */
export const loadConfig = (
  configPath: string
): Result<ArgtreeConfig, string> => {
  if (!existsSync(configPath)) {
    return error(`Config file not found: ${configPath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (caught) {
    return error(
      `Failed to parse ${configPath}: ${caught instanceof Error ? caught.message : String(caught)}`
    );
  }
  return validateConfig(parsed, configPath);
};

/**
 * Find argtree.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * ARGTREE_CONFIG names the settings file explicitly (relative to the working
 * directory); otherwise argtree.json is searched for
 */
export const resolveConfigPath = (
  cwd: string,
  env: Readonly<Record<string, string | undefined>>
): string | null => {
  const explicit = env[CONFIG_ENV_VAR];
  if (explicit) {
    return resolve(cwd, explicit);
  }
  return findConfig(cwd);
};

export const resolveCliSettings = (config: ArgtreeConfig): ParserSettings =>
  resolveSettings(config);
