/**
 * CLI argument parsing and command dispatch
 * Main dispatcher - re-exports from cli/ subdirectory
 */

export {
  VERSION,
  PROGRAM_NAME,
  createProgram,
  runCli,
  processIo,
} from "./cli/index.js";
export type { Program } from "./cli/index.js";
export * from "./types.js";
export * from "./config.js";
