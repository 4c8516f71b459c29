/**
 * CLI - Public API
 */

export { VERSION, PROGRAM_NAME } from "./constants.js";
export { createProgram, type Program } from "./program.js";
export { runCli, processIo } from "./dispatcher.js";
