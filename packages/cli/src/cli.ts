/**
 * CLI argument parsing and command dispatch
 * Main dispatcher - re-exports from cli/ subdirectory
 */

export { VERSION, showHelp, parseArgs, runCli } from "./cli/index.js";
export type { CliDependencies } from "./cli/index.js";
