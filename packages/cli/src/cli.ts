/**
 * CLI argument parsing and command dispatch
 * Main dispatcher - re-exports from cli/ subdirectory
 */

export { VERSION, EXIT, showHelp, parseArgs, runCli } from "./cli/index.js";
