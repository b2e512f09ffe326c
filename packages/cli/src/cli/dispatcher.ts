/**
 * CLI command dispatcher
 */

import { dirname, resolve } from "node:path";
import { loadConfig, findConfig, resolveConfig } from "../config.js";
import { initProject } from "../commands/init.js";
import { mapCommand } from "../commands/map.js";
import { generateCommand } from "../commands/generate.js";
import type { DeclmapConfig } from "../types.js";
import { EXIT, VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

/**
 * Main CLI entry point
 */
export const runCli = async (
  args: string[],
  cwd: string = process.cwd()
): Promise<number> => {
  const parsed = parseArgs(args);

  if (parsed.command === "version") {
    console.log(`declmap v${VERSION}`);
    return EXIT.ok;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return EXIT.ok;
  }

  if (parsed.command === "init") {
    const result = initProject(cwd);
    if (!result.ok) {
      console.error(`Error: ${result.error}`);
      return EXIT.config;
    }
    if (!parsed.options.quiet) {
      console.log(`✓ Created ${result.value}`);
    }
    return EXIT.ok;
  }

  if (parsed.command !== "map" && parsed.command !== "generate") {
    console.error(`Error: Unknown command '${parsed.command}'`);
    console.error("Run 'declmap --help' for usage");
    return EXIT.unknownCommand;
  }

  // A config file is optional; --config makes it required
  const configPath = parsed.options.config
    ? resolve(cwd, parsed.options.config)
    : findConfig(cwd);

  let fileConfig: DeclmapConfig = {};
  if (configPath) {
    const configResult = loadConfig(configPath);
    if (!configResult.ok) {
      console.error(`Error: ${configResult.error}`);
      return EXIT.config;
    }
    fileConfig = configResult.value;
  }

  const config = resolveConfig(
    fileConfig,
    parsed.options,
    configPath ? dirname(configPath) : cwd,
    parsed.directory,
    cwd
  );

  if (config.directory === undefined) {
    console.error("Error: Directory to scan is required");
    console.error(`Usage: declmap ${parsed.command} <directory>`);
    return EXIT.missingDirectory;
  }

  if (parsed.command === "map") {
    const result = mapCommand(config, config.directory);
    if (!result.ok) {
      console.error(`Error: ${result.error}`);
      return EXIT.map;
    }
    return EXIT.ok;
  }

  const result = generateCommand(config, config.directory);
  if (!result.ok) {
    console.error(`Error: ${result.error}`);
    return EXIT.generate;
  }
  return EXIT.ok;
};
