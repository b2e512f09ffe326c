/**
 * CLI argument parser
 */

import type { CliOptions } from "../types.js";

export type ParsedArgs = {
  command: string;
  directory?: string;
  options: CliOptions;
};

const splitList = (value: string): string[] =>
  value
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: string[]): ParsedArgs => {
  const options: CliOptions = {};
  let command = "";
  let directory: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue;

    if (!command && !arg.startsWith("-")) {
      command = arg;
      continue;
    }

    // First positional arg after command is the directory to scan
    if (command && !directory && !arg.startsWith("-")) {
      directory = arg;
      continue;
    }

    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", options: {} };
      case "-v":
      case "--version":
        return { command: "version", options: {} };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "-c":
      case "--config":
        options.config = args[++i] ?? "";
        break;
      case "-o":
      case "--out":
        options.out = args[++i] ?? "";
        break;
      case "-e":
      case "--ext":
        options.extensions = [
          ...(options.extensions ?? []),
          ...splitList(args[++i] ?? ""),
        ];
        break;
      case "-x":
      case "--exclude":
        {
          const pattern = args[++i] ?? "";
          if (pattern) {
            options.exclude = options.exclude || [];
            options.exclude.push(pattern);
          }
        }
        break;
      case "--case-sensitive":
        options.caseSensitive = true;
        break;
      case "--follow-symlinks":
        options.followSymlinks = true;
        break;
      case "--prepend":
        options.prepend = true;
        break;
      case "--include-static":
        options.includeStatic = true;
        break;
      case "--absolute":
        options.absolute = true;
        break;
      case "-n":
      case "--namespace":
        options.namespace = args[++i] ?? "";
        break;
      case "--class-name":
        options.className = args[++i] ?? "";
        break;
    }
  }

  return { command, directory, options };
};
