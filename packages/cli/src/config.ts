/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname, isAbsolute } from "node:path";
import { z } from "zod";
import type {
  DeclmapConfig,
  CliOptions,
  ResolvedConfig,
  Result,
} from "./types.js";

export const CONFIG_FILE_NAME = "declmap.json";

const nonEmptyString = z.string().min(1);

const configSchema = z
  .object({
    $schema: z.string().optional(),
    directory: nonEmptyString.optional(),
    output: nonEmptyString.optional(),
    extensions: z.array(nonEmptyString).optional(),
    exclude: z.array(z.string()).optional(),
    caseSensitive: z.boolean().optional(),
    followSymlinks: z.boolean().optional(),
    prepend: z.boolean().optional(),
    includeStatic: z.boolean().optional(),
    relative: z.boolean().optional(),
    namespace: z.string().optional(),
    className: nonEmptyString.optional(),
  })
  .strict();

const describeIssues = (issues: readonly z.ZodIssue[]): string =>
  issues
    .map((issue) =>
      issue.path.length > 0
        ? `'${issue.path.join(".")}' ${issue.message}`
        : issue.message
    )
    .join("; ");

/**
 * Validate parsed JSON as a config file body
 */
export const parseConfig = (raw: unknown): Result<DeclmapConfig, string> => {
  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      error: `${CONFIG_FILE_NAME}: ${describeIssues(parsed.error.issues)}`,
    };
  }
  return { ok: true, value: parsed.data };
};

/**
 * Load declmap.json from a path
 */
export const loadConfig = (
  configPath: string
): Result<DeclmapConfig, string> => {
  if (!existsSync(configPath)) {
    return {
      ok: false,
      error: `Config file not found: ${configPath}`,
    };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (error) {
    return {
      ok: false,
      error: `Failed to parse ${CONFIG_FILE_NAME}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
  return parseConfig(raw);
};

/**
 * Find declmap.json by walking up the directory tree
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

const absoluteFrom = (base: string, path: string | undefined) =>
  path === undefined ? undefined : isAbsolute(path) ? path : resolve(base, path);

/**
 * Merge config file values with CLI options.
 * Paths from the file resolve against `projectRoot`, paths from the command
 * line against `workingDir`.
 */
export const resolveConfig = (
  config: DeclmapConfig,
  cliOptions: CliOptions,
  projectRoot: string = process.cwd(),
  directoryArg?: string,
  workingDir: string = process.cwd()
): ResolvedConfig => {
  const directory =
    directoryArg !== undefined
      ? absoluteFrom(workingDir, directoryArg)
      : absoluteFrom(projectRoot, config.directory);
  const output =
    cliOptions.out !== undefined
      ? absoluteFrom(workingDir, cliOptions.out)
      : absoluteFrom(projectRoot, config.output);

  return {
    directory,
    output,
    options: {
      extensions: cliOptions.extensions ?? config.extensions,
      exclude: [...(config.exclude ?? []), ...(cliOptions.exclude ?? [])],
      caseSensitive: cliOptions.caseSensitive ?? config.caseSensitive,
      followSymlinks: cliOptions.followSymlinks ?? config.followSymlinks,
      prepend: cliOptions.prepend ?? config.prepend,
      includeStatic: cliOptions.includeStatic ?? config.includeStatic,
      relative: cliOptions.absolute ? false : config.relative,
      namespace: cliOptions.namespace ?? config.namespace,
      className: cliOptions.className ?? config.className,
    },
    verbose: cliOptions.verbose ?? false,
    quiet: cliOptions.quiet ?? false,
  };
};
