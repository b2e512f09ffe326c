/**
 * Type definitions for CLI
 */

import type { LoaderOptions } from "@declmap/frontend";

export type { Result } from "@declmap/frontend";

/**
 * Configuration file (declmap.json)
 */
export type DeclmapConfig = {
  readonly $schema?: string;
  readonly directory?: string;
  readonly output?: string;
  readonly extensions?: readonly string[];
  readonly exclude?: readonly string[];
  readonly caseSensitive?: boolean;
  readonly followSymlinks?: boolean;
  readonly prepend?: boolean;
  readonly includeStatic?: boolean;
  readonly relative?: boolean;
  readonly namespace?: string;
  readonly className?: string;
};

/**
 * CLI options (from command line)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  out?: string;
  extensions?: string[];
  exclude?: string[];
  caseSensitive?: boolean;
  followSymlinks?: boolean;
  prepend?: boolean;
  includeStatic?: boolean;
  absolute?: boolean;
  namespace?: string;
  className?: string;
};

/**
 * Resolved configuration (file + CLI merged)
 */
export type ResolvedConfig = {
  /** Absolute directory to scan, when one was given */
  readonly directory: string | undefined;
  /** Absolute output file; undefined prints to stdout */
  readonly output: string | undefined;
  readonly options: LoaderOptions;
  readonly verbose: boolean;
  readonly quiet: boolean;
};
