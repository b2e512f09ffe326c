/**
 * Scan and loader options with their defaults
 */

import { createHash } from "node:crypto";

/**
 * Options accepted by every scanning entry point. Live registration and
 * artifact rendering read the fields they need; the rest are ignored.
 */
export type LoaderOptions = {
  /** File extensions to scan, without the leading dot (default `["ts"]`) */
  readonly extensions?: readonly string[];
  /** gitignore-style patterns matched against root-relative paths */
  readonly exclude?: readonly string[];
  /** Exact-case lookups instead of ordinal case folding */
  readonly caseSensitive?: boolean;
  /** Descend into symbolic links to directories */
  readonly followSymlinks?: boolean;
  /** Insert the live resolver at the front of the chain */
  readonly prepend?: boolean;
  /** Eagerly load files that declare no types */
  readonly includeStatic?: boolean;
  /** Render artifact paths relative to the artifact location */
  readonly relative?: boolean;
  /** Cosmetic: namespace recorded in the rendered artifact's marker */
  readonly namespace?: string;
  /** Cosmetic: class name of the rendered artifact's loader */
  readonly className?: string;
};

export type ResolvedOptions = {
  readonly extensions: readonly string[];
  readonly exclude: readonly string[];
  readonly caseSensitive: boolean;
  readonly followSymlinks: boolean;
  readonly prepend: boolean;
  readonly includeStatic: boolean;
  readonly relative: boolean;
  readonly namespace: string;
  readonly className: string;
};

export const DEFAULT_OPTIONS: ResolvedOptions = {
  extensions: ["ts"],
  exclude: [],
  caseSensitive: false,
  followSymlinks: false,
  prepend: false,
  includeStatic: false,
  relative: true,
  namespace: "",
  className: "Autoloader",
};

/**
 * Normalize an extension list: lowercase, no leading dot, no duplicates
 */
export const normalizeExtensions = (
  extensions: readonly string[]
): readonly string[] => {
  const seen = new Set<string>();
  for (const ext of extensions) {
    const normalized = ext.trim().replace(/^\./, "").toLowerCase();
    if (normalized) {
      seen.add(normalized);
    }
  }
  return [...seen];
};

/**
 * Apply defaults to caller-supplied options
 */
export const resolveOptions = (options: LoaderOptions = {}): ResolvedOptions => ({
  extensions: normalizeExtensions(
    options.extensions ?? DEFAULT_OPTIONS.extensions
  ),
  exclude: options.exclude ?? DEFAULT_OPTIONS.exclude,
  caseSensitive: options.caseSensitive ?? DEFAULT_OPTIONS.caseSensitive,
  followSymlinks: options.followSymlinks ?? DEFAULT_OPTIONS.followSymlinks,
  prepend: options.prepend ?? DEFAULT_OPTIONS.prepend,
  includeStatic: options.includeStatic ?? DEFAULT_OPTIONS.includeStatic,
  relative: options.relative ?? DEFAULT_OPTIONS.relative,
  namespace: options.namespace ?? DEFAULT_OPTIONS.namespace,
  className: options.className ?? DEFAULT_OPTIONS.className,
});

/**
 * Stable fingerprint of every resolved option value.
 * Field order is fixed here, so equal options hash equally.
 */
export const fingerprintOptions = (options: ResolvedOptions): string => {
  const canonical = JSON.stringify([
    options.extensions,
    options.exclude,
    options.caseSensitive,
    options.followSymlinks,
    options.prepend,
    options.includeStatic,
    options.relative,
    options.namespace,
    options.className,
  ]);
  return createHash("sha256").update(canonical).digest("hex");
};
