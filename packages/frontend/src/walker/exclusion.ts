/**
 * Exclusion pattern matching against root-relative paths
 */

import * as path from "node:path";
import ignoreModule from "ignore";

/**
 * Tests a root-relative path. Directories are matched with a trailing
 * slash so that `dir/` patterns prune whole subtrees.
 */
export type ExclusionMatcher = (
  relativePath: string,
  isDirectory?: boolean
) => boolean;

/**
 * Convert a platform path to forward slashes
 */
export const toPosixPath = (filePath: string): string =>
  filePath.split(path.sep).join(path.posix.sep);

// A lone `*` (not part of `**`)
const SINGLE_STAR = /(?<!\*)\*(?!\*)/;

/**
 * gitignore variants of one pattern in which every lone `*` may also cross
 * directory separators, so `lib/*.ts` covers `lib/sub/a.ts` as well.
 * Patterns without an inner slash already match at any depth.
 */
export const expandPattern = (pattern: string): readonly string[] => {
  if (!pattern.replace(/\/+$/, "").includes("/")) {
    return [pattern];
  }
  const [head = "", ...rest] = pattern.split(SINGLE_STAR);
  let variants = [head];
  for (const part of rest) {
    variants = variants.flatMap((variant) => [
      `${variant}*${part}`,
      `${variant}*/**/*${part}`,
    ]);
  }
  return variants;
};

/**
 * Build a matcher for gitignore-style patterns (`*`, `**`, `dir/*`, `*.ext`).
 * `*` matches across `/`. Paths outside the root never match.
 */
export const createExclusionMatcher = (
  patterns: readonly string[]
): ExclusionMatcher => {
  if (patterns.length === 0) {
    return () => false;
  }

  // CommonJS interop: the factory is the package's `default` export
  const matcher = ignoreModule
    .default()
    .add(patterns.flatMap(expandPattern));

  return (relativePath, isDirectory = false) => {
    const normalized = toPosixPath(relativePath).replace(/^\.\//, "");
    if (
      normalized === "" ||
      normalized === ".." ||
      normalized.startsWith("../") ||
      path.posix.isAbsolute(normalized)
    ) {
      return false;
    }
    return matcher.ignores(isDirectory ? `${normalized}/` : normalized);
  };
};
