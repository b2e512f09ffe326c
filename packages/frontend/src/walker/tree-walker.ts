/**
 * Recursive source tree enumeration
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { attempt } from "../types/result.js";
import {
  createDiagnostic,
  silentSink,
  type DiagnosticSink,
} from "../types/diagnostic.js";
import { createExclusionMatcher, toPosixPath } from "./exclusion.js";

export type WalkOptions = {
  readonly extensions: readonly string[];
  readonly exclude: readonly string[];
  readonly followSymlinks: boolean;
  readonly report?: DiagnosticSink;
};

/**
 * Lowercased extension of a file name without the dot ("" when none)
 */
export const extensionOf = (fileName: string): string =>
  path.extname(fileName).slice(1).toLowerCase();

const byName = (a: fs.Dirent, b: fs.Dirent): number =>
  a.name < b.name ? -1 : a.name > b.name ? 1 : 0;

/**
 * Lazily yield candidate source files below `root`.
 *
 * Entries are visited in sorted name order. Symbolic links to directories
 * are only followed with `followSymlinks`, and each real directory is
 * entered at most once. Unreadable subdirectories are reported and skipped.
 */
export function* walkTree(
  root: string,
  options: WalkOptions
): Generator<string, void, undefined> {
  const report = options.report ?? silentSink;
  const extensions = new Set(options.extensions);
  const isExcluded = createExclusionMatcher(options.exclude);
  const visited = new Set<string>();

  const relativeTo = (fullPath: string): string =>
    toPosixPath(path.relative(root, fullPath));

  const accepts = (fullPath: string): boolean =>
    extensions.has(extensionOf(fullPath)) && !isExcluded(relativeTo(fullPath));

  function* enter(dir: string): Generator<string, void, undefined> {
    const real = attempt(() => fs.realpathSync(dir));
    const key = real.ok ? real.value : dir;
    if (visited.has(key)) {
      return;
    }
    visited.add(key);

    const listed = attempt(() => fs.readdirSync(dir, { withFileTypes: true }));
    if (!listed.ok) {
      report(
        createDiagnostic(
          "DCM2001",
          "warning",
          `Cannot read directory '${dir}', skipping it: ${listed.error}`
        )
      );
      return;
    }

    for (const entry of [...listed.value].sort(byName)) {
      const fullPath = path.join(dir, entry.name);

      if (entry.isSymbolicLink()) {
        const target = attempt(() => fs.statSync(fullPath));
        if (!target.ok) {
          continue; // dangling link
        }
        if (target.value.isDirectory()) {
          if (options.followSymlinks && !isExcluded(relativeTo(fullPath), true)) {
            yield* enter(fullPath);
          }
        } else if (target.value.isFile() && accepts(fullPath)) {
          yield fullPath;
        }
        continue;
      }

      if (entry.isDirectory()) {
        if (!isExcluded(relativeTo(fullPath), true)) {
          yield* enter(fullPath);
        }
      } else if (entry.isFile() && accepts(fullPath)) {
        yield fullPath;
      }
    }
  }

  yield* enter(root);
}
