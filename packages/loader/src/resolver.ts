/**
 * Resolver construction for one declaration map
 */

import * as fs from "node:fs";
import {
  type DeclarationMap,
  type DiagnosticSink,
  attempt,
  createDiagnostic,
  silentSink,
} from "@declmap/frontend";
import type { ModuleLoader, Resolver } from "./types.js";

/**
 * Lowercase ASCII letters only; other characters compare as they are
 */
export const foldAsciiCase = (value: string): string =>
  value.replace(/[A-Z]/g, (letter) => letter.toLowerCase());

/**
 * File for `identifier`. Case sensitive lookups are exact; otherwise the
 * first name in traversal order that matches under ASCII case folding wins,
 * even when a later name matches exactly.
 */
export const lookupFile = (
  symbols: ReadonlyMap<string, string>,
  identifier: string,
  caseSensitive: boolean
): string | undefined => {
  if (caseSensitive) {
    return symbols.get(identifier);
  }
  const folded = foldAsciiCase(identifier);
  for (const [name, file] of symbols) {
    if (foldAsciiCase(name) === folded) {
      return file;
    }
  }
  return undefined;
};

const isReadableFile = (file: string): boolean => {
  const stat = attempt(() => fs.statSync(file));
  if (!stat.ok || !stat.value.isFile()) {
    return false;
  }
  return attempt(() => fs.accessSync(file, fs.constants.R_OK)).ok;
};

export type ResolverOptions = {
  readonly caseSensitive: boolean;
  readonly loadModule: ModuleLoader;
  readonly report?: DiagnosticSink;
};

/**
 * Resolver that loads the defining file of any identifier in `map`.
 * It never throws; a failing load is reported and answered with false.
 */
export const createResolver = (
  map: DeclarationMap,
  options: ResolverOptions
): Resolver => {
  const report = options.report ?? silentSink;

  return (identifier) => {
    const file = lookupFile(map.symbols, identifier, options.caseSensitive);
    if (file === undefined || !isReadableFile(file)) {
      return false;
    }

    const loaded = attempt(() => options.loadModule(file));
    if (!loaded.ok) {
      report(
        createDiagnostic(
          "DCM3002",
          "warning",
          `Loading '${identifier}' failed: ${loaded.error}`,
          { file, line: 1, column: 1, length: 0 }
        )
      );
      return false;
    }
    return true;
  };
};
