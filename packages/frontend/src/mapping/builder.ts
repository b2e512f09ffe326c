/**
 * Mapping builder - scans a directory tree into a DeclarationMap
 *
 * Results are memoized per canonical directory and option set for the
 * lifetime of the builder. Nothing invalidates an entry except clearCache().
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { createHash } from "node:crypto";
import { type Result, ok, error, attempt } from "../types/result.js";
import {
  type Diagnostic,
  type DiagnosticSink,
  createDiagnostic,
  silentSink,
} from "../types/diagnostic.js";
import { walkTree, extensionOf } from "../walker/tree-walker.js";
import { createExclusionMatcher, toPosixPath } from "../walker/exclusion.js";
import { tokenize } from "../scanner/tokenizer.js";
import { extractDeclarations } from "../scanner/extractor.js";
import { isStaticFile } from "../scanner/classifier.js";
import {
  type LoaderOptions,
  type ResolvedOptions,
  fingerprintOptions,
  resolveOptions,
} from "./options.js";
import type { DeclarationMap } from "./types.js";

const JSX_EXTENSIONS: ReadonlySet<string> = new Set(["tsx", "jsx"]);

/**
 * Check that `directory` is an existing, readable directory
 */
export const checkRoot = (directory: string): Result<string, Diagnostic> => {
  const stat = attempt(() => fs.statSync(directory));
  if (!stat.ok || !stat.value.isDirectory()) {
    return error(
      createDiagnostic(
        "DCM1001",
        "error",
        `Directory not found: ${directory}`
      )
    );
  }

  const access = attempt(() =>
    fs.accessSync(directory, fs.constants.R_OK | fs.constants.X_OK)
  );
  if (!access.ok) {
    return error(
      createDiagnostic(
        "DCM1002",
        "error",
        `Directory is not readable: ${directory}`
      )
    );
  }

  const real = attempt(() => fs.realpathSync(directory));
  return ok(real.ok ? real.value : path.resolve(directory));
};

/**
 * Memo key for one directory and option set
 */
export const cacheKey = (directory: string, options: ResolvedOptions): string =>
  createHash("sha256")
    .update(`${directory}\n${fingerprintOptions(options)}`)
    .digest("hex");

export class MappingBuilder {
  private readonly cache = new Map<string, DeclarationMap>();

  /**
   * Scan `directory` and map every declared type to its defining file.
   * An empty map is a successful result.
   */
  build(
    directory: string,
    options: LoaderOptions = {},
    report: DiagnosticSink = silentSink
  ): Result<DeclarationMap, Diagnostic> {
    const root = checkRoot(directory);
    if (!root.ok) {
      return root;
    }

    const resolved = resolveOptions(options);
    const key = cacheKey(root.value, resolved);
    const cached = this.cache.get(key);
    if (cached) {
      return ok(cached);
    }

    const map = scanTree(root.value, resolved, report);
    this.cache.set(key, map);
    return ok(map);
  }

  clearCache(): void {
    this.cache.clear();
  }

  get cacheSize(): number {
    return this.cache.size;
  }
}

const scanTree = (
  root: string,
  options: ResolvedOptions,
  report: DiagnosticSink
): DeclarationMap => {
  const symbols = new Map<string, string>();
  const staticFiles: string[] = [];
  const extensions = new Set(options.extensions);
  const isExcluded = createExclusionMatcher(options.exclude);

  // Links may lead elsewhere; check the canonical path again
  const acceptsCanonical = (file: string): boolean => {
    if (!extensions.has(extensionOf(file))) {
      return false;
    }
    const relative = path.relative(root, file);
    const outside =
      relative === ".." ||
      relative.startsWith(`..${path.sep}`) ||
      path.isAbsolute(relative);
    return outside || !isExcluded(toPosixPath(relative));
  };

  const seenFiles = new Set<string>();

  for (const candidate of walkTree(root, {
    extensions: options.extensions,
    exclude: options.exclude,
    followSymlinks: options.followSymlinks,
    report,
  })) {
    const canonical = attempt(() => fs.realpathSync(candidate));
    if (!canonical.ok || seenFiles.has(canonical.value)) {
      continue;
    }
    const file = canonical.value;
    seenFiles.add(file);
    if (!acceptsCanonical(file)) {
      continue;
    }

    const content = attempt(() => fs.readFileSync(file, "utf-8"));
    if (!content.ok) {
      report(
        createDiagnostic(
          "DCM2002",
          "warning",
          `Cannot read file, skipping it: ${content.error}`,
          { file, line: 1, column: 1, length: 0 }
        )
      );
      continue;
    }

    const tokens = tokenize(content.value, {
      jsx: JSX_EXTENSIONS.has(extensionOf(file)),
    });
    if (tokens.length === 0) {
      if (content.value.length > 0) {
        report(
          createDiagnostic(
            "DCM2003",
            "warning",
            "File could not be tokenized, skipping it",
            { file, line: 1, column: 1, length: 0 }
          )
        );
      }
      continue;
    }

    const extraction = extractDeclarations(tokens);
    for (const symbol of extraction.symbols) {
      symbols.set(symbol.name, file);
    }

    if (options.includeStatic && isStaticFile(tokens, extraction)) {
      staticFiles.push(file);
    }
  }

  return { directory: root, symbols, staticFiles };
};
