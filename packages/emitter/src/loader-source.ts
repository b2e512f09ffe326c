/**
 * Loader source generation
 *
 * Renders a declaration map as a self-contained CommonJS module. Loading the
 * module installs a resolver into the shared resolver list exactly once per
 * process; loading it again only returns the installed loader class.
 */

import * as ts from "typescript";
import { createHash } from "node:crypto";
import {
  type DeclarationMap,
  type Diagnostic,
  type Result,
  createDiagnostic,
  ok,
  error,
} from "@declmap/frontend";
import {
  MARKER_PREFIX,
  RESOLVER_REGISTRY_KEY,
  generateFileHeader,
} from "./constants.js";
import { relativePathFrom } from "./relative-path.js";
import { renderTable } from "./table.js";

export type LoaderSourceOptions = {
  readonly caseSensitive: boolean;
  readonly prepend: boolean;
  readonly includeStatic: boolean;
  readonly relative: boolean;
  readonly namespace: string;
  readonly className: string;
  /** Pins the header timestamp and the marker */
  readonly generatedAt: Date;
  /** Directory the generated file will live in (defaults to the scanned root) */
  readonly artifactDirectory?: string;
};

/**
 * True when `name` can be used as the generated class name
 */
export const isValidClassName = (name: string): boolean => {
  if (!ts.isIdentifierText(name, ts.ScriptTarget.Latest)) {
    return false;
  }
  const keyword = ts.stringToToken(name);
  if (keyword === undefined) {
    return true;
  }
  const reserved =
    (keyword >= ts.SyntaxKind.FirstReservedWord &&
      keyword <= ts.SyntaxKind.LastReservedWord) ||
    (keyword >= ts.SyntaxKind.FirstFutureReservedWord &&
      keyword <= ts.SyntaxKind.LastFutureReservedWord);
  return !reserved;
};

/**
 * Unique, reproducible marker of one generated loader
 */
export const loaderMarker = (
  table: Record<string, string>,
  options: Pick<LoaderSourceOptions, "namespace" | "className" | "generatedAt">
): string => {
  const digest = createHash("sha256")
    .update(JSON.stringify(table) + options.generatedAt.toISOString())
    .digest("hex")
    .slice(0, 16);
  const name = options.namespace
    ? `${options.namespace}.${options.className}`
    : options.className;
  return `${MARKER_PREFIX}.${name}.${digest}`;
};

const pathExpression = (
  file: string,
  base: string,
  relative: boolean
): string =>
  relative
    ? `__dirname + ${JSON.stringify(relativePathFrom(base, file))}`
    : JSON.stringify(file);

/**
 * Render the loader module source for a scanned tree
 */
export const renderLoaderSource = (
  map: DeclarationMap,
  options: LoaderSourceOptions
): Result<string, Diagnostic> => {
  if (!isValidClassName(options.className)) {
    return error(
      createDiagnostic(
        "DCM4001",
        "error",
        `Invalid loader class name: '${options.className}'`,
        undefined,
        "Use a JavaScript identifier that is not a reserved word"
      )
    );
  }

  const table = renderTable(map);
  const base = options.artifactDirectory ?? map.directory;
  const name = options.className;
  const marker = loaderMarker(table, options);
  const staticFiles = options.includeStatic ? map.staticFiles : [];

  const lines: string[] = [];
  lines.push(
    generateFileHeader({
      generatedAt: options.generatedAt,
      symbolCount: map.symbols.size,
      caseSensitive: options.caseSensitive,
      prepend: options.prepend,
      relative: options.relative,
    })
  );
  lines.push('"use strict";');
  lines.push("");
  lines.push('const fs = require("node:fs");');
  lines.push("");
  lines.push(`const REGISTRY = Symbol.for(${JSON.stringify(RESOLVER_REGISTRY_KEY)});`);
  lines.push(`const MARKER = Symbol.for(${JSON.stringify(marker)});`);
  lines.push("");
  lines.push("const foldCase = (value) =>");
  lines.push("  value.replace(/[A-Z]/g, (letter) => letter.toLowerCase());");
  lines.push("");
  lines.push("if (!globalThis[MARKER]) {");
  lines.push(`  class ${name} {`);
  lines.push("    static mapping = Object.freeze({");
  for (const [identifier, file] of map.symbols) {
    lines.push(
      `      ${JSON.stringify(identifier)}: ${pathExpression(file, base, options.relative)},`
    );
  }
  lines.push("    });");
  lines.push("");
  lines.push("    static staticFiles = Object.freeze([");
  for (const file of staticFiles) {
    lines.push(`      ${pathExpression(file, base, options.relative)},`);
  }
  lines.push("    ]);");
  lines.push("");
  lines.push(`    static caseInsensitive = ${options.caseSensitive ? "false" : "true"};`);
  lines.push("");
  lines.push("    static resolve(identifier) {");
  lines.push(`      const mapping = ${name}.mapping;`);
  lines.push("      let file;");
  lines.push(`      if (${name}.caseInsensitive) {`);
  lines.push("        const folded = foldCase(identifier);");
  lines.push("        const key = Object.keys(mapping).find(");
  lines.push("          (candidate) => foldCase(candidate) === folded");
  lines.push("        );");
  lines.push("        file = key === undefined ? undefined : mapping[key];");
  lines.push("      } else if (Object.prototype.hasOwnProperty.call(mapping, identifier)) {");
  lines.push("        file = mapping[identifier];");
  lines.push("      }");
  lines.push("      if (file === undefined || !fs.existsSync(file)) {");
  lines.push("        return false;");
  lines.push("      }");
  lines.push("      try {");
  lines.push("        require(file);");
  lines.push("        return true;");
  lines.push("      } catch (err) {");
  lines.push("        return false;");
  lines.push("      }");
  lines.push("    }");
  lines.push("  }");
  lines.push("");
  lines.push("  const resolvers = globalThis[REGISTRY] ?? (globalThis[REGISTRY] = []);");
  lines.push(`  const resolver = (identifier) => ${name}.resolve(identifier);`);
  lines.push(
    options.prepend
      ? "  resolvers.unshift(resolver);"
      : "  resolvers.push(resolver);"
  );
  lines.push(`  for (const file of ${name}.staticFiles) {`);
  lines.push("    require(file);");
  lines.push("  }");
  lines.push(`  globalThis[MARKER] = ${name};`);
  lines.push("}");
  lines.push("");
  lines.push("module.exports = globalThis[MARKER];");
  lines.push("");

  return ok(lines.join("\n"));
};
