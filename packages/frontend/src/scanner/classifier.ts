/**
 * Static-file classification
 *
 * A static file declares no named types but still has content of its own:
 * functions, variables or top-level statements. Such files can only be
 * brought in by loading them eagerly.
 */

import * as ts from "typescript";
import { isKind, isOpaque, isTrivia, type Token } from "./tokenizer.js";
import { type Extraction, extractDeclarations } from "./extractor.js";
import { readImport, startsImportStatement } from "./imports.js";
import { readNamespaceHeader } from "./namespaces.js";

export type FileClassification = "declarations" | "static" | "empty";

// Modifiers that say nothing on their own (`export {};`, `declare ...`)
const NEUTRAL_KINDS: ReadonlySet<ts.SyntaxKind> = new Set([
  ts.SyntaxKind.ExportKeyword,
  ts.SyntaxKind.DeclareKeyword,
]);

const isStructural = (token: Token): boolean =>
  isOpaque(token, "{") || isOpaque(token, "}") || isOpaque(token, ";");

const hasOwnContent = (tokens: readonly Token[]): boolean => {
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (token === undefined || isTrivia(token) || isStructural(token)) {
      continue;
    }
    if (token.type === "opaque") {
      return true;
    }

    if (isKind(token, ts.SyntaxKind.ImportKeyword) && startsImportStatement(tokens, i)) {
      i = readImport(tokens, i).end;
      continue;
    }

    const header = readNamespaceHeader(tokens, i);
    if (header !== undefined) {
      i = header.form === "file" ? header.end : header.open;
      continue;
    }

    if (!NEUTRAL_KINDS.has(token.kind)) {
      return true;
    }
  }
  return false;
};

/**
 * Classify a tokenized file. Files with at least one emitted declaration are
 * never static, even when they also hold functions or statements.
 */
export const classifyFile = (
  tokens: readonly Token[],
  extraction: Extraction = extractDeclarations(tokens)
): FileClassification => {
  if (extraction.symbols.length > 0) {
    return "declarations";
  }
  return hasOwnContent(tokens) ? "static" : "empty";
};

export const isStaticFile = (
  tokens: readonly Token[],
  extraction?: Extraction
): boolean => classifyFile(tokens, extraction) === "static";
