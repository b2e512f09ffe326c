/**
 * Import statement reader
 *
 * Turns one `import` statement into alias entries for the extractor's alias
 * table. Only the statement's shape is read; the imported modules are never
 * resolved.
 */

import * as ts from "typescript";
import { isKind, isNameToken, isOpaque, type Token } from "./tokenizer.js";
import { literalValue, nextIndex } from "./cursor.js";

export type ImportStatement = {
  /** `[alias, imported name]` pairs in source order */
  readonly entries: readonly (readonly [string, string])[];
  /** Index of the statement's last token */
  readonly end: number;
};

const lastSegment = (name: string): string => {
  const dot = name.lastIndexOf(".");
  return dot === -1 ? name : name.slice(dot + 1);
};

/**
 * True when the `import` keyword at `index` starts a statement rather than
 * a dynamic `import(...)` call or an `import.meta` access
 */
export const startsImportStatement = (
  tokens: readonly Token[],
  index: number
): boolean => {
  const next = tokens[nextIndex(tokens, index)];
  return (
    next !== undefined &&
    !isOpaque(next, "(") &&
    !isKind(next, ts.SyntaxKind.DotToken)
  );
};

/**
 * Read the import statement whose `import` keyword sits at `start`.
 *
 * The statement ends at `;`, after the module string of a `from` clause or a
 * side-effect import, or at the first token that cannot continue it.
 */
export const readImport = (
  tokens: readonly Token[],
  start: number
): ImportStatement => {
  const entries: (readonly [string, string])[] = [];
  let current = "";
  let alias: string | undefined;
  let expectingAlias = false;
  let starAlias: string | undefined;
  let end = start;

  const flush = (): void => {
    if (current && current !== "*") {
      entries.push([lastSegment(current), current]);
    }
    current = "";
  };

  const finish = (module?: string): void => {
    if (alias !== undefined) {
      if (module !== undefined) {
        entries.push([alias, module]);
      } else if (current) {
        entries.push([alias, current]);
      }
      current = "";
    } else {
      flush();
    }
    if (starAlias !== undefined && module !== undefined) {
      entries.push([starAlias, module]);
    }
  };

  for (let i = nextIndex(tokens, start); i < tokens.length; i = nextIndex(tokens, i)) {
    const token = tokens[i];
    if (token === undefined) {
      break;
    }
    end = i;

    if (token.type === "opaque") {
      if (token.text === ";") {
        finish();
        return { entries, end };
      }
      if (token.text === "{" || token.text === "}" || token.text === ",") {
        flush();
        continue;
      }
      // `(` after `require`; anything else ends a malformed statement
      if (token.text === "(" && alias !== undefined && current === "require") {
        current = "";
        continue;
      }
      if (token.text === ")") {
        continue;
      }
      finish();
      return { entries, end: i - 1 };
    }

    if (expectingAlias) {
      expectingAlias = false;
      if (isNameToken(token)) {
        if (current === "*") {
          starAlias = token.text;
        } else if (current) {
          entries.push([token.text, current]);
        }
        current = "";
        continue;
      }
    }

    switch (token.kind) {
      case ts.SyntaxKind.StringLiteral:
      case ts.SyntaxKind.NoSubstitutionTemplateLiteral:
        finish(literalValue(token.text));
        return { entries, end: closeRequire(tokens, i, alias) };
      case ts.SyntaxKind.AsteriskToken:
        flush();
        current = "*";
        continue;
      case ts.SyntaxKind.DotToken:
        current += ".";
        continue;
      case ts.SyntaxKind.EqualsToken:
        alias = current;
        current = "";
        continue;
      case ts.SyntaxKind.AsKeyword:
        expectingAlias = true;
        continue;
      case ts.SyntaxKind.FromKeyword:
        if (isKind(tokens[nextIndex(tokens, i)], ts.SyntaxKind.StringLiteral)) {
          flush();
          continue;
        }
        break;
      case ts.SyntaxKind.TypeKeyword:
        if (current === "" && isModifierPosition(tokens, i)) {
          continue;
        }
        break;
    }

    if (!isNameToken(token)) {
      finish();
      return { entries, end: i - 1 };
    }

    if (current.endsWith(".")) {
      current += token.text;
    } else {
      flush();
      current = token.text;
    }
  }

  finish();
  return { entries, end };
};

// `type` is a modifier when a name or `{` follows it
const isModifierPosition = (tokens: readonly Token[], index: number): boolean => {
  const next = tokens[nextIndex(tokens, index)];
  return (
    next !== undefined &&
    (isOpaque(next, "{") ||
      (isNameToken(next) && !isKind(next, ts.SyntaxKind.FromKeyword)) ||
      isKind(next, ts.SyntaxKind.AsteriskToken))
  );
};

// Step over the `)` that closes `import x = require("m")`
const closeRequire = (
  tokens: readonly Token[],
  index: number,
  alias: string | undefined
): number => {
  if (alias === undefined) {
    return index;
  }
  const next = nextIndex(tokens, index);
  const token = tokens[next];
  return token !== undefined && isOpaque(token, ")") ? next : index;
};
