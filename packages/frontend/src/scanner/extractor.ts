/**
 * Declaration extractor
 *
 * A single forward pass over the token list that tracks brace depth, the
 * enclosing namespaces and the import aliases in effect, and records every
 * named class, interface, enum and type alias declared at namespace level.
 */

import * as ts from "typescript";
import { isKind, isNameToken, isOpaque, type Token } from "./tokenizer.js";
import { followsMemberAccess, nextIndex, previousIndex } from "./cursor.js";
import { readImport, startsImportStatement } from "./imports.js";
import { readNamespaceHeader } from "./namespaces.js";

export type DeclarationKind = "class" | "interface" | "enum" | "type";

export type DeclaredSymbol = {
  /** Namespace-qualified name, e.g. `Shapes.Circle` */
  readonly name: string;
  readonly simpleName: string;
  readonly kind: DeclarationKind;
  /** Offset of the declaring keyword */
  readonly position: number;
};

export type Extraction = {
  readonly symbols: readonly DeclaredSymbol[];
  /** Import aliases in effect at the end of input */
  readonly aliases: ReadonlyMap<string, string>;
};

export const NAMESPACE_SEPARATOR = ".";

type NamespaceFrame = {
  readonly name: string;
  /** Brace depth inside the namespace body */
  readonly depth: number;
  readonly ambient: boolean;
};

const DECLARATION_KINDS: ReadonlyMap<ts.SyntaxKind, DeclarationKind> = new Map([
  [ts.SyntaxKind.ClassKeyword, "class"],
  [ts.SyntaxKind.InterfaceKeyword, "interface"],
  [ts.SyntaxKind.EnumKeyword, "enum"],
  [ts.SyntaxKind.TypeKeyword, "type"],
]);

// Tokens after which `class` starts a class expression
const EXPRESSION_CONTEXT_KINDS: ReadonlySet<ts.SyntaxKind> = new Set([
  ts.SyntaxKind.EqualsToken,
  ts.SyntaxKind.ColonToken,
  ts.SyntaxKind.QuestionToken,
  ts.SyntaxKind.EqualsGreaterThanToken,
  ts.SyntaxKind.BarBarToken,
  ts.SyntaxKind.AmpersandAmpersandToken,
  ts.SyntaxKind.QuestionQuestionToken,
  ts.SyntaxKind.ReturnKeyword,
  ts.SyntaxKind.YieldKeyword,
]);

const inExpressionContext = (token: Token | undefined): boolean =>
  token !== undefined &&
  (token.type === "opaque"
    ? isOpaque(token, "(") || isOpaque(token, "[") || isOpaque(token, ",")
    : EXPRESSION_CONTEXT_KINDS.has(token.kind));

/**
 * Index of the declared name when the keyword at `index` declares a named
 * type, otherwise undefined
 */
const declaredNameIndex = (
  tokens: readonly Token[],
  index: number,
  kind: DeclarationKind
): number | undefined => {
  const previous = tokens[previousIndex(tokens, index)];
  // `new class { }` is anonymous
  if (isKind(previous, ts.SyntaxKind.NewKeyword)) {
    return undefined;
  }
  if (followsMemberAccess(tokens, index) || inExpressionContext(previous)) {
    return undefined;
  }

  const nameIndex = nextIndex(tokens, index);
  if (!isNameToken(tokens[nameIndex])) {
    return undefined;
  }
  if (kind === "type") {
    const after = tokens[nextIndex(tokens, nameIndex)];
    if (
      !isKind(after, ts.SyntaxKind.EqualsToken) &&
      !isKind(after, ts.SyntaxKind.LessThanToken)
    ) {
      return undefined;
    }
  }
  return nameIndex;
};

/**
 * Extract the named type declarations of one file
 */
export const extractDeclarations = (tokens: readonly Token[]): Extraction => {
  const symbols: DeclaredSymbol[] = [];
  const seen = new Set<string>();
  const frames: NamespaceFrame[] = [];
  let fileNamespace = "";
  let aliases = new Map<string, string>();
  let depth = 0;
  let bodyDepth: number | undefined;
  let bodyPending = false;

  const innermost = (): NamespaceFrame | undefined => frames[frames.length - 1];

  const namespaceLevel = (): number => innermost()?.depth ?? 0;

  const currentNamespace = (): string =>
    [fileNamespace, ...frames.map((frame) => frame.name)]
      .filter((segment) => segment !== "")
      .join(NAMESPACE_SEPARATOR);

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (token === undefined) {
      break;
    }

    if (token.type === "opaque") {
      if (token.text === "{") {
        depth++;
        if (bodyPending) {
          bodyPending = false;
          bodyDepth = depth;
        }
      } else if (token.text === "}") {
        depth--;
        if (bodyDepth !== undefined && depth < bodyDepth) {
          bodyDepth = undefined;
        }
        let frame = innermost();
        while (frame !== undefined && depth < frame.depth) {
          frames.pop();
          aliases = new Map();
          frame = innermost();
        }
      }
      continue;
    }

    if (
      isKind(token, ts.SyntaxKind.NamespaceKeyword) ||
      isKind(token, ts.SyntaxKind.ModuleKeyword)
    ) {
      const header = readNamespaceHeader(tokens, i);
      if (header === undefined) {
        continue;
      }
      aliases = new Map();
      if (header.form === "file") {
        fileNamespace = header.name;
        i = header.end;
      } else {
        frames.push({
          name: header.form === "block" ? header.name : "",
          depth: depth + 1,
          ambient: header.form === "ambient",
        });
        // the opening brace is counted on the next iteration
        i = header.open - 1;
      }
      continue;
    }

    if (isKind(token, ts.SyntaxKind.ImportKeyword)) {
      if (
        bodyDepth === undefined &&
        !followsMemberAccess(tokens, i) &&
        startsImportStatement(tokens, i)
      ) {
        const statement = readImport(tokens, i);
        for (const [alias, target] of statement.entries) {
          aliases.set(alias, target);
        }
        i = statement.end;
      }
      continue;
    }

    const kind = DECLARATION_KINDS.get(token.kind);
    if (kind === undefined) {
      continue;
    }
    const nameIndex = declaredNameIndex(tokens, i, kind);
    const nameToken = nameIndex === undefined ? undefined : tokens[nameIndex];
    if (nameIndex === undefined || nameToken === undefined) {
      continue;
    }

    const atNamespaceLevel =
      depth === namespaceLevel() && !frames.some((frame) => frame.ambient);
    if (atNamespaceLevel) {
      const namespace = currentNamespace();
      const name = namespace
        ? `${namespace}${NAMESPACE_SEPARATOR}${nameToken.text}`
        : nameToken.text;
      if (!seen.has(name)) {
        seen.add(name);
        symbols.push({
          name,
          simpleName: nameToken.text,
          kind,
          position: token.position,
        });
      }
    }
    if (kind !== "type" && bodyDepth === undefined) {
      bodyPending = true;
    }
    i = nameIndex;
  }

  return { symbols, aliases };
};

/**
 * Qualified names declared in a file, in declaration order
 */
export const declaredNames = (tokens: readonly Token[]): readonly string[] =>
  extractDeclarations(tokens).symbols.map((symbol) => symbol.name);
