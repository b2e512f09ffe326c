/**
 * Tokenizer adapter over the TypeScript scanner
 *
 * Produces a flat token list for the declaration extractor. No syntax tree
 * is built; the only context tracked here is what the scanner itself needs
 * to avoid misreading template literals and regular expressions.
 */

import * as ts from "typescript";

export type SignificantToken = {
  readonly type: "significant";
  readonly kind: ts.SyntaxKind;
  readonly text: string;
  readonly position: number;
};

/**
 * Single-character structural token: `{ } ; ( ) [ ] ,`
 */
export type OpaqueToken = {
  readonly type: "opaque";
  readonly text: string;
  readonly position: number;
};

export type Token = SignificantToken | OpaqueToken;

const OPAQUE_KINDS: ReadonlySet<ts.SyntaxKind> = new Set([
  ts.SyntaxKind.OpenBraceToken,
  ts.SyntaxKind.CloseBraceToken,
  ts.SyntaxKind.SemicolonToken,
  ts.SyntaxKind.OpenParenToken,
  ts.SyntaxKind.CloseParenToken,
  ts.SyntaxKind.OpenBracketToken,
  ts.SyntaxKind.CloseBracketToken,
  ts.SyntaxKind.CommaToken,
]);

const TRIVIA_KINDS: ReadonlySet<ts.SyntaxKind> = new Set([
  ts.SyntaxKind.WhitespaceTrivia,
  ts.SyntaxKind.NewLineTrivia,
  ts.SyntaxKind.SingleLineCommentTrivia,
  ts.SyntaxKind.MultiLineCommentTrivia,
  ts.SyntaxKind.ShebangTrivia,
  ts.SyntaxKind.ConflictMarkerTrivia,
]);

// Tokens after which `/` divides instead of starting a regular expression
const EXPRESSION_END_KINDS: ReadonlySet<ts.SyntaxKind> = new Set([
  ts.SyntaxKind.Identifier,
  ts.SyntaxKind.PrivateIdentifier,
  ts.SyntaxKind.NumericLiteral,
  ts.SyntaxKind.BigIntLiteral,
  ts.SyntaxKind.StringLiteral,
  ts.SyntaxKind.RegularExpressionLiteral,
  ts.SyntaxKind.NoSubstitutionTemplateLiteral,
  ts.SyntaxKind.TemplateTail,
  ts.SyntaxKind.CloseParenToken,
  ts.SyntaxKind.CloseBracketToken,
  ts.SyntaxKind.PlusPlusToken,
  ts.SyntaxKind.MinusMinusToken,
  ts.SyntaxKind.ThisKeyword,
  ts.SyntaxKind.SuperKeyword,
  ts.SyntaxKind.TrueKeyword,
  ts.SyntaxKind.FalseKeyword,
  ts.SyntaxKind.NullKeyword,
]);

// Keywords whose parenthesized header is followed by a statement
const CONTROL_HEADER_KINDS: ReadonlySet<ts.SyntaxKind> = new Set([
  ts.SyntaxKind.IfKeyword,
  ts.SyntaxKind.WhileKeyword,
  ts.SyntaxKind.ForKeyword,
  ts.SyntaxKind.WithKeyword,
]);

export const isTrivia = (token: Token): boolean =>
  token.type === "significant" && TRIVIA_KINDS.has(token.kind);

export const isOpaque = (token: Token, text: string): boolean =>
  token.type === "opaque" && token.text === text;

export const isKind = (token: Token | undefined, kind: ts.SyntaxKind): boolean =>
  token !== undefined && token.type === "significant" && token.kind === kind;

/**
 * Contextual keywords (`type`, `namespace`, `as`, ...) may also be names
 */
export const isContextualKeyword = (kind: ts.SyntaxKind): boolean =>
  kind >= ts.SyntaxKind.FirstContextualKeyword &&
  kind <= ts.SyntaxKind.LastContextualKeyword;

export const isNameToken = (token: Token | undefined): boolean =>
  token !== undefined &&
  token.type === "significant" &&
  (token.kind === ts.SyntaxKind.Identifier || isContextualKeyword(token.kind));

const endsExpression = (kind: ts.SyntaxKind | undefined): boolean =>
  kind !== undefined &&
  (EXPRESSION_END_KINDS.has(kind) || isContextualKeyword(kind));

export type TokenizeOptions = {
  /** Scan JSX syntax (`.tsx` and `.jsx` sources) */
  readonly jsx?: boolean;
};

/**
 * Tokenize source text. Binary content, or anything the scanner cannot
 * get through, yields an empty list.
 */
export const tokenize = (
  content: string,
  options: TokenizeOptions = {}
): readonly Token[] => {
  if (content.includes("\u0000")) {
    return [];
  }

  try {
    return scanTokens(content, options.jsx ?? false);
  } catch {
    return [];
  }
};

const scanTokens = (content: string, jsx: boolean): readonly Token[] => {
  const scanner = ts.createScanner(
    ts.ScriptTarget.Latest,
    false,
    jsx ? ts.LanguageVariant.JSX : ts.LanguageVariant.Standard,
    content
  );

  const tokens: Token[] = [];
  // Brace depths at which an open `${` substitution resumes its template
  const templates: number[] = [];
  // One entry per open `(`: true when it opens an `if`/`while`/`for`/`with` header
  const parens: boolean[] = [];
  let depth = 0;
  let previous: ts.SyntaxKind | undefined;
  // `for await (` keeps the `for` in view
  let beforePrevious: ts.SyntaxKind | undefined;

  for (
    let kind = scanner.scan();
    kind !== ts.SyntaxKind.EndOfFileToken;
    kind = scanner.scan()
  ) {
    if (
      kind === ts.SyntaxKind.CloseBraceToken &&
      templates.length > 0 &&
      templates[templates.length - 1] === depth
    ) {
      kind = scanner.reScanTemplateToken(false);
      if (kind === ts.SyntaxKind.TemplateTail) {
        templates.pop();
      }
    } else if (
      (kind === ts.SyntaxKind.SlashToken ||
        kind === ts.SyntaxKind.SlashEqualsToken) &&
      !endsExpression(previous)
    ) {
      kind = scanner.reScanSlashToken();
    }

    const text = scanner.getTokenText();
    const position = scanner.getTokenStart();

    // After a control header a statement starts, so `/` opens a regex there
    let endsControlHeader = false;

    if (OPAQUE_KINDS.has(kind)) {
      if (kind === ts.SyntaxKind.OpenBraceToken) {
        depth++;
      } else if (kind === ts.SyntaxKind.CloseBraceToken) {
        depth--;
      } else if (kind === ts.SyntaxKind.OpenParenToken) {
        parens.push(
          (previous !== undefined && CONTROL_HEADER_KINDS.has(previous)) ||
            (previous === ts.SyntaxKind.AwaitKeyword &&
              beforePrevious === ts.SyntaxKind.ForKeyword)
        );
      } else if (kind === ts.SyntaxKind.CloseParenToken) {
        endsControlHeader = parens.pop() ?? false;
      }
      tokens.push({ type: "opaque", text, position });
    } else {
      if (kind === ts.SyntaxKind.TemplateHead) {
        templates.push(depth);
      }
      tokens.push({ type: "significant", kind, text, position });
    }

    if (!TRIVIA_KINDS.has(kind)) {
      beforePrevious = previous;
      previous = endsControlHeader ? undefined : kind;
    }
  }

  return tokens;
};
