/**
 * Namespace header reader
 */

import * as ts from "typescript";
import { isKind, isNameToken, isOpaque, type Token } from "./tokenizer.js";
import { followsMemberAccess, nextIndex, previousIndex } from "./cursor.js";

export type NamespaceHeader =
  /** `namespace A.B {` */
  | { readonly form: "block"; readonly name: string; readonly open: number }
  /** `namespace A.B;` */
  | { readonly form: "file"; readonly name: string; readonly end: number }
  /** `declare module "m" {` */
  | { readonly form: "ambient"; readonly open: number };

/**
 * True for a `namespace` or `module` keyword in declaration position.
 * Property access (`module.exports`, `x.namespace`) and the UMD global form
 * `export as namespace X;` are not namespace declarations.
 */
export const isNamespaceKeyword = (
  tokens: readonly Token[],
  index: number
): boolean => {
  const token = tokens[index];
  if (
    !isKind(token, ts.SyntaxKind.NamespaceKeyword) &&
    !isKind(token, ts.SyntaxKind.ModuleKeyword)
  ) {
    return false;
  }
  if (followsMemberAccess(tokens, index)) {
    return false;
  }
  return !isKind(tokens[previousIndex(tokens, index)], ts.SyntaxKind.AsKeyword);
};

/**
 * Read the header that starts with the keyword at `index`, or undefined when
 * the keyword is not followed by a name and a `{` or `;`
 */
export const readNamespaceHeader = (
  tokens: readonly Token[],
  index: number
): NamespaceHeader | undefined => {
  if (!isNamespaceKeyword(tokens, index)) {
    return undefined;
  }

  const first = nextIndex(tokens, index);
  const firstToken = tokens[first];
  if (isKind(firstToken, ts.SyntaxKind.StringLiteral)) {
    const after = nextIndex(tokens, first);
    const afterToken = tokens[after];
    return afterToken !== undefined && isOpaque(afterToken, "{")
      ? { form: "ambient", open: after }
      : undefined;
  }
  if (!isNameToken(firstToken)) {
    return undefined;
  }

  const segments: string[] = [];
  let expectingName = true;
  for (let i = first; i < tokens.length; i = nextIndex(tokens, i)) {
    const token = tokens[i];
    if (token === undefined) {
      break;
    }
    if (expectingName && isNameToken(token)) {
      segments.push(token.text);
      expectingName = false;
    } else if (!expectingName && isKind(token, ts.SyntaxKind.DotToken)) {
      expectingName = true;
    } else if (!expectingName && isOpaque(token, "{")) {
      return { form: "block", name: segments.join("."), open: i };
    } else if (!expectingName && isOpaque(token, ";")) {
      return { form: "file", name: segments.join("."), end: i };
    } else {
      return undefined;
    }
  }
  return undefined;
};
