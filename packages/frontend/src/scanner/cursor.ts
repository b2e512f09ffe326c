/**
 * Token navigation helpers that step over whitespace and comments
 */

import * as ts from "typescript";
import { isKind, isTrivia, type Token } from "./tokenizer.js";

/**
 * Index of the first non-trivia token after `from` (tokens.length if none)
 */
export const nextIndex = (tokens: readonly Token[], from: number): number => {
  let i = from + 1;
  while (i < tokens.length) {
    const token = tokens[i];
    if (token !== undefined && !isTrivia(token)) {
      return i;
    }
    i++;
  }
  return tokens.length;
};

/**
 * Index of the last non-trivia token before `from` (-1 if none)
 */
export const previousIndex = (
  tokens: readonly Token[],
  from: number
): number => {
  let i = from - 1;
  while (i >= 0) {
    const token = tokens[i];
    if (token !== undefined && !isTrivia(token)) {
      return i;
    }
    i--;
  }
  return -1;
};

/**
 * True when the token before `index` is `.` or `?.` (a property name such
 * as `node.class` or `module.exports`, never a declaration)
 */
export const followsMemberAccess = (
  tokens: readonly Token[],
  index: number
): boolean => {
  const previous = tokens[previousIndex(tokens, index)];
  return (
    isKind(previous, ts.SyntaxKind.DotToken) ||
    isKind(previous, ts.SyntaxKind.QuestionDotToken)
  );
};

/**
 * Unquoted value of a string literal token's text
 */
export const literalValue = (text: string): string =>
  text.length >= 2 ? text.slice(1, -1) : "";
