/**
 * Scanner - Public API
 */

export type {
  SignificantToken,
  OpaqueToken,
  Token,
  TokenizeOptions,
} from "./tokenizer.js";
export {
  tokenize,
  isTrivia,
  isOpaque,
  isKind,
  isNameToken,
} from "./tokenizer.js";
export type {
  DeclarationKind,
  DeclaredSymbol,
  Extraction,
} from "./extractor.js";
export {
  extractDeclarations,
  declaredNames,
  NAMESPACE_SEPARATOR,
} from "./extractor.js";
export type { ImportStatement } from "./imports.js";
export { readImport } from "./imports.js";
export type { NamespaceHeader } from "./namespaces.js";
export { readNamespaceHeader } from "./namespaces.js";
export type { FileClassification } from "./classifier.js";
export { classifyFile, isStaticFile } from "./classifier.js";
