/**
 * Declaration map types
 */

/**
 * Result of scanning one directory tree
 */
export type DeclarationMap = {
  /** Canonical root that was scanned */
  readonly directory: string;
  /**
   * Qualified type name to canonical file path, in traversal order.
   * A name declared by several files maps to the last one scanned.
   */
  readonly symbols: ReadonlyMap<string, string>;
  /** Files without type declarations (only collected with `includeStatic`) */
  readonly staticFiles: readonly string[];
};

