/**
 * Data-table rendering
 */

import type { DeclarationMap } from "@declmap/frontend";

/**
 * Identifier to absolute path, in traversal order. Paths are never made
 * relative here; only generated loader source travels with the tree.
 */
export const renderTable = (map: DeclarationMap): Record<string, string> => {
  const table: Record<string, string> = {};
  for (const [identifier, file] of map.symbols) {
    table[identifier] = file;
  }
  return table;
};

/**
 * The table as pretty-printed JSON with a trailing newline
 */
export const renderTableJson = (map: DeclarationMap): string =>
  `${JSON.stringify(renderTable(map), null, 2)}\n`;
