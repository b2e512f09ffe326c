import * as fs from "node:fs";
import * as path from "node:path";
import { attempt } from "@declmap/frontend";

/**
 * `directory` with symlinks resolved. The part that does not exist yet is
 * kept as written on top of its nearest existing ancestor.
 */
export const canonicalDirectory = (directory: string): string => {
  const missing: string[] = [];
  let current = path.resolve(directory);
  for (;;) {
    const real = attempt(() => fs.realpathSync(current));
    if (real.ok) {
      return path.join(real.value, ...missing.reverse());
    }
    const parent = path.dirname(current);
    if (parent === current) {
      return path.resolve(directory);
    }
    missing.push(path.basename(current));
    current = parent;
  }
};
