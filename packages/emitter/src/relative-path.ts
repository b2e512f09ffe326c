/**
 * Pure path arithmetic for artifact-relative file references
 */

import * as path from "node:path";

const segmentsOf = (value: string): string[] =>
  path.posix
    .normalize(value.replace(/\\/g, "/"))
    .split("/")
    .filter((segment) => segment !== "" && segment !== ".");

/**
 * Path of `target` relative to the directory `base`, always starting with
 * `/` so it can be appended to the artifact's own directory.
 *
 * @example
 * relativePathFrom("/srv/app", "/srv/app/models/user.ts") // "/models/user.ts"
 * relativePathFrom("/srv/app/gen", "/srv/app/user.ts")     // "/../user.ts"
 */
export const relativePathFrom = (base: string, target: string): string => {
  const baseSegments = segmentsOf(base);
  const targetSegments = segmentsOf(target);
  const fileName = targetSegments.pop() ?? "";

  let common = 0;
  while (
    common < baseSegments.length &&
    common < targetSegments.length &&
    baseSegments[common] === targetSegments[common]
  ) {
    common++;
  }

  const parts = [
    ...baseSegments.slice(common).map(() => ".."),
    ...targetSegments.slice(common),
    fileName,
  ];
  return `/${parts.join("/")}`;
};
