/**
 * Tree walker - Public API
 */

export type { WalkOptions } from "./tree-walker.js";
export { walkTree, extensionOf } from "./tree-walker.js";
export type { ExclusionMatcher } from "./exclusion.js";
export { createExclusionMatcher, toPosixPath } from "./exclusion.js";
