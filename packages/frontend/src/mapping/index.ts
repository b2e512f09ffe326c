/**
 * Mapping - Public API
 */

export type { LoaderOptions, ResolvedOptions } from "./options.js";
export {
  DEFAULT_OPTIONS,
  normalizeExtensions,
  resolveOptions,
  fingerprintOptions,
} from "./options.js";
export type { DeclarationMap } from "./types.js";
export { MappingBuilder, checkRoot, cacheKey } from "./builder.js";
