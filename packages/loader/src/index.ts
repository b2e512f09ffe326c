/**
 * declmap loader - live resolution of scanned declarations
 */

export type {
  Resolver,
  RegistrationHandle,
  ResolverHost,
  ModuleLoader,
  LoaderRecord,
  ActiveLoader,
} from "./types.js";

export { ResolverChain, sharedResolvers } from "./resolver-chain.js";
export { requireModule } from "./module-loader.js";
export {
  MINIMUM_NODE_MAJOR,
  UnsupportedRuntimeError,
  ensureSupportedRuntime,
  majorVersion,
} from "./runtime-check.js";
export {
  type ResolverOptions,
  createResolver,
  foldAsciiCase,
  lookupFile,
} from "./resolver.js";
export {
  type DeclarationLoaderOptions,
  type RenderOptions,
  DeclarationLoader,
} from "./declaration-loader.js";
export * from "./default-loader.js";
