/**
 * Type definitions for live declaration loading
 */

import type { DeclarationMap } from "@declmap/frontend";

/**
 * Asked for an identifier the host could not find. Returns true once the
 * defining file has been loaded.
 */
export type Resolver = (identifier: string) => boolean;

/**
 * Proof of one registration, handed back to unregister it
 */
export type RegistrationHandle = {
  readonly resolver: Resolver;
};

/**
 * The host's list of resolvers
 */
export type ResolverHost = {
  /** Returns undefined when the host refuses the resolver */
  register(
    resolver: Resolver,
    prepend: boolean
  ): RegistrationHandle | undefined;
  /** Returns false when the handle is no longer registered */
  unregister(handle: RegistrationHandle): boolean;
  resolve(identifier: string): boolean;
};

/**
 * Loads one file into the running process. Throws when loading fails.
 */
export type ModuleLoader = (file: string) => void;

/**
 * One successful activation
 */
export type LoaderRecord = {
  readonly directory: string;
  readonly handle: RegistrationHandle;
  readonly map: DeclarationMap;
};

export type ActiveLoader = {
  readonly directory: string;
  readonly symbolCount: number;
};
