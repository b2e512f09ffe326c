/**
 * Process-wide default loader and its convenience functions
 */

import type {
  DeclarationMap,
  Diagnostic,
  LoaderOptions,
  Result,
} from "@declmap/frontend";
import { DeclarationLoader, type RenderOptions } from "./declaration-loader.js";
import type { ActiveLoader } from "./types.js";

export const defaultLoader = new DeclarationLoader();

export const activate = (
  directory: string,
  options?: LoaderOptions
): boolean => defaultLoader.activate(directory, options);

export const generateLoader = (
  directory: string,
  options?: RenderOptions
): Result<string, Diagnostic> => defaultLoader.render(directory, options);

export const generateLoaderTable = (
  directory: string,
  options?: LoaderOptions
): Result<Record<string, string>, Diagnostic> =>
  defaultLoader.renderTable(directory, options);

export const buildDeclarationMap = (
  directory: string,
  options?: LoaderOptions
): Result<DeclarationMap, Diagnostic> =>
  defaultLoader.buildMap(directory, options);

export const listActiveLoaders = (): readonly ActiveLoader[] =>
  defaultLoader.listActive();

export const clearLoaderCache = (): void => defaultLoader.clearCache();

export const unregisterAllLoaders = (): number => defaultLoader.unregisterAll();

export const resolveSymbol = (identifier: string): boolean =>
  defaultLoader.resolve(identifier);
