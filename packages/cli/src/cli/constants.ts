/**
 * CLI constants
 */

import { createRequire } from "node:module";

const require = createRequire(import.meta.url);

const readVersion = (manifest: unknown): string => {
  const version: unknown =
    typeof manifest === "object" && manifest !== null
      ? Reflect.get(manifest, "version")
      : undefined;
  return typeof version === "string" ? version : "0.0.0";
};

export const VERSION = readVersion(require("../../package.json"));

/** Process exit codes */
export const EXIT = {
  ok: 0,
  config: 1,
  unknownCommand: 2,
  missingDirectory: 3,
  map: 5,
  generate: 6,
} as const;
