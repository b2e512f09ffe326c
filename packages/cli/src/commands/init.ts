/**
 * declmap init command
 */

import { writeFileSync, existsSync } from "node:fs";
import { join } from "node:path";
import { DEFAULT_OPTIONS } from "@declmap/frontend";
import { CONFIG_FILE_NAME } from "../config.js";
import type { DeclmapConfig, Result } from "../types.js";

export const STARTER_CONFIG: DeclmapConfig = {
  directory: "src",
  output: "src/autoload.cjs",
  extensions: DEFAULT_OPTIONS.extensions,
  exclude: ["node_modules/", "**/*.test.ts"],
  caseSensitive: DEFAULT_OPTIONS.caseSensitive,
  includeStatic: DEFAULT_OPTIONS.includeStatic,
  className: DEFAULT_OPTIONS.className,
};

/**
 * Write a starter declmap.json into `cwd`
 */
export const initProject = (cwd: string): Result<string, string> => {
  const configPath = join(cwd, CONFIG_FILE_NAME);
  if (existsSync(configPath)) {
    return {
      ok: false,
      error: `${CONFIG_FILE_NAME} already exists. Project is already initialized.`,
    };
  }

  try {
    writeFileSync(
      configPath,
      `${JSON.stringify(STARTER_CONFIG, null, 2)}\n`,
      "utf-8"
    );
  } catch (error) {
    return {
      ok: false,
      error: `Failed to write ${CONFIG_FILE_NAME}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
  return { ok: true, value: configPath };
};
