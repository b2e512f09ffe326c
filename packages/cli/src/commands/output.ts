/**
 * Shared output handling for map and generate
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { attempt } from "@declmap/frontend";
import type { ResolvedConfig, Result } from "../types.js";

/**
 * Write `content` to the configured output file, or stdout when none is set
 */
export const writeOutput = (
  config: ResolvedConfig,
  content: string
): Result<void, string> => {
  const output = config.output;
  if (output === undefined) {
    process.stdout.write(content);
    return { ok: true, value: undefined };
  }

  const written = attempt(() => {
    mkdirSync(dirname(output), { recursive: true });
    writeFileSync(output, content, "utf-8");
  });
  if (!written.ok) {
    return { ok: false, error: `Failed to write ${output}: ${written.error}` };
  }
  if (config.verbose && !config.quiet) {
    console.log(`Wrote ${output}`);
  }
  return written;
};
