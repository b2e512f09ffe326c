/**
 * declmap map command - print the identifier-to-file table
 */

import { formatDiagnostic } from "@declmap/frontend";
import { DeclarationLoader } from "@declmap/loader";
import { createCliSink } from "../cli/reporter.js";
import type { ResolvedConfig, Result } from "../types.js";
import { writeOutput } from "./output.js";

export const mapCommand = (
  config: ResolvedConfig,
  directory: string,
  loader: DeclarationLoader = new DeclarationLoader({
    report: createCliSink(config),
  })
): Result<void, string> => {
  const table = loader.renderTable(directory, config.options);
  if (!table.ok) {
    return { ok: false, error: formatDiagnostic(table.error) };
  }

  if (config.verbose && !config.quiet) {
    console.warn(
      `Mapped ${Object.keys(table.value).length} declarations in ${directory}`
    );
  }
  return writeOutput(config, `${JSON.stringify(table.value, null, 2)}\n`);
};
