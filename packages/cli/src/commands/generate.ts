/**
 * declmap generate command - render a standalone loader module
 */

import { dirname } from "node:path";
import { formatDiagnostic } from "@declmap/frontend";
import { DeclarationLoader } from "@declmap/loader";
import { createCliSink } from "../cli/reporter.js";
import type { ResolvedConfig, Result } from "../types.js";
import { writeOutput } from "./output.js";

export const generateCommand = (
  config: ResolvedConfig,
  directory: string,
  loader: DeclarationLoader = new DeclarationLoader({
    report: createCliSink(config),
  }),
  generatedAt: Date = new Date()
): Result<void, string> => {
  // Relative paths are computed from where the file will live
  const artifactDirectory =
    config.output === undefined ? undefined : dirname(config.output);

  const source = loader.render(directory, {
    ...config.options,
    generatedAt,
    artifactDirectory,
  });
  if (!source.ok) {
    return { ok: false, error: formatDiagnostic(source.error) };
  }
  return writeOutput(config, source.value);
};
