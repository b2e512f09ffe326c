/**
 * Diagnostic sink for command-line runs
 */

import { type DiagnosticSink, formatDiagnostic } from "@declmap/frontend";

/**
 * Errors come back to the dispatcher as results, so the sink only prints
 * warnings (unless quiet) and info (when verbose).
 */
export const createCliSink =
  (settings: { readonly verbose: boolean; readonly quiet: boolean }): DiagnosticSink =>
  (diagnostic) => {
    switch (diagnostic.severity) {
      case "error":
        return;
      case "warning":
        if (!settings.quiet) {
          console.warn(formatDiagnostic(diagnostic));
        }
        return;
      case "info":
        if (settings.verbose && !settings.quiet) {
          console.warn(formatDiagnostic(diagnostic));
        }
        return;
    }
  };
