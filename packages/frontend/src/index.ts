/**
 * declmap frontend - source tree scanning and declaration mapping
 */

export type {
  DiagnosticSeverity,
  DiagnosticCode,
  SourceLocation,
  Diagnostic,
  DiagnosticSink,
} from "./types/diagnostic.js";
export {
  createDiagnostic,
  formatDiagnostic,
  consoleSink,
  silentSink,
  collectInto,
  isError as isDiagnosticError,
} from "./types/diagnostic.js";

export * from "./types/result.js";

export * from "./walker.js";
export * from "./scanner.js";
export * from "./mapping.js";
