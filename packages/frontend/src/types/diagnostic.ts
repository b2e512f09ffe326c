/**
 * Diagnostic types for declaration scanning and loading
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  | "DCM1001" // Root directory not found
  | "DCM1002" // Root directory not readable
  | "DCM1003" // No declarations found
  | "DCM2001" // Subdirectory could not be read
  | "DCM2002" // Source file could not be read
  | "DCM2003" // Source file could not be tokenized
  | "DCM3001" // Resolver registration rejected by host
  | "DCM3002" // Module failed to load during resolution
  | "DCM4001"; // Invalid generated loader name

export type SourceLocation = {
  readonly file: string;
  readonly line: number;
  readonly column: number;
  readonly length: number;
};

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly location?: SourceLocation;
  readonly hint?: string;
};

/**
 * Receives advisory diagnostics as they are produced.
 */
export type DiagnosticSink = (diagnostic: Diagnostic) => void;

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  location?: SourceLocation,
  hint?: string
): Diagnostic => ({
  code,
  severity,
  message,
  location,
  hint,
});

export const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.location) {
    parts.push(
      `${diagnostic.location.file}:${diagnostic.location.line}:${diagnostic.location.column}`
    );
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};

/**
 * Default sink: one formatted line per diagnostic on stderr
 */
export const consoleSink: DiagnosticSink = (diagnostic) => {
  console.warn(formatDiagnostic(diagnostic));
};

/**
 * Sink that drops everything (used by quiet CLI runs)
 */
export const silentSink: DiagnosticSink = () => undefined;

/**
 * Sink that appends to the given array
 */
export const collectInto = (
  diagnostics: Diagnostic[]
): DiagnosticSink => {
  return (diagnostic) => {
    diagnostics.push(diagnostic);
  };
};
