/**
 * Shared constants for the loader emitter
 */

/**
 * `Symbol.for` key of the process-wide resolver list shared by generated
 * loaders and live registrations
 */
export const RESOLVER_REGISTRY_KEY = "declmap.resolvers";

/**
 * Prefix of every generated loader's duplicate-registration marker
 */
export const MARKER_PREFIX = "declmap";

/**
 * `YYYY-MM-DD HH:MM:SS` in UTC
 */
export const formatTimestamp = (date: Date): string =>
  date.toISOString().slice(0, 19).replace("T", " ");

export type HeaderSummary = {
  readonly generatedAt: Date;
  readonly symbolCount: number;
  readonly caseSensitive: boolean;
  readonly prepend: boolean;
  readonly relative: boolean;
};

const yesNo = (value: boolean): string => (value ? "yes" : "no");

/**
 * Generate the standard header for emitted loader files
 *
 * @returns Multi-line comment block with trailing newline
 */
export const generateFileHeader = (summary: HeaderSummary): string => {
  const lines: string[] = [];

  lines.push("/**");
  lines.push(" * Declaration loader");
  lines.push(` * Generated at: ${formatTimestamp(summary.generatedAt)}`);
  lines.push(` * Total symbols: ${summary.symbolCount}`);
  lines.push(` * Case insensitive: ${yesNo(!summary.caseSensitive)}`);
  lines.push(` * Prepend: ${yesNo(summary.prepend)}`);
  lines.push(` * Relative paths: ${yesNo(summary.relative)}`);
  lines.push(" *");
  lines.push(" * WARNING: Do not modify this file manually");
  lines.push(" * @generated");
  lines.push(" */");
  lines.push("");

  return lines.join("\n");
};
