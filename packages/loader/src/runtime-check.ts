/**
 * Host runtime version check
 */

export const MINIMUM_NODE_MAJOR = 20;

export class UnsupportedRuntimeError extends Error {
  readonly version: string;

  constructor(version: string) {
    super(
      `Node.js ${MINIMUM_NODE_MAJOR} or newer is required (running ${version})`
    );
    this.name = "UnsupportedRuntimeError";
    this.version = version;
  }
}

const verdicts = new Map<string, boolean>();

/**
 * Major version of a `process.versions.node` style string (NaN if malformed)
 */
export const majorVersion = (version: string): number =>
  Number.parseInt(version.replace(/^v/, "").split(".")[0] ?? "", 10);

/**
 * Throw UnsupportedRuntimeError on runtimes older than the minimum.
 * The verdict for each version string is computed once.
 */
export const ensureSupportedRuntime = (
  version: string = process.versions.node
): void => {
  let supported = verdicts.get(version);
  if (supported === undefined) {
    supported = majorVersion(version) >= MINIMUM_NODE_MAJOR;
    verdicts.set(version, supported);
  }
  if (!supported) {
    throw new UnsupportedRuntimeError(version);
  }
};
