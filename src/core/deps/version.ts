/**
 * Runtime version parsing and range checks.
 */

export interface ParsedVersion {
  major: number;
  minor: number;
  patch: number;
}

/**
 * Inclusive supported range: `minimum` or above, and at most `maxMajor`.x when set.
 */
export interface VersionRange {
  minimum: string;
  maxMajor?: number;
}

/**
 * Parse "v20.11.1", "20.11" or "20" into its numeric parts.
 * Returns null for anything else.
 */
export function parseVersion(raw: string): ParsedVersion | null {
  const match = /^v?(\d+)(?:\.(\d+))?(?:\.(\d+))?/.exec(raw.trim());
  if (!match) {
    return null;
  }
  return {
    major: Number(match[1]),
    minor: match[2] === undefined ? 0 : Number(match[2]),
    patch: match[3] === undefined ? 0 : Number(match[3]),
  };
}

export function compareVersions(a: ParsedVersion, b: ParsedVersion): number {
  return a.major - b.major || a.minor - b.minor || a.patch - b.patch;
}

export function isVersionInRange(version: ParsedVersion, range: VersionRange): boolean {
  const minimum = parseVersion(range.minimum);
  if (!minimum) {
    throw new Error(`Invalid minimum version: ${range.minimum}`);
  }
  if (compareVersions(version, minimum) < 0) {
    return false;
  }
  return range.maxMajor === undefined || version.major <= range.maxMajor;
}

/**
 * Human-readable description, e.g. "20.11.1 or above, up to 24.x".
 */
export function describeRange(range: VersionRange): string {
  const base = `${range.minimum} or above`;
  return range.maxMajor === undefined ? base : `${base}, up to ${range.maxMajor}.x`;
}
