/**
 * Dotted version helpers.
 *
 * Versions are packed into a single integer with three decimal digits per
 * component (major, minor, patch, build) so that comparisons are plain
 * integer comparisons. Missing or non-numeric components count as 0.
 */

const COMPONENTS = 4;

export function toVersionNumber(version: string): number {
  const parts = version.trim().replace(/^[^\d]+/, "").split(".");
  let packed = 0;
  for (let i = 0; i < COMPONENTS; i++) {
    const match = /^\d+/.exec(parts[i] ?? "");
    packed = packed * 1000 + (match ? parseInt(match[0], 10) : 0);
  }
  return packed;
}

/** First dotted version found in a tool's `version` output, or "" if there is none. */
export function extractVersion(output: string): string {
  const match = /\d+(?:\.\d+)+/.exec(output);
  return match ? match[0] : "";
}

export function versionAtLeast(actual: string, required: string): boolean {
  return toVersionNumber(actual) >= toVersionNumber(required);
}

export function versionBelow(actual: string, limit: string): boolean {
  return toVersionNumber(actual) < toVersionNumber(limit);
}

export const MIN_META_VERSION = "2.3.4";
const META_VERSION_WILDCARD = /^2\.[3-9]\.x$/;

/** Accepts 2.3.4 or later, or a latest-patch wildcard such as 2.4.x */
export function isValidMetaVersion(version: string): boolean {
  return versionAtLeast(version, MIN_META_VERSION) || META_VERSION_WILDCARD.test(version);
}
