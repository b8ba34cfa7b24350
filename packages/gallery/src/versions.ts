import { compareTargetPlatforms } from "./target-platform.js";
import type { ExtensionVersion } from "./types.js";

interface SemanticVersion {
  major: number;
  minor: number;
  patch: number;
  preRelease: string[];
}

const SEMVER_PATTERN =
  /^v?(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)(?:-([0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*))?(?:\+[0-9A-Za-z-.]+)?$/;

export function isValidSemver(value: string): boolean {
  return parseSemanticVersion(value) !== null;
}

/** Ascending comparison; unparsable values fall back to string order. */
export function compareSemver(left: string, right: string): number {
  const parsedLeft = parseSemanticVersion(left);
  const parsedRight = parseSemanticVersion(right);

  if (parsedLeft === null || parsedRight === null) {
    return left.localeCompare(right);
  }

  const numeric =
    parsedLeft.major - parsedRight.major ||
    parsedLeft.minor - parsedRight.minor ||
    parsedLeft.patch - parsedRight.patch;
  if (numeric !== 0) {
    return numeric;
  }

  return comparePreRelease(parsedLeft.preRelease, parsedRight.preRelease);
}

/**
 * Newest version first; builds of the same version are ordered by target platform
 * with universal leading.
 */
export function compareExtensionVersions(left: ExtensionVersion, right: ExtensionVersion): number {
  const byVersion = compareSemver(right.version, left.version);
  if (byVersion !== 0) {
    return byVersion;
  }

  return compareTargetPlatforms(left.targetPlatform, right.targetPlatform);
}

export function sortExtensionVersions(versions: readonly ExtensionVersion[]): ExtensionVersion[] {
  return [...versions].sort(compareExtensionVersions);
}

/** Keeps the newest version of every target platform, preserving the sorted order. */
export function latestPerTargetPlatform(versions: readonly ExtensionVersion[]): ExtensionVersion[] {
  const seen = new Set<string>();
  const latest: ExtensionVersion[] = [];

  for (const version of sortExtensionVersions(versions)) {
    if (seen.has(version.targetPlatform)) {
      continue;
    }

    seen.add(version.targetPlatform);
    latest.push(version);
  }

  return latest;
}

function parseSemanticVersion(value: string): SemanticVersion | null {
  const match = SEMVER_PATTERN.exec(value);
  if (match === null) {
    return null;
  }

  const preReleaseGroup = match[4];

  return {
    major: Number(match[1]),
    minor: Number(match[2]),
    patch: Number(match[3]),
    preRelease: preReleaseGroup === undefined || preReleaseGroup.length === 0 ? [] : preReleaseGroup.split("."),
  };
}

function comparePreRelease(left: string[], right: string[]): number {
  // a release ranks above any of its pre-releases
  if (left.length === 0 || right.length === 0) {
    return right.length - left.length;
  }

  for (let index = 0; index < Math.max(left.length, right.length); index += 1) {
    const leftValue = left[index];
    const rightValue = right[index];

    if (leftValue === undefined) {
      return -1;
    }

    if (rightValue === undefined) {
      return 1;
    }

    const compared = compareIdentifier(leftValue, rightValue);
    if (compared !== 0) {
      return compared;
    }
  }

  return 0;
}

function compareIdentifier(left: string, right: string): number {
  const leftNumeric = /^\d+$/.test(left);
  const rightNumeric = /^\d+$/.test(right);

  if (leftNumeric && rightNumeric) {
    return Number(left) - Number(right);
  }

  if (leftNumeric !== rightNumeric) {
    return leftNumeric ? -1 : 1;
  }

  return left.localeCompare(right);
}
