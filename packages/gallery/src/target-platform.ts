export const TARGET_PLATFORM_NAMES = [
  "universal",
  "win32-x64",
  "win32-ia32",
  "win32-arm64",
  "linux-x64",
  "linux-arm64",
  "linux-armhf",
  "alpine-x64",
  "alpine-arm64",
  "darwin-x64",
  "darwin-arm64",
  "web",
] as const;

export type TargetPlatformName = (typeof TARGET_PLATFORM_NAMES)[number];

export const UNIVERSAL: TargetPlatformName = "universal";
export const WEB: TargetPlatformName = "web";

export function isTargetPlatform(value: unknown): value is TargetPlatformName {
  return typeof value === "string" && TARGET_PLATFORM_NAMES.some((name) => name === value);
}

export function isUniversal(value: string | null | undefined): boolean {
  return value === undefined || value === null || value === UNIVERSAL;
}

/**
 * Resolves the `targetPlatform` query parameter. Absent or empty means universal,
 * anything unknown is rejected with `null`.
 */
export function parseTargetPlatform(value: string | null | undefined): TargetPlatformName | null {
  if (value === undefined || value === null || value.length === 0) {
    return UNIVERSAL;
  }

  return isTargetPlatform(value) ? value : null;
}

/** Universal first, then the order of {@link TARGET_PLATFORM_NAMES}. */
export function compareTargetPlatforms(left: TargetPlatformName, right: TargetPlatformName): number {
  return TARGET_PLATFORM_NAMES.indexOf(left) - TARGET_PLATFORM_NAMES.indexOf(right);
}
