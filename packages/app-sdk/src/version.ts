/**
 * App SDK Version
 * Apps declare compatibility with SDK version ranges.
 * The registry checks this before creating an App.
 */
export const SDK_VERSION = 1;

/**
 * Version range for App compatibility
 */
export interface SdkVersionRange {
  minVersion: number;
  maxVersion?: number;
}

/**
 * Check if an App's declared SDK version range is compatible with the current SDK
 */
export function isVersionCompatible(range: SdkVersionRange): boolean {
  const min = range.minVersion;
  const max = range.maxVersion ?? min;
  return SDK_VERSION >= min && SDK_VERSION <= max;
}

/**
 * Get a human-readable error message for version mismatch
 */
export function getVersionMismatchError(appId: string, range: SdkVersionRange): string {
  const expected =
    range.maxVersion && range.maxVersion !== range.minVersion
      ? `${range.minVersion}-${range.maxVersion}`
      : `${range.minVersion}`;
  return `App "${appId}" requires SDK version ${expected}, but current SDK version is ${SDK_VERSION}.`;
}
