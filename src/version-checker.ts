/**
 * Version Checker - Refuses to run on a Node.js release older than the
 * one coursepack is built and tested against
 */

export const MINIMUM_NODE_VERSION = '20.0.0';

export interface VersionCheckResult {
  isCompatible: boolean;
  /** Without the leading "v" */
  currentVersion: string;
  requiredVersion: string;
  errorMessage?: string;
}

/**
 * Numeric release parts of a version string. Pre-release and build
 * suffixes ("20.1.0-rc.1", "20.1.0+local") are dropped; missing or
 * non-numeric parts count as 0.
 */
export function parseVersion(version: string): number[] {
  const release = version.replace(/^v/, '').split(/[-+]/)[0];
  return release.split('.').map(part => {
    const value = Number.parseInt(part, 10);
    return Number.isNaN(value) ? 0 : value;
  });
}

/**
 * -1, 0 or 1 as version1 is older than, the same as, or newer than version2
 */
export function compareVersions(version1: string, version2: string): number {
  const left = parseVersion(version1);
  const right = parseVersion(version2);
  const length = Math.max(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const difference = (left[i] ?? 0) - (right[i] ?? 0);
    if (difference !== 0) {
      return difference < 0 ? -1 : 1;
    }
  }
  return 0;
}

/**
 * @param runningVersion - process.version unless given, e.g. "v20.11.1"
 */
export function checkNodeVersion(
  minVersion: string = MINIMUM_NODE_VERSION,
  runningVersion: string = process.version
): VersionCheckResult {
  const currentVersion = runningVersion.replace(/^v/, '');

  if (compareVersions(currentVersion, minVersion) >= 0) {
    return { isCompatible: true, currentVersion, requiredVersion: minVersion };
  }

  return {
    isCompatible: false,
    currentVersion,
    requiredVersion: minVersion,
    errorMessage: `coursepack requires Node.js ${minVersion} or higher. Current version: ${currentVersion}`
  };
}

/**
 * Exit with status 1 on an unsupported Node.js
 */
export function enforceNodeVersion(): void {
  const result = checkNodeVersion();
  if (result.isCompatible) {
    return;
  }

  console.error(`Error: ${result.errorMessage}`);
  console.error(`Install Node.js ${result.requiredVersion} or newer and run coursepack again.`);
  process.exit(1);
}
