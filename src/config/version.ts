/**
 * Configuration version compatibility checking.
 *
 * @packageDocumentation
 */

import { CONFIG_VERSION } from './defaults.js';

/**
 * Outcome of comparing a declared config version with the expected minimum.
 */
export type VersionCheckResult =
  | { readonly status: 'ok'; readonly declared: string }
  | { readonly status: 'unknown' }
  | { readonly status: 'outdated'; readonly declared: string; readonly minimum: string }
  | { readonly status: 'invalid'; readonly declared: string };

const VERSION_PATTERN = /^v?(\d+(?:\.\d+)*)$/;

/**
 * Parses a dotted numeric version such as `0.2.8` or `v1.0`.
 *
 * @param version - Version text.
 * @returns Numeric parts, or `undefined` if the text is not a version.
 */
export function parseVersion(version: string): number[] | undefined {
  const match = VERSION_PATTERN.exec(version.trim());
  const digits = match?.[1];
  if (digits === undefined) {
    return undefined;
  }
  return digits.split('.').map(Number);
}

/**
 * Compares two dotted numeric versions part by part. Missing parts count as 0.
 *
 * @returns Negative if `a < b`, zero if equal, positive if `a > b`, or
 *   `undefined` if either is not a valid version.
 */
export function compareVersions(a: string, b: string): number | undefined {
  const left = parseVersion(a);
  const right = parseVersion(b);
  if (left === undefined || right === undefined) {
    return undefined;
  }

  const length = Math.max(left.length, right.length);
  for (let i = 0; i < length; i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) {
      return diff;
    }
  }
  return 0;
}

/**
 * Checks a declared config version against the minimum expected version.
 *
 * @param declared - Version from `[config] version`, if any.
 * @param minimum - Minimum version that needs no update.
 */
export function checkConfigVersion(
  declared: string | undefined,
  minimum: string = CONFIG_VERSION
): VersionCheckResult {
  if (declared === undefined) {
    return { status: 'unknown' };
  }

  const cmp = compareVersions(declared, minimum);
  if (cmp === undefined) {
    return { status: 'invalid', declared };
  }
  if (cmp < 0) {
    return { status: 'outdated', declared, minimum };
  }
  return { status: 'ok', declared };
}

/**
 * Gets the user-facing warning for a version check result.
 *
 * @returns Warning text, or `undefined` when no warning is needed.
 */
export function versionWarning(result: VersionCheckResult): string | undefined {
  switch (result.status) {
    case 'ok':
      return undefined;
    case 'unknown':
      return 'Config version unknown, it may be outdated';
    case 'outdated':
      return 'Config is for older lazymc version, you may need to update it';
    case 'invalid':
      return 'Config version is invalid, you may need to update it';
    default: {
      const exhaustiveCheck: never = result;
      return exhaustiveCheck;
    }
  }
}
