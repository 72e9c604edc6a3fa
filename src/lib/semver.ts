/**
 * Semantic version parsing utilities.
 *
 * Parsing is strict: surrounding whitespace is trimmed, everything else must
 * match `MAJOR.MINOR.PATCH[-PRERELEASE][+BUILD]` exactly. Numeric components
 * (and numeric pre-release identifiers) may not carry leading zeros.
 */

import { VersyncError } from './error.ts';

export interface ParsedVersion {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
  readonly prerelease: string | null; // e.g., "alpha.1", "rc.2"
  readonly build: string | null; // e.g., "build.123"
}

export type BumpType = 'major' | 'minor' | 'patch';

export const BUMP_TYPES: readonly BumpType[] = ['major', 'minor', 'patch'];

const NUMERIC = '0|[1-9]\\d*';
const PRERELEASE_ID = `(?:${NUMERIC}|\\d*[a-zA-Z-][0-9a-zA-Z-]*)`;
const BUILD_ID = '[0-9a-zA-Z-]+';

const SEMVER_REGEX = new RegExp(
  `^(${NUMERIC})\\.(${NUMERIC})\\.(${NUMERIC})` +
    `(?:-(${PRERELEASE_ID}(?:\\.${PRERELEASE_ID})*))?` +
    `(?:\\+(${BUILD_ID}(?:\\.${BUILD_ID})*))?$`,
);

function toComponent(value: string): number | null {
  const n = parseInt(value, 10);
  return Number.isSafeInteger(n) ? n : null;
}

/**
 * Parse a semver string into components, null if it does not conform.
 */
export function tryParse(version: string): ParsedVersion | null {
  const match = version.trim().match(SEMVER_REGEX);
  if (!match) return null;

  const [, majorText, minorText, patchText, prerelease, build] = match;
  const major = toComponent(majorText);
  const minor = toComponent(minorText);
  const patch = toComponent(patchText);
  if (major === null || minor === null || patch === null) return null;

  return {
    major,
    minor,
    patch,
    prerelease: prerelease ?? null,
    build: build ?? null,
  };
}

/**
 * Parse a semver string into components.
 */
export function parse(version: string): ParsedVersion {
  const parsed = tryParse(version);
  if (!parsed) {
    throw new VersyncError(
      `Invalid version format: '${version.trim()}'. Expected MAJOR.MINOR.PATCH[-PRERELEASE][+BUILD], e.g. 1.4.0 or 2.0.0-rc.1`,
      'INVALID_VERSION_FORMAT',
      { input: version },
    );
  }
  return parsed;
}

/**
 * Format parsed version back to string.
 */
export function format(v: ParsedVersion): string {
  let text = `${v.major}.${v.minor}.${v.patch}`;
  if (v.prerelease) text += `-${v.prerelease}`;
  if (v.build) text += `+${v.build}`;
  return text;
}

/**
 * Bump version by type. Pre-release and build suffixes are dropped.
 */
export function bump(v: ParsedVersion, type: BumpType): ParsedVersion {
  const base = { prerelease: null, build: null };

  switch (type) {
    case 'major':
      return { ...base, major: v.major + 1, minor: 0, patch: 0 };
    case 'minor':
      return { ...base, major: v.major, minor: v.minor + 1, patch: 0 };
    case 'patch':
      return { ...base, major: v.major, minor: v.minor, patch: v.patch + 1 };
  }
}

/**
 * Compare two versions. Returns -1, 0, or 1.
 *
 * Pre-release suffixes are compared as plain strings, so `alpha.10` sorts
 * before `alpha.9`. Build metadata is ignored.
 */
export function compare(a: ParsedVersion, b: ParsedVersion): -1 | 0 | 1 {
  if (a.major !== b.major) return a.major < b.major ? -1 : 1;
  if (a.minor !== b.minor) return a.minor < b.minor ? -1 : 1;
  if (a.patch !== b.patch) return a.patch < b.patch ? -1 : 1;

  // Both stable
  if (!a.prerelease && !b.prerelease) return 0;
  // Stable > prerelease
  if (!a.prerelease) return 1;
  if (!b.prerelease) return -1;

  if (a.prerelease === b.prerelease) return 0;
  return a.prerelease < b.prerelease ? -1 : 1;
}

/**
 * Two versions are equal when their canonical text is, build included.
 */
export function equals(a: ParsedVersion, b: ParsedVersion): boolean {
  return format(a) === format(b);
}

export function isBumpType(value: string): value is BumpType {
  return BUMP_TYPES.some((type) => type === value);
}
