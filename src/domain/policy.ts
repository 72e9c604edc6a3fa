/**
 * Cascade policy checks - pure validation consulted before any mutation.
 *
 * Each check returns a result instead of throwing so callers can collect
 * or report them; `assertPolicies` turns the first failure into an error.
 */

import { VersyncError } from '../lib/error.ts';
import type { DiscoveryResult, ManifestEntry, Mismatch, ReadFailure, RejectedPath } from './types.ts';

export type PolicyResult = { ok: true } | { ok: false; error: VersyncError };

const PASS: PolicyResult = { ok: true };

function fail(error: VersyncError): PolicyResult {
  return { ok: false, error };
}

function paths(rejected: RejectedPath[]): string[] {
  return rejected.map((r) => r.relativePath);
}

/**
 * Exactly one root version record exists at the tree root.
 */
export function checkRootVersionRecord(discovery: DiscoveryResult, versionFile: string): PolicyResult {
  const records = discovery.versionRecords;
  if (records.length === 0) {
    return fail(
      new VersyncError(
        `No ${versionFile} file found in ${discovery.root}. Create one holding the current version, e.g. \`echo 0.1.0 > ${versionFile}\`.`,
        'MISSING_ROOT_VERSION',
        { root: discovery.root, versionFile },
      ),
    );
  }
  if (records.length > 1) {
    return fail(
      new VersyncError(
        `Found ${records.length} root version records (${records.map((r) => r.relativePath).join(', ')}); keep exactly one.`,
        'MULTIPLE_ROOT_VERSIONS',
        { paths: records.map((r) => r.relativePath) },
      ),
    );
  }
  return PASS;
}

/**
 * No version record exists below the root.
 */
export function checkNestedVersionRecords(discovery: DiscoveryResult): PolicyResult {
  const nested = discovery.rejected.filter((r) => r.reason === 'nested-version-record');
  if (nested.length === 0) return PASS;

  return fail(
    new VersyncError(
      `Nested version record at ${nested[0].relativePath}. Only the root may hold one; remove it or run without --cascade.`,
      'NESTED_VERSION_RECORD',
      { path: nested[0].path, paths: paths(nested) },
    ),
  );
}

/**
 * No candidate manifest or version record is a symlink.
 */
export function checkSymlinks(discovery: DiscoveryResult): PolicyResult {
  const links = discovery.rejected.filter((r) => r.reason === 'symlink');
  if (links.length === 0) return PASS;

  return fail(
    new VersyncError(
      `Refusing to write through symlinked manifest ${links[0].relativePath}. Replace the link with a regular file or ignore it in .gitignore.`,
      'SYMLINK_MANIFEST_REJECTED',
      { path: links[0].path, paths: paths(links) },
    ),
  );
}

/**
 * Every directory of the tree could be listed.
 */
export function checkUnreadablePaths(discovery: DiscoveryResult): PolicyResult {
  const unreadable = discovery.rejected.filter((r) => r.reason === 'unreadable');
  if (unreadable.length === 0) return PASS;

  const [first] = unreadable;
  return fail(
    new VersyncError(
      `Cannot read ${first.relativePath}${first.detail ? `: ${first.detail}` : ''}. Fix its permissions or ignore it in .gitignore.`,
      'UNREADABLE_MANIFEST',
      { path: first.path, paths: paths(unreadable) },
    ),
  );
}

/**
 * Layout checks in the order they are reported.
 *
 * Rejections come first: a symlinked or unlistable root leaves no version
 * record behind, and that must not read as a missing one.
 */
export function checkLayout(discovery: DiscoveryResult, versionFile: string): PolicyResult[] {
  return [
    checkSymlinks(discovery),
    checkUnreadablePaths(discovery),
    checkRootVersionRecord(discovery, versionFile),
    checkNestedVersionRecords(discovery),
  ];
}

/**
 * Every discovered manifest yielded a version field.
 */
export function checkManifestReads(failures: ReadFailure[]): PolicyResult {
  if (failures.length === 0) return PASS;

  const [{ location, error }] = failures;
  return fail(
    new VersyncError(
      `Cannot read version from ${location.relativePath}: ${error.message}`,
      'UNREADABLE_MANIFEST',
      {
        path: location.path,
        paths: failures.map((f) => f.location.relativePath),
        cause: error instanceof VersyncError ? error.code : error.message,
      },
    ),
  );
}

/**
 * Manifests whose declared version differs from `expected`.
 */
export function findMismatches(entries: ManifestEntry[], expected: string): Mismatch[] {
  return entries
    .filter((entry) => entry.declared !== expected)
    .map((entry) => ({
      relativePath: entry.relativePath,
      format: entry.format,
      declared: entry.declared,
      expected,
    }));
}

/**
 * All manifests agree with the root version record.
 */
export function checkVersionsInSync(mismatches: Mismatch[], versionFile: string): PolicyResult {
  if (mismatches.length === 0) return PASS;

  const lines = mismatches.map(
    (m) => `  ${m.relativePath} has version ${m.declared} but ${versionFile} has ${m.expected}`,
  );
  return fail(
    new VersyncError(
      `Version files are not synchronized:\n${lines.join('\n')}\n\nRun \`versync sync\` to synchronize all version files.`,
      'VERSION_MISMATCH',
      { mismatches },
    ),
  );
}

/**
 * Throw the first failing check.
 */
export function assertPolicies(results: PolicyResult[]): void {
  for (const result of results) {
    if (!result.ok) throw result.error;
  }
}
