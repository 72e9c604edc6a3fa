/**
 * Core domain types for versync.
 */

import type { ManifestAdapter, ManifestFormat } from '../manifest/interface.ts';

/** A file claimed by an adapter during discovery. */
export interface ManifestLocation {
  /** Absolute path */
  path: string;
  /** Path relative to the root, with forward slashes */
  relativePath: string;
  format: ManifestFormat;
  adapter: ManifestAdapter;
}

export type RejectionReason = 'symlink' | 'nested-version-record' | 'unreadable';

/** A path discovery refused to use, with the reason */
export interface RejectedPath {
  path: string;
  relativePath: string;
  reason: RejectionReason;
  detail?: string;
}

/** Walker output; no file has been read yet */
export interface DiscoveryResult {
  root: string;
  /** Version records found directly at the root */
  versionRecords: ManifestLocation[];
  /** Manifests in discovery order */
  manifests: ManifestLocation[];
  rejected: RejectedPath[];
}

/** A manifest whose version was read successfully */
export interface ManifestEntry extends ManifestLocation {
  /** Version string as declared in the file */
  declared: string;
  /** File content captured at read time */
  content: string;
}

/** A manifest whose version could not be read */
export interface ReadFailure {
  location: ManifestLocation;
  error: Error;
}

/** A manifest that disagrees with the root version */
export interface Mismatch {
  relativePath: string;
  format: ManifestFormat;
  declared: string;
  expected: string;
}

/** New content for one file, computed before anything is written */
export interface StagedChange {
  path: string;
  relativePath: string;
  format: ManifestFormat;
  /** Content captured during validation */
  original: string;
  /** Content to write */
  content: string;
  from: string;
  to: string;
}

/** One changed line in a dry-run diff (1-based line number) */
export interface LineChange {
  line: number;
  before: string;
  after: string;
}

export interface FileDiff {
  relativePath: string;
  changes: LineChange[];
}

export type Operation = 'bump' | 'sync' | 'reset';

/** Result of bump, sync or reset */
export interface OperationResult {
  operation: Operation;
  /** Root version before the operation */
  from: string;
  /** Root version after the operation (or after it would run, in dry-run) */
  version: string;
  changes: StagedChange[];
  diffs: FileDiff[];
  dryRun: boolean;
  committed: boolean;
}

/** Per-file line of a verify/status report */
export interface ReportEntry {
  relativePath: string;
  format: ManifestFormat;
  declared: string;
  inSync: boolean;
}

/** Result of verify/status: never a failure for mismatches */
export interface VerifyReport {
  version: string;
  versionFile: string;
  entries: ReportEntry[];
  mismatches: Mismatch[];
  inSync: boolean;
}
