/**
 * Cascade synchronization engine.
 *
 * One operation per call, driven through a small state machine:
 *
 *   idle → discovering → validating → staging → committing → done
 *
 * with `failed` reachable from every step. Nothing is written before
 * committing; verify stops after validating and dry runs after staging.
 */

import { basename } from 'node:path';
import { LocalFileSystem } from '../clients/local-fs.ts';
import type { FileSystem } from '../clients/types.ts';
import {
  assertPolicies,
  checkLayout,
  checkManifestReads,
  checkVersionsInSync,
  findMismatches,
} from '../domain/policy.ts';
import { describeChanges, stageChanges } from '../domain/staging.ts';
import type {
  ManifestEntry,
  ManifestLocation,
  Operation,
  OperationResult,
  ReadFailure,
  VerifyReport,
} from '../domain/types.ts';
import { VersyncError } from '../lib/error.ts';
import type { BumpType, ParsedVersion } from '../lib/semver.ts';
import { bump, format, parse } from '../lib/semver.ts';
import { createRegistry } from '../manifest/factory.ts';
import type { ManifestRegistry } from '../manifest/factory.ts';
import { commitChanges } from './commit.ts';
import { walkTree } from './walker.ts';

export type EngineState =
  | 'idle'
  | 'discovering'
  | 'validating'
  | 'staging'
  | 'committing'
  | 'done'
  | 'failed';

export interface EngineOptions {
  fs?: FileSystem;
  /** Name of the root version record (default: VERSION) */
  versionFile?: string;
  onStateChange?: (state: EngineState, previous: EngineState) => void;
}

export interface RunOptions {
  /** Walk the whole tree instead of the root directory only */
  cascade?: boolean;
  /** Stop after staging and report diffs */
  dryRun?: boolean;
}

/** Validated view of the tree */
interface Snapshot {
  record: ManifestEntry;
  manifests: ManifestEntry[];
  version: ParsedVersion;
}

export class SyncEngine {
  readonly registry: ManifestRegistry;
  private readonly fs: FileSystem;
  private readonly onStateChange?: (state: EngineState, previous: EngineState) => void;
  private current: EngineState = 'idle';

  constructor(readonly root: string, options: EngineOptions = {}) {
    this.fs = options.fs ?? new LocalFileSystem();
    this.registry = createRegistry(options.versionFile);
    this.onStateChange = options.onStateChange;
  }

  get state(): EngineState {
    return this.current;
  }

  get versionFile(): string {
    return this.registry.versionRecord.filename;
  }

  /** Base name of the root, used for `{repository_name}` in tags */
  get repositoryName(): string {
    return basename(this.root);
  }

  /**
   * Report each manifest against the root version. Never writes, and
   * mismatches are reported rather than thrown.
   */
  verify(options: RunOptions = {}): Promise<VerifyReport> {
    return this.guard(async () => {
      const snapshot = await this.validate(options.cascade ?? false);
      const version = format(snapshot.version);
      const mismatches = findMismatches(snapshot.manifests, version);

      return {
        version,
        versionFile: snapshot.record.relativePath,
        entries: snapshot.manifests.map((entry) => ({
          relativePath: entry.relativePath,
          format: entry.format,
          declared: entry.declared,
          inSync: entry.declared === version,
        })),
        mismatches,
        inSync: mismatches.length === 0,
      };
    });
  }

  /**
   * Same report as verify, for display.
   */
  status(options: RunOptions = {}): Promise<VerifyReport> {
    return this.verify(options);
  }

  /**
   * Bump the root version and every manifest with it.
   */
  bump(kind: BumpType, options: RunOptions = {}): Promise<OperationResult> {
    return this.guard(async () => {
      const snapshot = await this.validateInSync(options.cascade ?? false);
      return await this.apply('bump', snapshot, format(bump(snapshot.version, kind)), options);
    });
  }

  /**
   * Force every manifest to the root version.
   */
  sync(options: RunOptions = {}): Promise<OperationResult> {
    return this.guard(async () => {
      const snapshot = await this.validate(options.cascade ?? false);
      return await this.apply('sync', snapshot, format(snapshot.version), options);
    });
  }

  /**
   * Set the root version and every manifest to `target`.
   */
  reset(target = '0.0.0', options: RunOptions = {}): Promise<OperationResult> {
    return this.guard(async () => {
      const version = format(parse(target));
      const snapshot = await this.validateInSync(options.cascade ?? false);
      return await this.apply('reset', snapshot, version, options);
    });
  }

  private transition(next: EngineState): void {
    const previous = this.current;
    this.current = next;
    this.onStateChange?.(next, previous);
  }

  private async guard<T>(operation: () => Promise<T>): Promise<T> {
    this.current = 'idle';
    try {
      return await operation();
    } catch (error) {
      this.transition('failed');
      throw error;
    }
  }

  /**
   * Discover, read and check the tree. Mismatches are left to the caller.
   */
  private async validate(cascade: boolean): Promise<Snapshot> {
    this.transition('discovering');
    const discovery = await walkTree(this.fs, this.root, {
      registry: this.registry,
      recursive: cascade,
    });
    assertPolicies(checkLayout(discovery, this.versionFile));

    this.transition('validating');
    const [recordLocation] = discovery.versionRecords;
    const reads = await Promise.all(
      [recordLocation, ...discovery.manifests].map((location) => this.read(location)),
    );

    const entries: ManifestEntry[] = [];
    const failures: ReadFailure[] = [];
    for (const read of reads) {
      if ('error' in read) failures.push(read);
      else entries.push(read);
    }
    assertPolicies([checkManifestReads(failures)]);

    const [record, ...manifests] = entries;
    return { record, manifests, version: parse(record.declared) };
  }

  private async validateInSync(cascade: boolean): Promise<Snapshot> {
    const snapshot = await this.validate(cascade);
    const mismatches = findMismatches(snapshot.manifests, format(snapshot.version));
    assertPolicies([checkVersionsInSync(mismatches, this.versionFile)]);
    return snapshot;
  }

  private async read(location: ManifestLocation): Promise<ManifestEntry | ReadFailure> {
    try {
      const content = await this.fs.readFile(location.path);
      return { ...location, content, declared: location.adapter.readVersion(content) };
    } catch (error) {
      return {
        location,
        error: error instanceof Error ? error : new VersyncError(String(error), 'UNREADABLE_MANIFEST'),
      };
    }
  }

  /**
   * Stage `version` into every file and commit unless this is a dry run.
   */
  private async apply(
    operation: Operation,
    snapshot: Snapshot,
    version: string,
    options: RunOptions,
  ): Promise<OperationResult> {
    this.transition('staging');
    const changes = stageChanges([snapshot.record, ...snapshot.manifests], version);
    const dryRun = options.dryRun ?? false;

    if (!dryRun && changes.length > 0) {
      this.transition('committing');
      await commitChanges(this.fs, changes);
    }

    this.transition('done');
    return {
      operation,
      from: format(snapshot.version),
      version,
      changes,
      diffs: describeChanges(changes),
      dryRun,
      committed: !dryRun && changes.length > 0,
    };
  }
}
