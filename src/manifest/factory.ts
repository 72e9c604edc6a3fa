import { VersyncError } from '../lib/error.ts';
import type { ManifestAdapter } from './interface.ts';
import { CargoManifest } from './cargo.ts';
import { NodeManifest } from './node.ts';
import { PyProjectManifest } from './pyproject.ts';
import { DEFAULT_VERSION_FILE, VersionFileManifest } from './version-file.ts';

/**
 * The closed set of adapters, dispatched by file name.
 *
 * The root version record is an adapter like any other; it is kept apart
 * because discovery and policy checks treat it specially.
 */
export class ManifestRegistry {
  readonly versionRecord: VersionFileManifest;
  readonly manifests: readonly ManifestAdapter[] = [
    new CargoManifest(),
    new PyProjectManifest(),
    new NodeManifest(),
  ];

  constructor(versionFile: string = DEFAULT_VERSION_FILE) {
    const clash = this.manifests.find((adapter) => adapter.detect(versionFile));
    if (clash) {
      throw new VersyncError(
        `Version file name '${versionFile}' is already a ${clash.format} manifest. Pick another name.`,
        'CONFIG_VALIDATION_ERROR',
        { field: 'versionFile', value: versionFile },
      );
    }
    this.versionRecord = new VersionFileManifest(versionFile);
  }

  /** Every adapter, version record first. */
  get all(): readonly ManifestAdapter[] {
    return [this.versionRecord, ...this.manifests];
  }

  /**
   * Adapter that claims a file name, null when none does.
   */
  match(filename: string): ManifestAdapter | null {
    return this.all.find((adapter) => adapter.detect(filename)) ?? null;
  }

  isVersionRecord(filename: string): boolean {
    return this.versionRecord.detect(filename);
  }
}

/**
 * Create a registry, optionally with a custom root version file name.
 */
export function createRegistry(versionFile?: string): ManifestRegistry {
  return new ManifestRegistry(versionFile);
}
