/**
 * Discovery walker - enumerates the manifests under a root.
 *
 * Only directory listings are read here (plus ignore files); manifest
 * contents are left to the engine.
 */

import { join } from 'node:path';
import type { DirEntry, FileSystem } from '../clients/types.ts';
import type { DiscoveryResult } from '../domain/types.ts';
import { describeError } from '../lib/error.ts';
import type { ManifestRegistry } from '../manifest/factory.ts';
import { IgnoreRules, loadRootRules } from './ignore.ts';

export interface WalkOptions {
  registry: ManifestRegistry;
  /** Descend into subdirectories (cascade mode); false reads the root only */
  recursive: boolean;
}

function byName(a: DirEntry, b: DirEntry): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

/**
 * Walk `root` depth-first in sorted order and classify every manifest.
 */
export async function walkTree(
  fs: FileSystem,
  root: string,
  options: WalkOptions,
): Promise<DiscoveryResult> {
  const { registry, recursive } = options;
  const result: DiscoveryResult = {
    root,
    versionRecords: [],
    manifests: [],
    rejected: [],
  };

  async function visit(dir: string, inherited: IgnoreRules | null): Promise<void> {
    const absolute = dir === '' ? root : join(root, dir);

    let entries: DirEntry[];
    try {
      entries = await fs.readDir(absolute);
    } catch (error) {
      result.rejected.push({
        path: absolute,
        relativePath: dir === '' ? '.' : dir,
        reason: 'unreadable',
        detail: describeError(error),
      });
      return;
    }

    let rules = inherited;
    if (rules && entries.some((e) => e.name === '.gitignore' && e.kind === 'file')) {
      const gitignore = join(absolute, '.gitignore');
      try {
        rules = rules.with(dir, await fs.readFile(gitignore));
      } catch (error) {
        result.rejected.push({
          path: gitignore,
          relativePath: dir === '' ? '.gitignore' : `${dir}/.gitignore`,
          reason: 'unreadable',
          detail: describeError(error),
        });
      }
    }

    for (const entry of [...entries].sort(byName)) {
      if (entry.name.startsWith('.')) continue;

      const relativePath = dir === '' ? entry.name : `${dir}/${entry.name}`;
      if (rules?.ignores(relativePath, entry.kind === 'directory')) continue;

      const path = join(absolute, entry.name);

      if (entry.kind === 'directory') {
        if (recursive) await visit(relativePath, rules);
        continue;
      }

      const adapter = registry.match(entry.name);
      if (!adapter) continue;

      if (entry.kind === 'symlink') {
        result.rejected.push({ path, relativePath, reason: 'symlink' });
        continue;
      }
      if (entry.kind !== 'file') continue;

      const location = { path, relativePath, format: adapter.format, adapter };
      if (registry.isVersionRecord(entry.name)) {
        if (dir === '') {
          result.versionRecords.push(location);
        } else {
          result.rejected.push({ path, relativePath, reason: 'nested-version-record' });
        }
      } else {
        result.manifests.push(location);
      }
    }
  }

  await visit('', await loadRootRules(fs, root));
  return result;
}
