/**
 * Git ignore rules, layered per directory.
 *
 * Each layer holds the patterns of one source (`.git/info/exclude` or a
 * `.gitignore`) anchored at the directory it applies to. Layers are
 * evaluated from the root downwards; a deeper match overrides a shallower
 * one, and negations re-include.
 */

import ignore from 'ignore';
import type { Ignore } from 'ignore';
import { join } from 'node:path';
import type { FileSystem } from '../clients/types.ts';

interface Layer {
  /** Directory the patterns are anchored at, relative to the root ('' for the root) */
  base: string;
  matcher: Ignore;
}

export class IgnoreRules {
  private constructor(private readonly layers: readonly Layer[]) {}

  static empty(): IgnoreRules {
    return new IgnoreRules([]);
  }

  /**
   * Rules with one more pattern source anchored at `base`.
   */
  with(base: string, patterns: string): IgnoreRules {
    return new IgnoreRules([...this.layers, { base, matcher: ignore().add(patterns) }]);
  }

  /**
   * Whether a root-relative path (forward slashes) is ignored.
   */
  ignores(relativePath: string, isDirectory: boolean): boolean {
    let ignored = false;

    for (const { base, matcher } of this.layers) {
      const prefix = base === '' ? '' : `${base}/`;
      if (!relativePath.startsWith(prefix)) continue;

      const local = relativePath.slice(prefix.length);
      const { ignored: hit, unignored } = matcher.test(isDirectory ? `${local}/` : local);
      if (hit) ignored = true;
      else if (unignored) ignored = false;
    }

    return ignored;
  }
}

/**
 * Root-level rules, or null when the root is not a git work tree and
 * nothing should be filtered.
 */
export async function loadRootRules(fs: FileSystem, root: string): Promise<IgnoreRules | null> {
  if (!(await fs.exists(join(root, '.git')))) {
    return null;
  }

  const exclude = join(root, '.git', 'info', 'exclude');
  if (await fs.exists(exclude)) {
    return IgnoreRules.empty().with('', await fs.readFile(exclude));
  }
  return IgnoreRules.empty();
}
