/**
 * Tests for layered ignore rules.
 */

import { describe, expect, it } from 'vitest';
import { LocalFileSystem } from '../clients/local-fs.ts';
import { createTestTree } from '../../tests/e2e/test_helpers.ts';
import { IgnoreRules, loadRootRules } from './ignore.ts';

describe('IgnoreRules', () => {
  it('ignores nothing when empty', () => {
    expect(IgnoreRules.empty().ignores('build/package.json', false)).toBe(false);
  });

  it('matches directory patterns only against directories', () => {
    const rules = IgnoreRules.empty().with('', 'build/\n');

    expect(rules.ignores('build', true)).toBe(true);
    expect(rules.ignores('build', false)).toBe(false);
    expect(rules.ignores('app/build', true)).toBe(true);
  });

  it('re-includes negated patterns', () => {
    const rules = IgnoreRules.empty().with('', '*.toml\n!Cargo.toml\n');

    expect(rules.ignores('pyproject.toml', false)).toBe(true);
    expect(rules.ignores('Cargo.toml', false)).toBe(false);
  });

  it('anchors nested patterns at their directory', () => {
    const rules = IgnoreRules.empty().with('packages', '/web\n');

    expect(rules.ignores('packages/web', true)).toBe(true);
    expect(rules.ignores('web', true)).toBe(false);
    expect(rules.ignores('packages/api/web', true)).toBe(false);
  });

  it('lets deeper files override shallower ones', () => {
    const rules = IgnoreRules.empty()
      .with('', 'package.json\n')
      .with('packages/web', '!package.json\n');

    expect(rules.ignores('package.json', false)).toBe(true);
    expect(rules.ignores('packages/web/package.json', false)).toBe(false);
    expect(rules.ignores('packages/api/package.json', false)).toBe(true);
  });
});

describe('loadRootRules', () => {
  const fs = new LocalFileSystem();

  it('returns null outside a git work tree', async () => {
    const { dir, cleanup } = await createTestTree({ VERSION: '1.0.0\n' });
    try {
      expect(await loadRootRules(fs, dir)).toBeNull();
    } finally {
      await cleanup();
    }
  });

  it('reads .git/info/exclude', async () => {
    const { dir, cleanup } = await createTestTree({ '.git/info/exclude': 'vendor/\n' });
    try {
      const rules = await loadRootRules(fs, dir);
      expect(rules?.ignores('vendor', true)).toBe(true);
      expect(rules?.ignores('src', true)).toBe(false);
    } finally {
      await cleanup();
    }
  });

  it('returns empty rules when exclude is missing', async () => {
    const { dir, cleanup } = await createTestTree({ '.git/HEAD': 'ref: refs/heads/main\n' });
    try {
      const rules = await loadRootRules(fs, dir);
      expect(rules?.ignores('vendor', true)).toBe(false);
    } finally {
      await cleanup();
    }
  });
});
