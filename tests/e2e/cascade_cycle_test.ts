/**
 * End-to-end cascade cycle over a polyglot monorepo.
 *
 * Creates a real git repository with realistic manifests, then drives the
 * CLI through status, bump with tagging, a drifted manifest, sync and reset,
 * checking every file after each step.
 */

import chalk from 'chalk';
import { basename } from 'node:path';
import { afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import { main } from '../../src/cli/main.ts';
import { createTestRepo, run, snapshot, writeFiles } from './test_helpers.ts';
import type { Files } from './test_helpers.ts';

const CARGO = `[workspace]
members = ["crates/core"]

[package]
name = "polyglot"
version = "1.2.3"
edition = "2021"

[dependencies]
serde = { version = "1.0.200", features = ["derive"] }
`;

const CORE_CARGO = `[package]
name = "polyglot-core"
version = '1.2.3'   # single quotes stay single
`;

const PYPROJECT = `[build-system]
requires = ["hatchling"]

[project]
name = "polyglot"
version = "1.2.3"
dependencies = ["requests>=2.31"]

[tool.hatch.version]
path = "polyglot/__init__.py"
`;

const WEB_PACKAGE = `{
  "name": "@polyglot/web",
  "version": "1.2.3",
  "private": true,
  "devDependencies": {
    "typescript": "5.6.3"
  }
}
`;

const FILES: Files = {
  '.gitignore': 'build/\nnode_modules/\n',
  'VERSION': '1.2.3\n',
  'Cargo.toml': CARGO,
  'crates/core/Cargo.toml': CORE_CARGO,
  'python/pyproject.toml': PYPROJECT,
  'packages/web/package.json': WEB_PACKAGE,
  'packages/web/node_modules/typescript/package.json': '{ "name": "typescript", "version": "5.6.3" }\n',
  'build/package.json': '{ "version": "0.0.1" }\n',
};

const TRACKED = [
  'VERSION',
  'Cargo.toml',
  'crates/core/Cargo.toml',
  'python/pyproject.toml',
  'packages/web/package.json',
];

function at(version: string): Files {
  return {
    'VERSION': `${version}\n`,
    'Cargo.toml': CARGO.replace('version = "1.2.3"', `version = "${version}"`),
    'crates/core/Cargo.toml': CORE_CARGO.replace("'1.2.3'", `'${version}'`),
    'python/pyproject.toml': PYPROJECT.replace('version = "1.2.3"', `version = "${version}"`),
    'packages/web/package.json': WEB_PACKAGE.replace('"version": "1.2.3"', `"version": "${version}"`),
  };
}

beforeAll(() => {
  chalk.level = 0;
});

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('e2e: polyglot monorepo', () => {
  it('runs a full cascade cycle', async () => {
    const { dir, git, cleanup } = await createTestRepo(FILES);
    try {
      await run(dir, ['git', 'add', '.']);
      await run(dir, ['git', 'commit', '-m', 'chore: initial project']);
      const cli = (...args: string[]) => main(args, { cwd: dir });

      // In sync from the start
      expect(await cli('verify', '--cascade')).toBe(0);

      // Dry run changes nothing
      expect(await cli('bump', 'minor', '--cascade', '--dry-run')).toBe(0);
      expect(await snapshot(dir, TRACKED)).toEqual(at('1.2.3'));

      // Bump and tag
      expect(await cli('minor', '--cascade', '--tag')).toBe(0);
      expect(await snapshot(dir, TRACKED)).toEqual(at('1.3.0'));
      expect(await git.tagExists('v1.3.0')).toBe(true);

      // Ignored manifests are never touched
      expect(await snapshot(dir, ['build/package.json'])).toEqual({
        'build/package.json': FILES['build/package.json'],
      });

      // A drifted manifest blocks bump and reset
      await writeFiles(dir, {
        'python/pyproject.toml': PYPROJECT.replace('version = "1.2.3"', 'version = "1.2.9"'),
      });
      expect(await cli('bump', 'patch', '--cascade')).toBe(1);
      expect(await cli('reset', '--cascade')).toBe(1);
      expect(await cli('verify', '--cascade')).toBe(1);

      // Standard mode only sees the root
      expect(await cli('verify')).toBe(0);

      // Sync repairs it, and a second sync changes nothing
      expect(await cli('sync', '--cascade')).toBe(0);
      expect(await snapshot(dir, TRACKED)).toEqual(at('1.3.0'));
      expect(await cli('sync', '--cascade')).toBe(0);
      expect(await snapshot(dir, TRACKED)).toEqual(at('1.3.0'));

      // Tag with a custom template; the same tag twice fails
      const repository = basename(dir);
      expect(await cli('tag', '--tag-format', '{repository_name}-{major}.{minor}')).toBe(0);
      expect(await git.tagExists(`${repository}-1.3`)).toBe(true);
      expect(await cli('tag', '--tag-format', '{repository_name}-{major}.{minor}')).toBe(1);

      // Reset everything
      expect(await cli('reset', '0.1.0', '--cascade')).toBe(0);
      expect(await snapshot(dir, TRACKED)).toEqual(at('0.1.0'));
    } finally {
      await cleanup();
    }
  });

  it('refuses nested version records without writing', async () => {
    const files = { ...FILES, 'crates/core/VERSION': '1.2.3\n' };
    const { dir, cleanup } = await createTestRepo(files);
    try {
      expect(await main(['bump', 'patch', '--cascade'], { cwd: dir })).toBe(1);
      expect(console.error).toHaveBeenCalledWith(
        expect.stringContaining('Nested version record at crates/core/VERSION'),
      );
      expect(await snapshot(dir, [...TRACKED, 'crates/core/VERSION'])).toEqual({
        ...at('1.2.3'),
        'crates/core/VERSION': '1.2.3\n',
      });
    } finally {
      await cleanup();
    }
  });
});
