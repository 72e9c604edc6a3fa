/**
 * Tests for staging and dry-run diffs.
 */

import { describe, expect, it } from 'vitest';
import { createRegistry } from '../manifest/factory.ts';
import type { ManifestAdapter } from '../manifest/interface.ts';
import { describeChanges, diffLines, stageChanges } from './staging.ts';
import type { ManifestEntry } from './types.ts';

const registry = createRegistry();
const [cargo, , node] = registry.manifests;

function entry(relativePath: string, adapter: ManifestAdapter, content: string): ManifestEntry {
  return {
    path: `/repo/${relativePath}`,
    relativePath,
    format: adapter.format,
    adapter,
    declared: adapter.readVersion(content),
    content,
  };
}

const CARGO = '[package]\nname = "app"\nversion = "1.2.3"\n';
const PACKAGE = '{\n  "name": "web",\n  "version": "1.2.3"\n}\n';

describe('stageChanges', () => {
  it('stages every entry in order', () => {
    const changes = stageChanges(
      [
        entry('VERSION', registry.versionRecord, '1.2.3\n'),
        entry('Cargo.toml', cargo, CARGO),
        entry('web/package.json', node, PACKAGE),
      ],
      '1.2.4',
    );

    expect(changes.map((c) => c.relativePath)).toEqual(['VERSION', 'Cargo.toml', 'web/package.json']);
    expect(changes[0]).toEqual({
      path: '/repo/VERSION',
      relativePath: 'VERSION',
      format: 'version-file',
      original: '1.2.3\n',
      content: '1.2.4\n',
      from: '1.2.3',
      to: '1.2.4',
    });
    expect(changes[1].content).toBe('[package]\nname = "app"\nversion = "1.2.4"\n');
    expect(changes[2].content).toBe('{\n  "name": "web",\n  "version": "1.2.4"\n}\n');
  });

  it('skips files that already hold the version', () => {
    const changes = stageChanges(
      [
        entry('VERSION', registry.versionRecord, '1.2.4\n'),
        entry('Cargo.toml', cargo, CARGO),
      ],
      '1.2.4',
    );

    expect(changes.map((c) => c.relativePath)).toEqual(['Cargo.toml']);
    expect(changes[0].from).toBe('1.2.3');
  });

  it('stages nothing for a synchronized tree', () => {
    expect(stageChanges([entry('Cargo.toml', cargo, CARGO)], '1.2.3')).toEqual([]);
  });
});

describe('diffLines', () => {
  it('reports the changed line with its number', () => {
    expect(diffLines(CARGO, CARGO.replace('1.2.3', '2.0.0'))).toEqual([
      { line: 3, before: 'version = "1.2.3"', after: 'version = "2.0.0"' },
    ]);
  });

  it('strips carriage returns from reported lines', () => {
    expect(diffLines('1.2.3\r\n', '1.2.4\r\n')).toEqual([
      { line: 1, before: '1.2.3', after: '1.2.4' },
    ]);
  });

  it('reports added lines against an empty before', () => {
    expect(diffLines('a\nb\n', 'a\nb\nc\n')).toEqual([
      { line: 3, before: '', after: 'c' },
    ]);
  });

  it('returns nothing for identical text', () => {
    expect(diffLines(PACKAGE, PACKAGE)).toEqual([]);
  });
});

describe('describeChanges', () => {
  it('builds one diff per staged file', () => {
    const changes = stageChanges([entry('web/package.json', node, PACKAGE)], '1.3.0');

    expect(describeChanges(changes)).toEqual([
      {
        relativePath: 'web/package.json',
        changes: [{ line: 3, before: '  "version": "1.2.3"', after: '  "version": "1.3.0"' }],
      },
    ]);
  });
});
