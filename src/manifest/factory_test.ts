import { describe, expect, it } from 'vitest';
import { createRegistry } from './factory.ts';

describe('ManifestRegistry', () => {
  it('dispatches by exact file name', () => {
    const registry = createRegistry();

    expect(registry.match('VERSION')?.format).toBe('version-file');
    expect(registry.match('Cargo.toml')?.format).toBe('cargo');
    expect(registry.match('pyproject.toml')?.format).toBe('pyproject');
    expect(registry.match('package.json')?.format).toBe('package-json');
    expect(registry.match('README.md')).toBeNull();
    expect(registry.match('cargo.toml')).toBeNull();
  });

  it('claims each known file with exactly one adapter', () => {
    const registry = createRegistry();
    for (const name of ['VERSION', 'Cargo.toml', 'pyproject.toml', 'package.json']) {
      expect(registry.all.filter((adapter) => adapter.detect(name))).toHaveLength(1);
    }
  });

  it('supports a custom version file name', () => {
    const registry = createRegistry('RELEASE');

    expect(registry.isVersionRecord('RELEASE')).toBe(true);
    expect(registry.isVersionRecord('VERSION')).toBe(false);
    expect(registry.match('VERSION')).toBeNull();
  });

  it('rejects a version file name that collides with a manifest', () => {
    expect(() => createRegistry('package.json')).toThrow(
      expect.objectContaining({ code: 'CONFIG_VALIDATION_ERROR' }),
    );
  });
});
