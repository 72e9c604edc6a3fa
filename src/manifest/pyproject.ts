import type { ManifestAdapter } from './interface.ts';
import { readTomlVersion, writeTomlVersion } from './toml.ts';

/**
 * Manifest handler for pyproject.toml files (`[project].version`).
 */
export class PyProjectManifest implements ManifestAdapter {
  readonly format = 'pyproject';
  readonly field = '[project].version';
  readonly filename = 'pyproject.toml';

  detect(filename: string): boolean {
    return filename === this.filename;
  }

  readVersion(content: string): string {
    return readTomlVersion(content, 'project', this.filename);
  }

  writeVersion(content: string, version: string): string {
    return writeTomlVersion(content, 'project', version, this.filename);
  }
}
