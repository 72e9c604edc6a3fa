import type { ManifestAdapter } from './interface.ts';
import { readTomlVersion, writeTomlVersion } from './toml.ts';

/**
 * Manifest handler for Cargo.toml files (`[package].version`).
 *
 * Workspace-inherited versions (`version.workspace = true`) carry no
 * literal value and read as a missing field.
 */
export class CargoManifest implements ManifestAdapter {
  readonly format = 'cargo';
  readonly field = '[package].version';
  readonly filename = 'Cargo.toml';

  detect(filename: string): boolean {
    return filename === this.filename;
  }

  readVersion(content: string): string {
    return readTomlVersion(content, 'package', this.filename);
  }

  writeVersion(content: string, version: string): string {
    return writeTomlVersion(content, 'package', version, this.filename);
  }
}
