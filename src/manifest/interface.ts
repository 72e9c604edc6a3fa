/**
 * Manifest adapter interface for reading/writing versions in project files.
 *
 * Adapters are pure: they work on file text and never touch the disk.
 * Implementations handle specific file formats:
 * - VERSION (the root version record)
 * - Cargo.toml
 * - pyproject.toml
 * - package.json
 */

/** Closed set of supported formats. */
export type ManifestFormat = 'version-file' | 'cargo' | 'pyproject' | 'package-json';

export interface ManifestAdapter {
  /** Unique identifier for this manifest format */
  readonly format: ManifestFormat;

  /** Human-readable location of the version field, used in messages */
  readonly field: string;

  /** Whether a file with this name is handled by this adapter */
  detect(filename: string): boolean;

  /**
   * Read the declared version string.
   * Throws MISSING_VERSION_FIELD or MALFORMED_MANIFEST.
   */
  readVersion(content: string): string;

  /**
   * Return `content` with the version value replaced, every other byte intact.
   * Throws MALFORMED_MANIFEST when the field cannot be located unambiguously.
   */
  writeVersion(content: string, version: string): string;
}
