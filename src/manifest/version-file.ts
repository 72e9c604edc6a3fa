import { VersyncError } from '../lib/error.ts';
import type { ManifestAdapter } from './interface.ts';

export const DEFAULT_VERSION_FILE = 'VERSION';

/**
 * Adapter for the root version record: a plain text file holding a single
 * version string. Whitespace around the version (trailing newline included)
 * is preserved on write.
 */
export class VersionFileManifest implements ManifestAdapter {
  readonly format = 'version-file';
  readonly field = 'file content';

  constructor(readonly filename: string = DEFAULT_VERSION_FILE) {}

  detect(filename: string): boolean {
    return filename === this.filename;
  }

  readVersion(content: string): string {
    return this.locate(content).token;
  }

  writeVersion(content: string, version: string): string {
    const { token, start } = this.locate(content, 'MALFORMED_MANIFEST');
    return content.slice(0, start) + version + content.slice(start + token.length);
  }

  private locate(
    content: string,
    emptyCode: 'MISSING_VERSION_FIELD' | 'MALFORMED_MANIFEST' = 'MISSING_VERSION_FIELD',
  ): { token: string; start: number } {
    const token = content.trim();
    if (token === '') {
      throw new VersyncError(
        `${this.filename} is empty. Write a version such as 0.1.0 into it.`,
        emptyCode,
        { file: this.filename },
      );
    }
    if (/\s/.test(token)) {
      throw new VersyncError(
        `${this.filename} must contain exactly one version string, found '${token}'`,
        'MALFORMED_MANIFEST',
        { file: this.filename },
      );
    }
    return { token, start: content.indexOf(token) };
  }
}
