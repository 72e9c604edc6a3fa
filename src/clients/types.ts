/**
 * Client interfaces for infrastructure operations.
 *
 * All I/O is isolated in these clients, so the engine can run against a
 * temporary directory or a wrapper that injects failures.
 */

export type EntryKind = 'file' | 'directory' | 'symlink' | 'other';

export interface DirEntry {
  name: string;
  kind: EntryKind;
}

/**
 * Filesystem operations. Paths are absolute.
 */
export interface FileSystem {
  /** List a directory without following symlinks. */
  readDir(path: string): Promise<DirEntry[]>;
  /** Read a UTF-8 file; throws if it cannot be read. */
  readFile(path: string): Promise<string>;
  /** Replace a file's content. */
  writeFile(path: string, content: string): Promise<void>;
  /** Whether anything (file, directory or link) exists at the path. */
  exists(path: string): Promise<boolean>;
}

/**
 * Git operations needed once a version is committed (local git CLI).
 */
export interface GitClient {
  isRepository(): Promise<boolean>;
  tagExists(tag: string): Promise<boolean>;
  createTag(name: string, message: string): Promise<void>;
}
