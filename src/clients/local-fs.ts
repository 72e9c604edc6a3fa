/**
 * Local filesystem client - wraps node:fs.
 */

import { lstat, readdir, readFile, writeFile } from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import type { DirEntry, EntryKind, FileSystem } from './types.ts';

function kindOf(entry: Dirent): EntryKind {
  if (entry.isSymbolicLink()) return 'symlink';
  if (entry.isDirectory()) return 'directory';
  if (entry.isFile()) return 'file';
  return 'other';
}

export class LocalFileSystem implements FileSystem {
  async readDir(path: string): Promise<DirEntry[]> {
    const entries = await readdir(path, { withFileTypes: true });
    return entries.map((entry) => ({ name: entry.name, kind: kindOf(entry) }));
  }

  async readFile(path: string): Promise<string> {
    return await readFile(path, 'utf-8');
  }

  async writeFile(path: string, content: string): Promise<void> {
    await writeFile(path, content, 'utf-8');
  }

  async exists(path: string): Promise<boolean> {
    try {
      await lstat(path);
      return true;
    } catch {
      return false;
    }
  }
}
