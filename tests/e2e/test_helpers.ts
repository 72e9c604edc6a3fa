/**
 * Shared test helpers for unit, integration and e2e tests.
 *
 * Trees live in real temporary directories; failures are injected through
 * a FileSystem wrapper.
 */

import { execFile } from 'node:child_process';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, dirname, join } from 'node:path';
import { promisify } from 'node:util';
import { LocalFileSystem } from '../../src/clients/local-fs.ts';
import { LocalGit } from '../../src/clients/local-git.ts';
import type { DirEntry, FileSystem } from '../../src/clients/types.ts';

const execFileAsync = promisify(execFile);

export type Files = Record<string, string>;

/**
 * Write files given by root-relative path, creating directories.
 */
export async function writeFiles(dir: string, files: Files): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const path = join(dir, relativePath);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content, 'utf-8');
  }
}

/**
 * Read a root-relative file.
 */
export async function readText(dir: string, relativePath: string): Promise<string> {
  return await readFile(join(dir, relativePath), 'utf-8');
}

/**
 * Read several files at once, keyed by relative path.
 */
export async function snapshot(dir: string, relativePaths: string[]): Promise<Files> {
  const result: Files = {};
  for (const relativePath of relativePaths) {
    result[relativePath] = await readText(dir, relativePath);
  }
  return result;
}

/**
 * Create a temporary tree holding `files`.
 */
export async function createTestTree(files: Files = {}): Promise<{
  dir: string;
  cleanup: () => Promise<void>;
}> {
  const dir = await mkdtemp(join(tmpdir(), 'versync-test-'));
  await writeFiles(dir, files);

  const cleanup = async () => {
    await rm(dir, { recursive: true, force: true });
  };

  return { dir, cleanup };
}

/**
 * Create a temporary git repository holding `files`.
 */
export async function createTestRepo(files: Files = {}): Promise<{
  dir: string;
  git: LocalGit;
  cleanup: () => Promise<void>;
}> {
  const { dir, cleanup } = await createTestTree(files);

  await run(dir, ['git', 'init', '-b', 'main']);

  // Configure git user for commits
  await run(dir, ['git', 'config', 'user.email', 'test@example.com']);
  await run(dir, ['git', 'config', 'user.name', 'Test User']);

  // Disable signing (may be enabled globally in some environments)
  await run(dir, ['git', 'config', 'commit.gpgsign', 'false']);
  await run(dir, ['git', 'config', 'tag.gpgsign', 'false']);

  return { dir, git: new LocalGit(dir), cleanup };
}

/**
 * Run a command in a directory.
 */
export async function run(cwd: string, cmd: string[]): Promise<string> {
  const [file, ...args] = cmd;
  try {
    const { stdout } = await execFileAsync(file, args, { cwd });
    return stdout.trim();
  } catch (error) {
    throw new Error(`Command failed: ${cmd.join(' ')}\n${String(error)}`);
  }
}

/**
 * FileSystem that fails chosen writes. `failWrite` receives the 1-based
 * number of the write attempt and the path.
 */
export class FaultyFileSystem implements FileSystem {
  writes = 0;
  private readonly inner: FileSystem = new LocalFileSystem();

  constructor(private readonly failWrite: (attempt: number, path: string) => boolean) {}

  readDir(path: string): Promise<DirEntry[]> {
    return this.inner.readDir(path);
  }

  readFile(path: string): Promise<string> {
    return this.inner.readFile(path);
  }

  async writeFile(path: string, content: string): Promise<void> {
    this.writes++;
    if (this.failWrite(this.writes, path)) {
      throw new Error(`injected failure writing ${basename(path)}`);
    }
    await this.inner.writeFile(path, content);
  }

  exists(path: string): Promise<boolean> {
    return this.inner.exists(path);
  }
}
