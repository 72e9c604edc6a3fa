/**
 * Local git client - wraps git CLI commands.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { GitClient } from './types.ts';
import { VersyncError } from '../lib/error.ts';

const execFileAsync = promisify(execFile);

function stderrOf(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'stderr' in error) {
    return String(error.stderr).trim();
  }
  return error instanceof Error ? error.message : String(error);
}

export class LocalGit implements GitClient {
  constructor(private cwd: string) {}

  /**
   * Execute a git command and return stdout.
   */
  private async exec(args: string[]): Promise<string> {
    try {
      const { stdout } = await execFileAsync('git', args, { cwd: this.cwd });
      return stdout.trim();
    } catch (e) {
      const error = stderrOf(e);
      throw new VersyncError(
        `Git command failed: git ${args.join(' ')}\n${error}`,
        'GIT_ERROR',
        { args, error },
      );
    }
  }

  /**
   * Execute git command, returning null on failure instead of throwing.
   */
  private async execSafe(args: string[]): Promise<string | null> {
    try {
      return await this.exec(args);
    } catch {
      return null;
    }
  }

  async isRepository(): Promise<boolean> {
    const result = await this.execSafe(['rev-parse', '--is-inside-work-tree']);
    return result === 'true';
  }

  async tagExists(tag: string): Promise<boolean> {
    const result = await this.execSafe(['tag', '-l', tag]);
    return result === tag;
  }

  async createTag(name: string, message: string): Promise<void> {
    if (await this.tagExists(name)) {
      throw new VersyncError(
        `Tag ${name} already exists. Delete it with \`git tag -d ${name}\` or bump the version first.`,
        'TAG_EXISTS',
        { tag: name },
      );
    }
    // Create annotated tag with message
    await this.exec(['tag', '-a', name, '-m', message]);
  }
}
