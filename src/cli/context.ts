/**
 * Per-invocation context: the resolved root, its configuration and an
 * engine bound to both.
 */

import { join, resolve } from 'node:path';
import { LocalFileSystem } from '../clients/local-fs.ts';
import { LocalGit } from '../clients/local-git.ts';
import type { FileSystem, GitClient } from '../clients/types.ts';
import { SyncEngine } from '../core/engine.ts';
import { CONFIG_FILE, loadConfig } from '../domain/config.ts';
import type { VersyncConfig } from '../domain/config.ts';
import type { ParsedArgs } from './args.ts';

export interface CommandContext {
  root: string;
  config: VersyncConfig;
  engine: SyncEngine;
  git: GitClient;
  /** Walk the whole tree (--cascade, or `cascade` in the config file) */
  cascade: boolean;
}

export interface ContextOptions {
  /** Directory relative roots resolve against */
  cwd: string;
  fs?: FileSystem;
  /** Git client for the resolved root; defaults to the local git binary */
  git?: (root: string) => GitClient;
}

export async function createContext(
  parsed: ParsedArgs,
  options: ContextOptions,
): Promise<CommandContext> {
  const fs = options.fs ?? new LocalFileSystem();
  const root = resolve(options.cwd, parsed.option('root') ?? '.');

  const configPath = join(root, CONFIG_FILE);
  const config = loadConfig(await fs.exists(configPath) ? await fs.readFile(configPath) : null);

  return {
    root,
    config,
    engine: new SyncEngine(root, { fs, versionFile: config.versionFile }),
    git: options.git ? options.git(root) : new LocalGit(root),
    cascade: parsed.flag('cascade') || config.cascade,
  };
}
