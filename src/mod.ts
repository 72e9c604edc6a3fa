// Main module exports for programmatic usage

export type * from './domain/types.ts';
export * from './manifest/mod.ts';
export { SyncEngine } from './core/engine.ts';
export type { EngineOptions, EngineState, RunOptions } from './core/engine.ts';
export { walkTree } from './core/walker.ts';
export type { WalkOptions } from './core/walker.ts';
export { LocalFileSystem } from './clients/local-fs.ts';
export { LocalGit } from './clients/local-git.ts';
export type { DirEntry, EntryKind, FileSystem, GitClient } from './clients/types.ts';
export { CONFIG_FILE, DEFAULT_CONFIG, loadConfig, parseConfig } from './domain/config.ts';
export type { VersyncConfig } from './domain/config.ts';
export { DEFAULT_TAG_FORMAT, expandTagTemplate } from './domain/tag.ts';
export { describeError, VersyncError } from './lib/error.ts';
export type { ErrorCode } from './lib/error.ts';
export * as semver from './lib/semver.ts';
export { VERSION } from './version_info.ts';

// Convenience export for one-shot synchronization
import { SyncEngine } from './core/engine.ts';
import type { EngineOptions, RunOptions } from './core/engine.ts';
import type { OperationResult, VerifyReport } from './domain/types.ts';

export interface SynchronizeOptions extends EngineOptions, RunOptions {}

/**
 * Force every manifest under `root` to the root version.
 */
export function synchronize(root: string, options: SynchronizeOptions = {}): Promise<OperationResult> {
  return new SyncEngine(root, options).sync(options);
}

/**
 * Check every manifest under `root` against the root version.
 */
export function check(root: string, options: SynchronizeOptions = {}): Promise<VerifyReport> {
  return new SyncEngine(root, options).verify(options);
}
