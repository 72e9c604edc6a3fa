/**
 * Ordered commit of staged changes with best-effort rollback.
 *
 * There are no filesystem transactions: every new content is computed
 * before the first write, files are written one by one in staging order,
 * and on failure every file touched so far is put back.
 */

import type { FileSystem } from '../clients/types.ts';
import type { StagedChange } from '../domain/types.ts';
import { describeError, VersyncError } from '../lib/error.ts';

interface Rollback {
  restored: string[];
  unrestored: { relativePath: string; error: string }[];
}

async function holdsOriginal(fs: FileSystem, change: StagedChange): Promise<boolean> {
  try {
    return (await fs.readFile(change.path)) === change.original;
  } catch {
    return false;
  }
}

/**
 * Put files back to the content captured at validation, newest first.
 */
async function rollback(fs: FileSystem, touched: StagedChange[]): Promise<Rollback> {
  const outcome: Rollback = { restored: [], unrestored: [] };

  for (const change of [...touched].reverse()) {
    if (await holdsOriginal(fs, change)) {
      outcome.restored.push(change.relativePath);
      continue;
    }
    try {
      await fs.writeFile(change.path, change.original);
      outcome.restored.push(change.relativePath);
    } catch (error) {
      outcome.unrestored.push({ relativePath: change.relativePath, error: describeError(error) });
    }
  }

  return outcome;
}

function unrecoverable(what: string, failed: StagedChange, outcome: Rollback): VersyncError {
  const list = outcome.unrestored.map((u) => `  ${u.relativePath} (${u.error})`).join('\n');
  return new VersyncError(
    `${what}, and ${outcome.unrestored.length} file(s) could not be restored:\n${list}\n\n` +
      'Check these files and restore them from version control.',
    'PARTIAL_WRITE_UNRECOVERABLE',
    {
      path: failed.path,
      restored: outcome.restored,
      unrestored: outcome.unrestored.map((u) => u.relativePath),
    },
  );
}

/**
 * Write every staged change in order.
 *
 * Each file is re-read right before its write; content that changed since
 * validation aborts the commit with CONCURRENT_MODIFICATION_DETECTED. A
 * failed write rolls back and reports PARTIAL_WRITE_RECOVERED, or
 * PARTIAL_WRITE_UNRECOVERABLE naming the files left modified.
 */
export async function commitChanges(fs: FileSystem, changes: StagedChange[]): Promise<void> {
  const written: StagedChange[] = [];

  for (const change of changes) {
    let current: string;
    try {
      current = await fs.readFile(change.path);
    } catch (error) {
      const what = `Failed to re-read ${change.relativePath} before writing: ${describeError(error)}`;
      const outcome = await rollback(fs, written);
      if (outcome.unrestored.length > 0) throw unrecoverable(what, change, outcome);
      throw new VersyncError(
        `${what}. Restored ${outcome.restored.length} file(s); nothing was changed.`,
        'PARTIAL_WRITE_RECOVERED',
        { path: change.path, cause: describeError(error), restored: outcome.restored },
      );
    }

    if (current !== change.original) {
      const what = `${change.relativePath} changed on disk after it was read`;
      const outcome = await rollback(fs, written);
      if (outcome.unrestored.length > 0) throw unrecoverable(what, change, outcome);
      throw new VersyncError(
        `${what}. No files were changed; re-run the command.`,
        'CONCURRENT_MODIFICATION_DETECTED',
        { path: change.path, restored: outcome.restored },
      );
    }

    try {
      await fs.writeFile(change.path, change.content);
    } catch (error) {
      const what = `Failed to write ${change.relativePath}: ${describeError(error)}`;
      // The failed write may have truncated the file, so it is restored too
      const outcome = await rollback(fs, [...written, change]);
      if (outcome.unrestored.length > 0) throw unrecoverable(what, change, outcome);
      throw new VersyncError(
        `${what}. Restored ${outcome.restored.length} file(s) to their previous content.`,
        'PARTIAL_WRITE_RECOVERED',
        { path: change.path, cause: describeError(error), restored: outcome.restored },
      );
    }

    written.push(change);
  }
}
