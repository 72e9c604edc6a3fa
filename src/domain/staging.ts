/**
 * Staging - compute every new file content before anything is written.
 *
 * Pure functions, no I/O.
 */

import type { FileDiff, LineChange, ManifestEntry, StagedChange } from './types.ts';

/**
 * Stage `version` into each entry, in the given order.
 *
 * Files whose content would not change are left out, so staging an already
 * synchronized tree yields nothing.
 */
export function stageChanges(entries: ManifestEntry[], version: string): StagedChange[] {
  const changes: StagedChange[] = [];

  for (const entry of entries) {
    const content = entry.adapter.writeVersion(entry.content, version);
    if (content === entry.content) continue;

    changes.push({
      path: entry.path,
      relativePath: entry.relativePath,
      format: entry.format,
      original: entry.content,
      content,
      from: entry.declared,
      to: version,
    });
  }

  return changes;
}

function splitLines(text: string): string[] {
  return text.split('\n').map((line) => line.replace(/\r$/, ''));
}

/**
 * Changed lines between two versions of a file.
 */
export function diffLines(before: string, after: string): LineChange[] {
  const a = splitLines(before);
  const b = splitLines(after);

  let prefix = 0;
  while (prefix < a.length && prefix < b.length && a[prefix] === b[prefix]) prefix++;

  let suffix = 0;
  while (
    suffix < a.length - prefix &&
    suffix < b.length - prefix &&
    a[a.length - 1 - suffix] === b[b.length - 1 - suffix]
  ) suffix++;

  const changes: LineChange[] = [];
  const span = Math.max(a.length, b.length) - prefix - suffix;
  for (let i = 0; i < span; i++) {
    const index = prefix + i;
    const beforeLine = index < a.length - suffix ? a[index] : '';
    const afterLine = index < b.length - suffix ? b[index] : '';
    if (beforeLine !== afterLine) {
      changes.push({ line: index + 1, before: beforeLine, after: afterLine });
    }
  }
  return changes;
}

/**
 * Per-file diffs for a dry run.
 */
export function describeChanges(changes: StagedChange[]): FileDiff[] {
  return changes.map((change) => ({
    relativePath: change.relativePath,
    changes: diffLines(change.original, change.content),
  }));
}
