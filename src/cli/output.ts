/**
 * CLI output formatting.
 *
 * Consistent, scannable output with prefixes. chalk drops colors on its own
 * when stdout is not a terminal. Everything except errors goes quiet under
 * --quiet.
 */

import chalk from 'chalk';
import type { FileDiff, ReportEntry, StagedChange } from '../domain/types.ts';

export const { bold, cyan, green, magenta, red, yellow } = chalk;

let quiet = false;

/**
 * Silence everything but errors until reset.
 */
export function setQuiet(value: boolean): void {
  quiet = value;
}

function print(...lines: string[]): void {
  if (quiet) return;
  for (const line of lines) console.log(line);
}

/**
 * Print info line.
 */
export function info(label: string, value: string): void {
  print(`${label}: ${cyan(value)}`);
}

/**
 * Print success message.
 */
export function success(message: string): void {
  print(green(`✅ ${message}`));
}

/**
 * Print warning message.
 */
export function warn(message: string): void {
  print(yellow(`⚠️  ${message}`));
}

/**
 * Print error message. Never silenced.
 */
export function error(message: string, details?: string): void {
  console.error(red(`❌ ${message}`));
  if (details) {
    console.error(red(`   ${details}`));
  }
}

/**
 * Print dry run notice.
 */
export function dryRun(): void {
  print('', yellow('DRY RUN - no files were changed'), '');
}

/**
 * Print version change.
 */
export function versionChange(from: string, to: string, label: string): void {
  print(`Version: ${cyan(from)} → ${green(to)} (${label})`);
}

/**
 * Print the files a change touches.
 */
export function fileChanges(changes: StagedChange[]): void {
  if (changes.length === 0) return;
  print('', 'Files to update:');
  for (const change of changes) {
    print(`  ${cyan(change.relativePath)}  ${change.from} → ${change.to}`);
  }
}

/**
 * Print changed lines per file.
 */
export function diffs(files: FileDiff[]): void {
  for (const file of files) {
    print('', bold(file.relativePath));
    for (const change of file.changes) {
      print(
        red(`  -${change.line}: ${change.before}`),
        green(`  +${change.line}: ${change.after}`),
      );
    }
  }
}

/**
 * Print one line per manifest with its sync status.
 */
export function report(version: string, entries: ReportEntry[]): void {
  print(`📦 Current version: ${bold(cyan(version))}`);
  if (entries.length === 0) {
    print('', 'No manifests found');
    return;
  }

  const width = Math.max(...entries.map((e) => e.relativePath.length));
  print('', 'Manifests:');
  for (const entry of entries) {
    const mark = entry.inSync ? green('✓') : red('✗');
    const declared = entry.inSync
      ? entry.declared
      : `${yellow(entry.declared)} (expected ${version})`;
    print(`  ${mark} ${entry.relativePath.padEnd(width)}  ${declared}`);
  }
}

/**
 * Print tag creation.
 */
export function tag(name: string): void {
  print(`🏷️  Created git tag: ${magenta(bold(name))}`);
}

/**
 * Print a bare value, for scripting.
 */
export function value(text: string): void {
  console.log(text);
}

/**
 * Print help text.
 */
export function help(text: string): void {
  console.log(text);
}
