/**
 * Shared helpers for TOML manifests with the version under a named table.
 *
 * Reading goes through a real TOML parser. Writing edits the single
 * `version = "…"` line of the table in place and re-parses the result, so a
 * line that only looks like the field (inside a multi-line string, say) is
 * never rewritten silently.
 */

import { parse } from 'smol-toml';
import { describeError, VersyncError } from '../lib/error.ts';

const TABLE_HEADER = /^\s*\[\s*([^[\]]+?)\s*\]\s*(?:#.*)?$/;
const ARRAY_TABLE_HEADER = /^\s*\[\[/;
const VERSION_LINE = /^(\s*version\s*=\s*)(["'])([^"'\n]*)\2/;

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) &&
    !(value instanceof Date);
}

/**
 * Read `[table].version` from TOML content.
 */
export function readTomlVersion(content: string, table: string, filename: string): string {
  let doc: Record<string, unknown>;
  try {
    doc = parse(content);
  } catch (error) {
    throw new VersyncError(
      `Failed to parse ${filename}: ${describeError(error)}`,
      'MALFORMED_MANIFEST',
      { file: filename },
    );
  }

  const section = doc[table];
  const version = isTable(section) ? section.version : undefined;
  if (typeof version !== 'string') {
    throw new VersyncError(
      `No version found in ${filename} [${table}] section`,
      'MISSING_VERSION_FIELD',
      { file: filename, table },
    );
  }
  return version;
}

/**
 * Replace `[table].version` in TOML content, keeping quotes, spacing and
 * trailing comments on the line.
 */
export function writeTomlVersion(
  content: string,
  table: string,
  version: string,
  filename: string,
): string {
  // Validates the document before any editing
  readTomlVersion(content, table, filename);

  const lines = content.split(/(?<=\n)/);
  let current: string | null = null;
  const hits: number[] = [];

  lines.forEach((line, index) => {
    const body = line.replace(/\r?\n$/, '');
    if (ARRAY_TABLE_HEADER.test(body)) {
      current = null;
      return;
    }
    const header = body.match(TABLE_HEADER);
    if (header) {
      current = header[1];
      return;
    }
    if (current === table && VERSION_LINE.test(body)) {
      hits.push(index);
    }
  });

  if (hits.length !== 1) {
    throw new VersyncError(
      hits.length === 0
        ? `No version field found in [${table}] section of ${filename}`
        : `Found ${hits.length} version lines in [${table}] section of ${filename}; cannot tell which one to update`,
      'MALFORMED_MANIFEST',
      { file: filename, table },
    );
  }

  const [index] = hits;
  lines[index] = lines[index].replace(
    VERSION_LINE,
    (_match, prefix: string, quote: string) => `${prefix}${quote}${version}${quote}`,
  );
  const updated = lines.join('');

  if (readTomlVersion(updated, table, filename) !== version) {
    throw new VersyncError(
      `Could not locate the [${table}] version of ${filename} unambiguously`,
      'MALFORMED_MANIFEST',
      { file: filename, table },
    );
  }

  return updated;
}
