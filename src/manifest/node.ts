import { describeError, VersyncError } from '../lib/error.ts';
import type { ManifestAdapter } from './interface.ts';

interface Span {
  start: number;
  end: number;
}

/**
 * Manifest handler for package.json files.
 *
 * Preserves formatting by splicing the new value into the original text
 * instead of JSON.parse/stringify, which would reflow the whole file.
 * Only the top-level "version" key is touched.
 */
export class NodeManifest implements ManifestAdapter {
  readonly format = 'package-json';
  readonly field = '"version"';
  readonly filename = 'package.json';

  detect(filename: string): boolean {
    return filename === this.filename;
  }

  readVersion(content: string): string {
    const json = this.parseObject(content);
    if (typeof json.version !== 'string') {
      throw new VersyncError(
        'No version found in package.json',
        'MISSING_VERSION_FIELD',
        { file: this.filename },
      );
    }
    return json.version;
  }

  writeVersion(content: string, version: string): string {
    this.readVersion(content);

    const spans = findTopLevelStringValues(content, 'version');
    if (spans.length !== 1) {
      throw new VersyncError(
        `package.json declares "version" ${spans.length} times at the top level; cannot tell which one to update`,
        'MALFORMED_MANIFEST',
        { file: this.filename },
      );
    }

    const [{ start, end }] = spans;
    return content.slice(0, start) + JSON.stringify(version) + content.slice(end);
  }

  private parseObject(content: string): Record<string, unknown> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new VersyncError(
        `Failed to parse package.json: ${describeError(error)}`,
        'MALFORMED_MANIFEST',
        { file: this.filename },
      );
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new VersyncError(
        'package.json root is not a JSON object',
        'MALFORMED_MANIFEST',
        { file: this.filename },
      );
    }
    return { ...parsed };
  }
}

/**
 * Return the index just past the closing quote of the string starting at
 * `start`, or -1 if it never closes.
 */
function skipString(text: string, start: number): number {
  for (let i = start + 1; i < text.length; i++) {
    const c = text[i];
    if (c === '\\') {
      i++;
      continue;
    }
    if (c === '"') return i + 1;
  }
  return -1;
}

function skipWhitespace(text: string, start: number): number {
  let i = start;
  while (i < text.length && /\s/.test(text[i])) i++;
  return i;
}

/**
 * Locate string values of `key` in the root object of already-validated JSON.
 * Spans include the surrounding quotes.
 */
export function findTopLevelStringValues(content: string, key: string): Span[] {
  const spans: Span[] = [];
  let depth = 0;
  let expectKey = false;
  let i = 0;

  while (i < content.length) {
    const c = content[i];

    if (c === '"') {
      const end = skipString(content, i);
      if (end < 0) break;

      if (depth === 1 && expectKey) {
        expectKey = false;
        const name: unknown = JSON.parse(content.slice(i, end));
        const colon = skipWhitespace(content, end);
        if (name === key && content[colon] === ':') {
          const valueStart = skipWhitespace(content, colon + 1);
          if (content[valueStart] === '"') {
            const valueEnd = skipString(content, valueStart);
            if (valueEnd < 0) break;
            spans.push({ start: valueStart, end: valueEnd });
            i = valueEnd;
            continue;
          }
        }
      }

      i = end;
      continue;
    }

    if (c === '{' || c === '[') {
      depth++;
      expectKey = c === '{' && depth === 1;
    } else if (c === '}' || c === ']') {
      depth--;
    } else if (c === ',' && depth === 1) {
      expectKey = true;
    }
    i++;
  }

  return spans;
}
