/**
 * The installed `versync` bin, run as its own process from outside the
 * package directory.
 */

import { fileURLToPath } from 'node:url';
import { describe, expect, it } from 'vitest';
import { createTestTree, run } from './test_helpers.ts';

const BIN = fileURLToPath(new URL('../../bin/versync.js', import.meta.url));

describe('versync bin', () => {
  it('runs from an unrelated working directory', async () => {
    const { dir, cleanup } = await createTestTree({ VERSION: '3.1.4\n' });
    try {
      expect(await run(dir, [process.execPath, BIN, '--version'])).toBe('versync 0.1.0');
      expect(await run(dir, [process.execPath, BIN, 'show'])).toBe('3.1.4');
    } finally {
      await cleanup();
    }
  }, 30_000);
});
