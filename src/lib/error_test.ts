/**
 * Tests for VersyncError.
 */

import { describe, expect, it } from 'vitest';
import { describeError, VersyncError } from './error.ts';

describe('VersyncError', () => {
  it('creates error with message and code', () => {
    const error = new VersyncError('Something went wrong', 'USAGE_ERROR');

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(VersyncError);
    expect(error.message).toBe('Something went wrong');
    expect(error.code).toBe('USAGE_ERROR');
    expect(error.name).toBe('VersyncError');
    expect(error.details).toBeUndefined();
  });

  it('creates error with details', () => {
    const error = new VersyncError('Invalid version', 'INVALID_VERSION_FORMAT', {
      input: 'abc',
    });

    expect(error.message).toBe('Invalid version');
    expect(error.code).toBe('INVALID_VERSION_FORMAT');
    expect(error.details).toEqual({ input: 'abc' });
  });

  it('has a stack trace', () => {
    const error = new VersyncError('Test', 'GIT_ERROR');
    expect(typeof error.stack).toBe('string');
  });

  it('can be caught as Error', () => {
    try {
      throw new VersyncError('Test error', 'TAG_EXISTS');
    } catch (e) {
      expect(e).toBeInstanceOf(Error);
      if (e instanceof VersyncError) {
        expect(e.code).toBe('TAG_EXISTS');
      }
    }
  });
});

describe('describeError', () => {
  it('uses the message of Error instances', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
  });

  it('stringifies other values', () => {
    expect(describeError('plain')).toBe('plain');
    expect(describeError(42)).toBe('42');
  });
});
