/**
 * Structured error with code for programmatic handling.
 *
 * Every error must answer: What happened? Why? How do I fix it?
 */

export type ErrorCode =
  // Version values
  | 'INVALID_VERSION_FORMAT'
  // Layout policy
  | 'MISSING_ROOT_VERSION'
  | 'MULTIPLE_ROOT_VERSIONS'
  | 'NESTED_VERSION_RECORD'
  | 'SYMLINK_MANIFEST_REJECTED'
  | 'UNREADABLE_MANIFEST'
  // Manifest adapters
  | 'MISSING_VERSION_FIELD'
  | 'MALFORMED_MANIFEST'
  // Synchronization
  | 'VERSION_MISMATCH'
  | 'CONCURRENT_MODIFICATION_DETECTED'
  | 'PARTIAL_WRITE_RECOVERED'
  | 'PARTIAL_WRITE_UNRECOVERABLE'
  // Ambient
  | 'CONFIG_PARSE_ERROR'
  | 'CONFIG_VALIDATION_ERROR'
  | 'GIT_ERROR'
  | 'TAG_EXISTS'
  | 'USAGE_ERROR';

export class VersyncError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'VersyncError';
  }
}

/**
 * Render an unknown thrown value as a message.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
