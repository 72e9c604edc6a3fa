/**
 * Configuration management for versync.
 *
 * Reads .versync.json at the root and provides defaults.
 * Most projects won't need a config file.
 */

import { VersyncError } from '../lib/error.ts';
import { DEFAULT_VERSION_FILE } from '../manifest/version-file.ts';
import { DEFAULT_TAG_FORMAT } from './tag.ts';

export const CONFIG_FILE = '.versync.json';

/**
 * versync configuration schema.
 */
export interface VersyncConfig {
  /** Name of the root version record (default: VERSION) */
  versionFile: string;
  /** Tag template (default: v{version}) */
  tagFormat: string;
  /** Walk the whole tree when --cascade is not given (default: false) */
  cascade: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: VersyncConfig = {
  versionFile: DEFAULT_VERSION_FILE,
  tagFormat: DEFAULT_TAG_FORMAT,
  cascade: false,
};

function invalid(field: keyof VersyncConfig, expected: string, value: unknown): VersyncError {
  return new VersyncError(
    `Invalid ${CONFIG_FILE}: ${field} must be ${expected}`,
    'CONFIG_VALIDATION_ERROR',
    { field, value },
  );
}

/**
 * Parse and validate configuration from JSON content.
 */
export function parseConfig(content: string): Partial<VersyncConfig> {
  let parsed: unknown;

  try {
    parsed = JSON.parse(content);
  } catch {
    throw new VersyncError(
      `Invalid ${CONFIG_FILE}: not valid JSON`,
      'CONFIG_PARSE_ERROR',
    );
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new VersyncError(
      `Invalid ${CONFIG_FILE}: expected a JSON object`,
      'CONFIG_PARSE_ERROR',
    );
  }

  const raw: Record<string, unknown> = { ...parsed };
  const config: Partial<VersyncConfig> = {};

  if ('versionFile' in raw) {
    const value = raw.versionFile;
    if (typeof value !== 'string' || value.trim() === '' || /[\\/]/.test(value)) {
      throw invalid('versionFile', 'a plain file name', value);
    }
    config.versionFile = value;
  }

  if ('tagFormat' in raw) {
    const value = raw.tagFormat;
    if (typeof value !== 'string' || value.trim() === '') {
      throw invalid('tagFormat', 'a non-empty string', value);
    }
    config.tagFormat = value;
  }

  if ('cascade' in raw) {
    const value = raw.cascade;
    if (typeof value !== 'boolean') {
      throw invalid('cascade', 'true or false', value);
    }
    config.cascade = value;
  }

  return config;
}

/**
 * Merge partial config with defaults.
 */
export function mergeConfig(partial: Partial<VersyncConfig>): VersyncConfig {
  return { ...DEFAULT_CONFIG, ...partial };
}

/**
 * Load configuration from content, with defaults.
 */
export function loadConfig(content: string | null): VersyncConfig {
  if (!content) {
    return DEFAULT_CONFIG;
  }

  return mergeConfig(parseConfig(content));
}
