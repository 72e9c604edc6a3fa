/**
 * Tag name templates.
 *
 * Pure string substitution; creating the tag is the git client's job.
 */

import type { ParsedVersion } from '../lib/semver.ts';
import { format } from '../lib/semver.ts';

export const DEFAULT_TAG_FORMAT = 'v{version}';

const PLACEHOLDER = /\{(version|major|minor|patch|repository_name)\}/g;

/**
 * Expand `{version}`, `{major}`, `{minor}`, `{patch}` and
 * `{repository_name}`. Unknown placeholders are left as written.
 */
export function expandTagTemplate(
  template: string,
  version: ParsedVersion,
  repositoryName: string,
): string {
  const values: Record<string, string> = {
    version: format(version),
    major: String(version.major),
    minor: String(version.minor),
    patch: String(version.patch),
    repository_name: repositoryName,
  };
  return template.replace(PLACEHOLDER, (_match, name: string) => values[name]);
}

/**
 * Annotated tag message for a release.
 */
export function tagMessage(tag: string, version: ParsedVersion): string {
  return `Release ${tag}\n\nVersion: ${format(version)}`;
}
