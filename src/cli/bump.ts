/**
 * versync bump - Bump the version everywhere at once.
 */

import { VersyncError } from '../lib/error.ts';
import { BUMP_TYPES, isBumpType } from '../lib/semver.ts';
import { expectPositionals, parseCommandArgs } from './args.ts';
import { createContext } from './context.ts';
import type { ContextOptions } from './context.ts';
import * as output from './output.ts';
import { createReleaseTag } from './tag.ts';

const HELP = `
${output.bold('versync bump')} - Bump the root version and every manifest

${output.bold('USAGE:')}
  versync bump <major|minor|patch> [OPTIONS]
  versync <major|minor|patch> [OPTIONS]

${output.bold('OPTIONS:')}
  --cascade           Include manifests in subdirectories
  --dry-run           Show the changes without writing
  --tag               Create a git tag after bumping
  --tag-format <fmt>  Tag template (default: v{version})
  --root <dir>        Project root (default: current directory)
  --quiet             Only print errors
  --help              Show this help

${output.bold('EXAMPLES:')}
  versync bump patch                 # 1.2.3 → 1.2.4
  versync minor --cascade --dry-run  # preview 1.2.3 → 1.3.0 across the tree
`;

export async function bump(args: string[], options: ContextOptions): Promise<void> {
  const parsed = parseCommandArgs(args, {
    boolean: ['cascade', 'dry-run', 'tag'],
    string: ['tag-format'],
  });
  if (parsed.flag('help')) {
    output.help(HELP);
    return;
  }

  const kind: string | undefined = expectPositionals(parsed, 1, 'versync bump <major|minor|patch>')[0];
  if (kind === undefined || !isBumpType(kind)) {
    throw new VersyncError(
      kind === undefined
        ? `Missing bump type. Use one of: ${BUMP_TYPES.join(', ')}`
        : `Invalid bump type: ${kind}. Use one of: ${BUMP_TYPES.join(', ')}`,
      'USAGE_ERROR',
      { kind },
    );
  }

  const { engine, git, config, cascade } = await createContext(parsed, options);
  const dryRun = parsed.flag('dry-run');
  const result = await engine.bump(kind, { cascade, dryRun });

  output.versionChange(result.from, result.version, kind);
  output.fileChanges(result.changes);

  if (dryRun) {
    output.diffs(result.diffs);
    output.dryRun();
    output.info('Would bump to version', result.version);
  } else {
    output.success(`Bumped to version ${result.version}`);
  }

  if (parsed.flag('tag')) {
    await createReleaseTag(engine, git, result.version, parsed.option('tag-format') ?? config.tagFormat, dryRun);
  }
}
