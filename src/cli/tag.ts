/**
 * versync tag - Create a git tag for the current version.
 */

import type { GitClient } from '../clients/types.ts';
import type { SyncEngine } from '../core/engine.ts';
import { assertPolicies, checkVersionsInSync } from '../domain/policy.ts';
import { expandTagTemplate, tagMessage } from '../domain/tag.ts';
import { VersyncError } from '../lib/error.ts';
import { parse } from '../lib/semver.ts';
import { expectPositionals, parseCommandArgs } from './args.ts';
import { createContext } from './context.ts';
import type { ContextOptions } from './context.ts';
import * as output from './output.ts';

const HELP = `
${output.bold('versync tag')} - Create an annotated git tag for the current version

${output.bold('USAGE:')}
  versync tag [OPTIONS]

${output.bold('OPTIONS:')}
  --tag-format <fmt>  Tag template (default: v{version})
                      Placeholders: {version} {major} {minor} {patch} {repository_name}
  --cascade           Check manifests in subdirectories before tagging
  --dry-run           Print the tag name without creating it
  --root <dir>        Project root (default: current directory)
  --quiet             Only print errors
  --help              Show this help

${output.bold('EXAMPLES:')}
  versync tag                                   # v1.4.0
  versync tag --tag-format '{repository_name}-{version}'
`;

/**
 * Tag `version` in the engine's root. Returns the tag name.
 */
export async function createReleaseTag(
  engine: SyncEngine,
  git: GitClient,
  version: string,
  template: string,
  dryRun: boolean,
): Promise<string> {
  const parsed = parse(version);
  const name = expandTagTemplate(template, parsed, engine.repositoryName);

  if (dryRun) {
    output.info('Would create tag', name);
    return name;
  }

  if (!(await git.isRepository())) {
    throw new VersyncError(
      `${engine.root} is not inside a git repository, so tag ${name} cannot be created. Run \`git init\` or drop --tag.`,
      'GIT_ERROR',
      { root: engine.root, tag: name },
    );
  }

  await git.createTag(name, tagMessage(name, parsed));
  output.tag(name);
  return name;
}

export async function tag(args: string[], options: ContextOptions): Promise<void> {
  const parsed = parseCommandArgs(args, {
    boolean: ['cascade', 'dry-run'],
    string: ['tag-format'],
  });
  if (parsed.flag('help')) {
    output.help(HELP);
    return;
  }
  expectPositionals(parsed, 0, 'versync tag [--tag-format <fmt>]');

  const { engine, git, config, cascade } = await createContext(parsed, options);
  const report = await engine.verify({ cascade });
  assertPolicies([checkVersionsInSync(report.mismatches, report.versionFile)]);

  await createReleaseTag(
    engine,
    git,
    report.version,
    parsed.option('tag-format') ?? config.tagFormat,
    parsed.flag('dry-run'),
  );
}
