/**
 * versync - keep one version in sync across a repository's manifests
 *
 * Commands:
 *   versync [status]     Current version and every manifest
 *   versync show         Print the root version
 *   versync verify       Fail when manifests disagree
 *   versync sync         Write the root version into every manifest
 *   versync bump <kind>  Bump major, minor or patch everywhere
 *   versync reset [ver]  Reset every version file
 *   versync tag          Create a git tag for the current version
 */

import { BUMP_TYPES, isBumpType } from '../lib/semver.ts';
import { describeError, VersyncError } from '../lib/error.ts';
import { VERSION } from '../version_info.ts';
import { bump } from './bump.ts';
import type { ContextOptions } from './context.ts';
import * as output from './output.ts';
import { reset } from './reset.ts';
import { show, status, verify } from './status.ts';
import { sync } from './sync.ts';
import { tag } from './tag.ts';

const HELP = `
${output.bold('versync')} - Keep one version in sync across every manifest

${output.bold('USAGE:')}
  versync [status] [OPTIONS]     Show the current version and every manifest
  versync show                   Print the root version
  versync verify [OPTIONS]       Exit 1 when any manifest disagrees
  versync sync [OPTIONS]         Write the root version into every manifest
  versync bump <kind> [OPTIONS]  Bump major, minor or patch
  versync major|minor|patch      Same as bump <kind>
  versync reset [version]        Reset every version file (default: 0.0.0)
  versync tag [OPTIONS]          Create a git tag for the current version

${output.bold('OPTIONS:')}
  --cascade          Include manifests in subdirectories
  --dry-run          Show the changes without writing
  --root <dir>       Project root (default: current directory)
  --quiet            Only print errors
  --help             Show this help
  --version          Show version

${output.bold('FILES:')}
  VERSION            The root version record
  Cargo.toml         [package].version
  pyproject.toml     [project].version
  package.json       "version"
  .versync.json      Optional: { "versionFile", "tagFormat", "cascade" }

Run \`versync <command> --help\` for command options.
`;

type Command = (args: string[], options: ContextOptions) => Promise<void>;

const COMMANDS = new Map<string, Command>([
  ['status', status],
  ['show', show],
  ['verify', verify],
  ['sync', sync],
  ['bump', bump],
  ['reset', reset],
  ['tag', tag],
]);

/** Options that take the next argument as their value */
const VALUE_OPTIONS = new Set(['--root', '--tag-format']);

/**
 * Index of the command word, skipping any options placed before it; -1
 * when there is none.
 */
function findCommand(args: string[]): number {
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--') return -1;
    if (!arg.startsWith('-')) return i;
    if (VALUE_OPTIONS.has(arg)) i++;
  }
  return -1;
}

async function dispatch(args: string[], options: ContextOptions): Promise<void> {
  const index = findCommand(args);

  if (index === -1) {
    if (args.includes('--help') || args.includes('-h')) {
      output.help(HELP);
      return;
    }
    if (args.includes('--version') || args.includes('-V')) {
      output.value(`versync ${VERSION}`);
      return;
    }
    await status(args, options);
    return;
  }

  const name = args[index];
  const rest = [...args.slice(0, index), ...args.slice(index + 1)];

  if (isBumpType(name)) {
    await bump([name, ...rest], options);
    return;
  }

  const command = COMMANDS.get(name);
  if (!command) {
    throw new VersyncError(
      `Unknown command: ${name}. Commands: ${[...COMMANDS.keys(), ...BUMP_TYPES].join(', ')}`,
      'USAGE_ERROR',
      { command: name },
    );
  }
  await command(rest, options);
}

/**
 * Run the CLI and return the process exit code.
 */
export async function main(args: string[], options: ContextOptions): Promise<number> {
  output.setQuiet(args.includes('--quiet') || args.includes('-q'));
  try {
    await dispatch(args, options);
    return 0;
  } catch (error) {
    if (error instanceof VersyncError) {
      output.error(error.message);
      if (error.code === 'PARTIAL_WRITE_RECOVERED' || error.code === 'PARTIAL_WRITE_UNRECOVERABLE') {
        console.error(output.red('Details:'), error.details);
      }
    } else {
      output.error('Unexpected error', describeError(error));
    }
    return 1;
  } finally {
    output.setQuiet(false);
  }
}
