/**
 * versync reset - Set every version file to a given version.
 */

import { expectPositionals, parseCommandArgs } from './args.ts';
import { createContext } from './context.ts';
import type { ContextOptions } from './context.ts';
import * as output from './output.ts';

const HELP = `
${output.bold('versync reset')} - Reset the root version and every manifest

${output.bold('USAGE:')}
  versync reset [version] [OPTIONS]

${output.bold('ARGUMENTS:')}
  version            Target version (default: 0.0.0)

${output.bold('OPTIONS:')}
  --cascade          Include manifests in subdirectories
  --dry-run          Show the changes without writing
  --root <dir>       Project root (default: current directory)
  --quiet            Only print errors
  --help             Show this help

${output.bold('EXAMPLES:')}
  versync reset                # 0.0.0
  versync reset 1.0.0-rc.1
`;

export async function reset(args: string[], options: ContextOptions): Promise<void> {
  const parsed = parseCommandArgs(args, { boolean: ['cascade', 'dry-run'] });
  if (parsed.flag('help')) {
    output.help(HELP);
    return;
  }
  const target: string | undefined = expectPositionals(parsed, 1, 'versync reset [version]')[0];

  const { engine, cascade } = await createContext(parsed, options);
  const dryRun = parsed.flag('dry-run');
  const result = await engine.reset(target, { cascade, dryRun });

  output.versionChange(result.from, result.version, 'reset');
  output.fileChanges(result.changes);

  if (dryRun) {
    output.diffs(result.diffs);
    output.dryRun();
    output.info('Would reset to version', result.version);
  } else {
    output.success(`Version reset to ${result.version}`);
  }
}
