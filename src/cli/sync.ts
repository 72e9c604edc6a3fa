/**
 * versync sync - Force every manifest to the root version.
 */

import { expectPositionals, parseCommandArgs } from './args.ts';
import { createContext } from './context.ts';
import type { ContextOptions } from './context.ts';
import * as output from './output.ts';

const HELP = `
${output.bold('versync sync')} - Write the root version into every manifest

${output.bold('USAGE:')}
  versync sync [OPTIONS]

${output.bold('OPTIONS:')}
  --cascade          Include manifests in subdirectories
  --dry-run          Show the changes without writing
  --root <dir>       Project root (default: current directory)
  --quiet            Only print errors
  --help             Show this help
`;

export async function sync(args: string[], options: ContextOptions): Promise<void> {
  const parsed = parseCommandArgs(args, { boolean: ['cascade', 'dry-run'] });
  if (parsed.flag('help')) {
    output.help(HELP);
    return;
  }
  expectPositionals(parsed, 0, 'versync sync [--cascade] [--dry-run]');

  const { engine, cascade } = await createContext(parsed, options);
  const dryRun = parsed.flag('dry-run');
  const result = await engine.sync({ cascade, dryRun });

  if (result.changes.length === 0) {
    output.success(`All version files already at ${result.version}`);
    return;
  }

  output.fileChanges(result.changes);
  if (dryRun) {
    output.diffs(result.diffs);
    output.dryRun();
    output.info('Would synchronize to version', result.version);
  } else {
    output.success(`Synchronized ${result.changes.length} file(s) to version ${result.version}`);
  }
}
