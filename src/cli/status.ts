/**
 * versync status / show / verify - read-only commands.
 */

import { assertPolicies, checkVersionsInSync } from '../domain/policy.ts';
import { expectPositionals, parseCommandArgs } from './args.ts';
import { createContext } from './context.ts';
import type { ContextOptions } from './context.ts';
import * as output from './output.ts';

const STATUS_HELP = `
${output.bold('versync status')} - Show the current version and every manifest

${output.bold('USAGE:')}
  versync [status] [OPTIONS]

${output.bold('OPTIONS:')}
  --cascade          Include manifests in subdirectories
  --root <dir>       Project root (default: current directory)
  --quiet            Only print errors
  --help             Show this help
`;

const SHOW_HELP = `
${output.bold('versync show')} - Print the root version

${output.bold('USAGE:')}
  versync show [--root <dir>]
`;

const VERIFY_HELP = `
${output.bold('versync verify')} - Check that every manifest matches the root version

${output.bold('USAGE:')}
  versync verify [OPTIONS]

${output.bold('OPTIONS:')}
  --cascade          Include manifests in subdirectories
  --root <dir>       Project root (default: current directory)
  --quiet            Only print errors
  --help             Show this help

Exits with status 1 when any manifest disagrees.
`;

export async function status(args: string[], options: ContextOptions): Promise<void> {
  const parsed = parseCommandArgs(args, { boolean: ['cascade'] });
  if (parsed.flag('help')) {
    output.help(STATUS_HELP);
    return;
  }
  expectPositionals(parsed, 0, 'versync status [--cascade]');

  const { engine, cascade } = await createContext(parsed, options);
  const report = await engine.status({ cascade });

  output.report(report.version, report.entries);
  if (!report.inSync) {
    output.warn(`Run \`versync sync${cascade ? ' --cascade' : ''}\` to synchronize all version files.`);
  }
}

export async function show(args: string[], options: ContextOptions): Promise<void> {
  const parsed = parseCommandArgs(args);
  if (parsed.flag('help')) {
    output.help(SHOW_HELP);
    return;
  }
  expectPositionals(parsed, 0, 'versync show');

  // Only the root directory is needed for its version record
  const { engine } = await createContext(parsed, options);
  const report = await engine.status({ cascade: false });
  output.value(report.version);
}

export async function verify(args: string[], options: ContextOptions): Promise<void> {
  const parsed = parseCommandArgs(args, { boolean: ['cascade'] });
  if (parsed.flag('help')) {
    output.help(VERIFY_HELP);
    return;
  }
  expectPositionals(parsed, 0, 'versync verify [--cascade]');

  const { engine, cascade } = await createContext(parsed, options);
  const report = await engine.verify({ cascade });

  assertPolicies([checkVersionsInSync(report.mismatches, report.versionFile)]);
  output.success(`All ${report.entries.length + 1} version files match ${report.version}`);
}
