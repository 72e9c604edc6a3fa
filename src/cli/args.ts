/**
 * Argument parsing shared by every command.
 */

import minimist from 'minimist';
import { VersyncError } from '../lib/error.ts';

export interface ArgsSpec {
  boolean?: string[];
  string?: string[];
}

/** Options every command accepts */
const COMMON_BOOLEAN = ['help', 'quiet'];
const COMMON_STRING = ['root'];

/**
 * Typed view over minimist output.
 */
export class ParsedArgs {
  constructor(private readonly argv: minimist.ParsedArgs) {}

  get positionals(): string[] {
    return this.argv._.map(String);
  }

  flag(name: string): boolean {
    return this.argv[name] === true;
  }

  option(name: string): string | undefined {
    const value: unknown = this.argv[name];
    return typeof value === 'string' && value !== '' ? value : undefined;
  }
}

/**
 * Parse command arguments, rejecting unknown options.
 */
export function parseCommandArgs(args: string[], spec: ArgsSpec = {}): ParsedArgs {
  const unknown: string[] = [];
  const argv = minimist(args, {
    boolean: [...COMMON_BOOLEAN, ...(spec.boolean ?? [])],
    string: [...COMMON_STRING, ...(spec.string ?? [])],
    alias: { h: 'help', q: 'quiet' },
    unknown: (arg) => {
      if (arg.startsWith('-') && arg !== '-') {
        unknown.push(arg);
        return false;
      }
      return true;
    },
  });

  if (unknown.length > 0) {
    throw new VersyncError(
      `Unknown option ${unknown[0]}. Run \`versync --help\` for usage.`,
      'USAGE_ERROR',
      { options: unknown },
    );
  }

  return new ParsedArgs(argv);
}

/**
 * Fail when a command got more positional arguments than it takes.
 */
export function expectPositionals(parsed: ParsedArgs, max: number, usage: string): string[] {
  const positionals = parsed.positionals;
  if (positionals.length > max) {
    throw new VersyncError(
      `Unexpected argument ${positionals[max]}. Usage: ${usage}`,
      'USAGE_ERROR',
      { arguments: positionals },
    );
  }
  return positionals;
}
