/**
 * Command-line parsing for the letters CLI.
 */

import { parseArgs } from 'node:util';
import { describeError } from '../types/errors.js';

export class CliUsageError extends Error {
  readonly code = 'CliUsageError';

  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export const USAGE = `Usage: compliance-letters <command> [options]

Commands:
  inspect   --input <file> [--sheet <name>]
  generate  --input <file> [--sheet <name>] [--output <dir>] [--offset n] [--limit n]
            [--sample n] [--keep-intermediate]
  dispatch  --input <file> [--sheet <name>] [--output <dir>] [--mapping <file>]
            [--subject <template>] [--body <template>] [--delay ms]
            [--resume <dispatch-report.csv>] [--live --confirm]

Dispatch is a dry run unless --live is given; a live run also needs --confirm.`;

interface CommonArgs {
  input: string;
  sheet?: string;
}

export interface InspectArgs extends CommonArgs {
  command: 'inspect';
}

export interface GenerateArgs extends CommonArgs {
  command: 'generate';
  output?: string;
  offset: number;
  limit: number | null;
  sample?: number;
  keepIntermediate: boolean;
}

export interface DispatchArgs extends CommonArgs {
  command: 'dispatch';
  output?: string;
  mapping?: string;
  subject?: string;
  body?: string;
  delay?: number;
  resume?: string;
  live: boolean;
  confirm: boolean;
}

export type CliArgs = InspectArgs | GenerateArgs | DispatchArgs | { command: 'help' };

const OPTIONS = {
  input: { type: 'string', short: 'i' },
  sheet: { type: 'string' },
  output: { type: 'string', short: 'o' },
  offset: { type: 'string' },
  limit: { type: 'string' },
  sample: { type: 'string' },
  'keep-intermediate': { type: 'boolean' },
  mapping: { type: 'string' },
  subject: { type: 'string' },
  body: { type: 'string' },
  delay: { type: 'string' },
  resume: { type: 'string' },
  live: { type: 'boolean' },
  confirm: { type: 'boolean' },
  help: { type: 'boolean', short: 'h' },
} as const;

function count(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
    throw new CliUsageError(`--${flag} must be a non-negative integer, got "${value}"`);
  }
  return parsed;
}

function parse(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true });
  } catch (error) {
    throw new CliUsageError(describeError(error));
  }
}

export function parseCliArgs(argv: string[]): CliArgs {
  const { values, positionals } = parse(argv);
  const command = positionals[0];

  if (values.help || command === undefined || command === 'help') {
    return { command: 'help' };
  }
  if (positionals.length > 1) {
    throw new CliUsageError(`Unexpected argument: ${positionals[1]}`);
  }
  if (!values.input) {
    throw new CliUsageError('--input is required');
  }

  const common: CommonArgs = { input: values.input, sheet: values.sheet };

  switch (command) {
    case 'inspect':
      return { command, ...common };

    case 'generate':
      return {
        command,
        ...common,
        output: values.output,
        offset: count(values.offset, 'offset') ?? 0,
        limit: count(values.limit, 'limit') ?? null,
        sample: count(values.sample, 'sample'),
        keepIntermediate: values['keep-intermediate'] ?? false,
      };

    case 'dispatch':
      if (values.confirm && !values.live) {
        throw new CliUsageError('--confirm only applies to --live dispatch');
      }
      return {
        command,
        ...common,
        output: values.output,
        mapping: values.mapping,
        subject: values.subject,
        body: values.body,
        delay: count(values.delay, 'delay'),
        resume: values.resume,
        live: values.live ?? false,
        confirm: values.confirm ?? false,
      };

    default:
      throw new CliUsageError(`Unknown command: ${command}`);
  }
}
