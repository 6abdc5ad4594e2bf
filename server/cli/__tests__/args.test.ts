import { describe, it, expect } from 'vitest';
import { CliUsageError, parseCliArgs } from '../args.js';

describe('parseCliArgs', () => {
  it('returns help without a command or with --help', () => {
    expect(parseCliArgs([])).toEqual({ command: 'help' });
    expect(parseCliArgs(['generate', '--help'])).toEqual({ command: 'help' });
    expect(parseCliArgs(['help'])).toEqual({ command: 'help' });
  });

  it('parses inspect', () => {
    expect(parseCliArgs(['inspect', '-i', 'people.xlsx', '--sheet', 'Data'])).toEqual({
      command: 'inspect',
      input: 'people.xlsx',
      sheet: 'Data',
    });
  });

  it('parses generate with defaults for the window', () => {
    expect(parseCliArgs(['generate', '--input', 'people.xlsx', '--limit', '10'])).toEqual({
      command: 'generate',
      input: 'people.xlsx',
      sheet: undefined,
      output: undefined,
      offset: 0,
      limit: 10,
      sample: undefined,
      keepIntermediate: false,
    });
  });

  it('parses every generate option', () => {
    const args = parseCliArgs([
      'generate', '-i', 'people.csv', '-o', 'out', '--offset', '5', '--sample', '3', '--keep-intermediate',
    ]);
    expect(args).toMatchObject({ offset: 5, limit: null, sample: 3, output: 'out', keepIntermediate: true });
  });

  it('parses dispatch as a dry run by default', () => {
    expect(parseCliArgs(['dispatch', '-i', 'people.xlsx', '--mapping', 'emails.csv', '--delay', '0'])).toEqual({
      command: 'dispatch',
      input: 'people.xlsx',
      sheet: undefined,
      output: undefined,
      mapping: 'emails.csv',
      subject: undefined,
      body: undefined,
      delay: 0,
      resume: undefined,
      live: false,
      confirm: false,
    });
  });

  it('accepts a confirmed live dispatch', () => {
    expect(parseCliArgs(['dispatch', '-i', 'people.xlsx', '--live', '--confirm'])).toMatchObject({
      live: true,
      confirm: true,
    });
  });

  it('rejects --confirm without --live', () => {
    expect(() => parseCliArgs(['dispatch', '-i', 'people.xlsx', '--confirm'])).toThrow(
      '--confirm only applies to --live dispatch',
    );
  });

  it('requires --input', () => {
    expect(() => parseCliArgs(['generate'])).toThrow('--input is required');
  });

  it('rejects unknown commands and extra arguments', () => {
    expect(() => parseCliArgs(['publish', '-i', 'a.xlsx'])).toThrow('Unknown command: publish');
    expect(() => parseCliArgs(['inspect', 'extra', '-i', 'a.xlsx'])).toThrow('Unexpected argument: extra');
  });

  it('rejects invalid counts', () => {
    expect(() => parseCliArgs(['generate', '-i', 'a.xlsx', '--limit', '-3'])).toThrow(CliUsageError);
    expect(() => parseCliArgs(['generate', '-i', 'a.xlsx', '--offset', '1.5'])).toThrow(
      '--offset must be a non-negative integer, got "1.5"',
    );
  });

  it('turns unknown options into usage errors', () => {
    expect(() => parseCliArgs(['generate', '-i', 'a.xlsx', '--verbose'])).toThrow(CliUsageError);
  });
});
