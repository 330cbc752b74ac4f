/**
 * CliArgs Tests
 * Tests for command-line argument parsing
 */

import { describe, expect, it } from 'vitest';
import { parseCliArgs } from '../../../lib/Cli/CliArgs.js';
import { runEffect, runEffectEither } from '../../utils/test-helpers.js';

const usageFailure = async (argv: string[]): Promise<string> => {
  const result = await runEffectEither(parseCliArgs(argv));
  if (result._tag === 'Right') throw new Error(`expected ${argv.join(' ')} to be rejected`);
  return result.left.message;
};

describe('parseCliArgs', () => {
  it('should fill in defaults for a bare file argument', async () => {
    const options = await runEffect(parseCliArgs(['links.csv']));

    expect(options).toEqual({
      help: false,
      file: 'links.csv',
      exportPath: undefined,
      format: 'csv',
      profile: 'default',
      logDir: undefined,
      csvHasHeader: true,
      verbose: false,
    });
  });

  it('should infer the export format from the export path', async () => {
    const inferred = await runEffect(parseCliArgs(['links.csv', '-e', 'out.JSON']));
    const explicit = await runEffect(parseCliArgs(['-e', 'out.json', '-f', 'csv', 'links.txt']));

    expect(inferred.format).toBe('json');
    expect(explicit.format).toBe('csv');
    expect(explicit.file).toBe('links.txt');
  });

  it('should read the remaining flags', async () => {
    const options = await runEffect(
      parseCliArgs(['--no-header', '--profile', 'production', '--log-dir', 'logs', '-v', 'a.csv'])
    );

    expect(options).toMatchObject({
      profile: 'production',
      logDir: 'logs',
      csvHasHeader: false,
      verbose: true,
    });
  });

  it('should not need a file for --help', async () => {
    const options = await runEffect(parseCliArgs(['--help']));

    expect(options.help).toBe(true);
    expect(options.file).toBe('');
  });

  it('should require exactly one input file', async () => {
    expect(await usageFailure([])).toBe('Missing input file');
    expect(await usageFailure(['a.csv', 'b.csv'])).toBe('Expected one input file, got 2');
  });

  it('should reject unknown formats and profiles', async () => {
    expect(await usageFailure(['a.csv', '--format', 'xml'])).toBe('Unknown export format: xml');
    expect(await usageFailure(['a.csv', '--profile', 'staging'])).toBe('Unknown profile: staging');
  });

  it('should turn unknown options into usage errors', async () => {
    const result = await runEffectEither(parseCliArgs(['a.csv', '--bogus']));

    expect(result._tag === 'Left' && result.left._tag).toBe('CliUsageError');
  });
});
