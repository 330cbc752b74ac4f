import { Data, Effect } from 'effect';
import { parseArgs } from 'util';
import {
  isScanConfigProfile,
  ScanConfigProfiles,
  type ScanConfigProfile,
} from '../Config/ScanConfig.service.js';
import { EXPORT_FORMATS, isExportFormat, type ExportFormat } from '../Export/ResultsExporter.js';

export const USAGE = `Usage: linkscan <file> [options]

Scans a CSV, XLSX, text, HTML or XML file for URLs and reports which are
well-formed http(s) links.

Options:
  -e, --export <path>    write results to a file, or into a directory
  -f, --format <fmt>     export format: ${EXPORT_FORMATS.join(' | ')} (default: from --export, else csv)
      --profile <name>   configuration profile: ${Object.keys(ScanConfigProfiles).join(' | ')}
      --log-dir <dir>    append JSONL audit logs to this directory
      --no-header        treat the first CSV record as data
  -v, --verbose          print debug logs
  -h, --help             show this message`;

export class CliUsageError extends Data.TaggedError('CliUsageError')<{
  readonly reason: string;
}> {
  get message(): string {
    return this.reason;
  }
}

export interface CliOptions {
  readonly help: boolean;
  readonly file: string;
  readonly exportPath?: string;
  readonly format: ExportFormat;
  readonly profile: ScanConfigProfile;
  readonly logDir?: string;
  readonly csvHasHeader: boolean;
  readonly verbose: boolean;
}

const inferFormat = (exportPath: string | undefined): ExportFormat =>
  exportPath?.toLowerCase().endsWith('.json') ? 'json' : 'csv';

/**
 * Parses command-line arguments (without the node and script entries).
 */
export const parseCliArgs = (
  argv: readonly string[]
): Effect.Effect<CliOptions, CliUsageError> =>
  Effect.gen(function* () {
    const parsed = yield* Effect.try({
      try: () =>
        parseArgs({
          args: [...argv],
          allowPositionals: true,
          options: {
            export: { type: 'string', short: 'e' },
            format: { type: 'string', short: 'f' },
            profile: { type: 'string' },
            'log-dir': { type: 'string' },
            'no-header': { type: 'boolean' },
            verbose: { type: 'boolean', short: 'v' },
            help: { type: 'boolean', short: 'h' },
          },
        }),
      catch: (error) =>
        new CliUsageError({
          reason: error instanceof Error ? error.message : String(error),
        }),
    });

    const { values, positionals } = parsed;
    const help = values.help ?? false;

    if (!help && positionals.length !== 1) {
      return yield* Effect.fail(
        new CliUsageError({
          reason:
            positionals.length === 0
              ? 'Missing input file'
              : `Expected one input file, got ${positionals.length}`,
        })
      );
    }

    const format = values.format ?? inferFormat(values.export);
    if (!isExportFormat(format)) {
      return yield* Effect.fail(
        new CliUsageError({ reason: `Unknown export format: ${format}` })
      );
    }

    const profile = values.profile ?? 'default';
    if (!isScanConfigProfile(profile)) {
      return yield* Effect.fail(
        new CliUsageError({ reason: `Unknown profile: ${profile}` })
      );
    }

    const options: CliOptions = {
      help,
      file: positionals[0] ?? '',
      exportPath: values.export,
      format,
      profile,
      logDir: values['log-dir'],
      csvHasHeader: !(values['no-header'] ?? false),
      verbose: values.verbose ?? false,
    };
    return options;
  });
