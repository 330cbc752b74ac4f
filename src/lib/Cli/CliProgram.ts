import { Effect, Layer, Logger, LogLevel } from 'effect';
import { ScanConfig, ScanConfigProfiles } from '../Config/ScanConfig.service.js';
import { describeError, isPreconditionError, type LinkScanError } from '../errors.js';
import { exportResults } from '../Export/ResultsExporter.js';
import { AuditLoggerFromConfig } from '../Logging/AuditLogger.service.js';
import type { ProgressCallback } from '../Progress/ProgressReporter.js';
import { formatResultsReport } from '../Report/ResultsReport.js';
import { FileScanner } from '../Scanner/FileScanner.service.js';
import type { CliOptions } from './CliArgs.js';

export const EXIT_OK = 0;
export const EXIT_PROCESSING_FAILED = 1;
export const EXIT_PRECONDITION_FAILED = 2;
export const EXIT_CANCELLED = 130;

/**
 * Where the CLI writes. Each call receives one line without its newline.
 */
export interface CliOutput {
  readonly stdout: (line: string) => void;
  readonly stderr: (line: string) => void;
}

export interface CliRunOptions {
  readonly signal?: AbortSignal;
  readonly onProgress?: ProgressCallback;
}

export const makeCliLayer = (options: CliOptions) => {
  const configLayer = ScanConfig.Live({
    ...ScanConfigProfiles[options.profile],
    csvHasHeader: options.csvHasHeader,
    logDir: options.logDir,
  });
  const loggerLayer = AuditLoggerFromConfig.pipe(Layer.provide(configLayer));
  return FileScanner.Default.pipe(
    Layer.provideMerge(Layer.merge(configLayer, loggerLayer))
  );
};

const exitCodeFor = (error: LinkScanError): number =>
  isPreconditionError(error) ? EXIT_PRECONDITION_FAILED : EXIT_PROCESSING_FAILED;

/**
 * Scans the file named in `options`, prints the report and, when asked,
 * exports the results. Resolves to the process exit code; never fails.
 */
export const runCli = (
  options: CliOptions,
  output: CliOutput,
  run: CliRunOptions = {}
): Effect.Effect<number> => {
  const program = Effect.gen(function* () {
    const scanner = yield* FileScanner;
    const config = yield* (yield* ScanConfig).getOptions();

    const report = yield* scanner.scanFile(options.file, {
      signal: run.signal,
      onProgress: run.onProgress,
    });

    output.stdout(
      formatResultsReport(report.results, {
        maxUrlDisplayLength: config.maxUrlDisplayLength,
        maxReportedInvalid: config.maxReportedInvalid,
      })
    );

    if (report.status === 'cancelled') {
      output.stderr(
        `Scan cancelled after ${report.results.itemsProcessed} items; results are partial.`
      );
    }

    if (options.exportPath !== undefined) {
      const written = yield* exportResults(
        report.results,
        options.exportPath,
        options.format
      );
      output.stdout(`Results exported to ${written}`);
    }

    return report.status === 'cancelled' ? EXIT_CANCELLED : EXIT_OK;
  });

  return program.pipe(
    Effect.catchAll((error) =>
      Effect.sync(() => {
        output.stderr(`Error: ${describeError(error)}`);
        return exitCodeFor(error);
      })
    ),
    Effect.provide(makeCliLayer(options)),
    Logger.withMinimumLogLevel(options.verbose ? LogLevel.Debug : LogLevel.Warning)
  );
};
