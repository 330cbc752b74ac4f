import { Duration, Effect } from 'effect';
import { ScanConfig, type ScanConfigOptions } from '../Config/ScanConfig.service.js';
import { scanMarkup } from '../Drivers/MarkupDriver.js';
import { scanSpreadsheet } from '../Drivers/SpreadsheetDriver.js';
import { scanCsv } from '../Drivers/TabularDriver.js';
import { scanText } from '../Drivers/TextDriver.js';
import {
  EncodingError,
  ProcessingError,
  UnsupportedFormatError,
  type ScanError,
  type SourceKind,
} from '../errors.js';
import { FileGuard, type FileInfo } from '../FileGuard/FileGuard.js';
import { AuditLogger } from '../Logging/AuditLogger.service.js';
import type { ProgressCallback } from '../Progress/ProgressReporter.js';
import type { DriverOptions, ScanResults } from '../Scan/types.js';

/**
 * Driver used for each file extension.
 *
 * @group Scanner
 * @public
 */
export const KIND_BY_EXTENSION: Readonly<Partial<Record<string, SourceKind>>> = {
  '.csv': 'tabular',
  '.xlsx': 'spreadsheet',
  '.txt': 'text',
  '.html': 'markup',
  '.htm': 'markup',
  '.xml': 'markup',
};

export type ScanStatus = 'completed' | 'cancelled';

/**
 * Everything known about one finished scan.
 *
 * @group Scanner
 * @public
 */
export interface ScanReport {
  readonly file: FileInfo;
  readonly kind: SourceKind;
  /** Encoding the text was decoded with; absent for spreadsheets */
  readonly encoding?: string;
  readonly status: ScanStatus;
  readonly results: ScanResults;
  readonly durationMs: number;
}

export interface ScanFileOptions {
  readonly signal?: AbortSignal;
  readonly onProgress?: ProgressCallback;
}

interface DriverOutcome {
  readonly results: ScanResults;
  readonly encoding?: string;
}

const runDriver = (
  kind: SourceKind,
  bytes: Uint8Array,
  file: FileInfo,
  config: ScanConfigOptions,
  driverOptions: DriverOptions
): Effect.Effect<DriverOutcome, EncodingError | ProcessingError> => {
  if (kind === 'spreadsheet') {
    return scanSpreadsheet(bytes, {
      ...driverOptions,
      maxRows: config.maxSheetRows,
      maxColumns: config.maxSheetColumns,
    }).pipe(Effect.map((results) => ({ results })));
  }

  return Effect.gen(function* () {
    const { text, encoding } = yield* FileGuard.decodeText(
      bytes,
      config.encodingFallbacks,
      file.path
    );
    const results = yield* (kind === 'tabular'
      ? scanCsv(text, { ...driverOptions, hasHeader: config.csvHasHeader })
      : kind === 'text'
        ? scanText(text, driverOptions)
        : scanMarkup(text, { ...driverOptions, xml: file.extension === '.xml' }));
    return { results, encoding };
  });
};

/**
 * Scans files on disk for URLs.
 *
 * Checks the file, picks a driver from its extension, runs it and reports
 * the outcome to the {@link AuditLogger}. A cancelled scan succeeds with
 * status `cancelled` and whatever was found before the signal fired; a
 * failed scan yields no results at all.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const scanner = yield* FileScanner;
 *   const report = yield* scanner.scanFile('./links.csv');
 *   console.log(report.results.valid);
 * });
 *
 * await Effect.runPromise(
 *   program.pipe(
 *     Effect.provide(FileScanner.Default),
 *     Effect.provide(AuditLoggerLive),
 *     Effect.provide(ScanConfig.Default)
 *   )
 * );
 * ```
 *
 * @group Scanner
 * @public
 */
export class FileScanner extends Effect.Service<FileScanner>()(
  'linkscan/FileScanner',
  {
    effect: Effect.gen(function* () {
      const scanConfig = yield* ScanConfig;
      const logger = yield* AuditLogger;

      const scanFile = (
        filePath: string,
        options: ScanFileOptions = {}
      ): Effect.Effect<ScanReport, ScanError> =>
        Effect.gen(function* () {
          const config = yield* scanConfig.getOptions();
          const file = yield* FileGuard.inspect(filePath, config);

          const supported = yield* scanConfig.isSupportedExtension(file.extension);
          const kind = KIND_BY_EXTENSION[file.extension];
          if (!supported || kind === undefined) {
            return yield* Effect.fail(
              new UnsupportedFormatError({
                path: filePath,
                extension: file.extension,
                supported: config.supportedExtensions,
              })
            );
          }

          yield* logger.logFileStart(filePath, file.sizeBytes, kind);
          if (file.isLarge) {
            yield* logger.logLargeFile(filePath, file.sizeBytes);
          }

          const bytes = yield* FileGuard.readBytes(filePath);
          let cancelled = false;
          const [elapsed, outcome] = yield* Effect.timed(
            runDriver(kind, bytes, file, config, {
              signal: options.signal,
              onCancelled: () => {
                cancelled = true;
              },
              onProgress: options.onProgress,
              progressIntervals: config.progressIntervals,
              sourceName: filePath,
            })
          );
          const durationMs = Duration.toMillis(elapsed);
          const status: ScanStatus = cancelled ? 'cancelled' : 'completed';

          if (status === 'cancelled') {
            yield* logger.logFileCancelled(filePath, outcome.results, durationMs);
          } else {
            yield* logger.logFileComplete(filePath, outcome.results, durationMs);
          }
          yield* logger.logValidationStats(kind, outcome.results.itemsProcessed, durationMs);

          const report: ScanReport = {
            file,
            kind,
            encoding: outcome.encoding,
            status,
            results: outcome.results,
            durationMs,
          };
          return report;
        }).pipe(Effect.tapError((error) => logger.logError(error, filePath)));

      return { scanFile };
    }),
  }
) {}
