import { Effect } from 'effect';
import * as fs from 'fs/promises';
import * as path from 'path';
import { ExportError } from '../errors.js';
import { FileGuard } from '../FileGuard/FileGuard.js';
import { AuditLogger } from '../Logging/AuditLogger.service.js';
import type { ScanResults } from '../Scan/types.js';

export type ExportFormat = 'csv' | 'json';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['csv', 'json'];

export const isExportFormat = (value: string): value is ExportFormat =>
  value === 'csv' || value === 'json';

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * `link_validation_YYYYMMDD_HHMMSS.<format>` in local time.
 */
export const defaultExportFileName = (
  format: ExportFormat,
  now: Date = new Date()
): string => {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `link_validation_${date}_${time}.${format}`;
};

const NEEDS_QUOTING = /[",\r\n]/;

const csvField = (value: string): string =>
  NEEDS_QUOTING.test(value) ? `"${value.replace(/"/g, '""')}"` : value;

const csvLine = (fields: readonly string[]): string =>
  fields.map(csvField).join(',');

/**
 * CSV export: a summary row, then every valid URL, then every invalid
 * entry with its location. Lines end with CRLF.
 */
export const formatCsvExport = (results: ScanResults): string => {
  const lines = [
    csvLine(['Status', 'Location', 'URL']),
    csvLine([
      'SUMMARY',
      `Valid: ${results.valid.length}`,
      `Invalid: ${results.invalid.length}`,
    ]),
    ...results.valid.map((url) => csvLine(['Valid', '', url])),
    ...results.invalidEntries.map((entry) =>
      csvLine(['Invalid', entry.location, entry.value])
    ),
  ];
  return lines.map((line) => `${line}\r\n`).join('');
};

export const formatJsonExport = (results: ScanResults): string =>
  JSON.stringify(
    {
      summary: { valid: results.valid.length, invalid: results.invalid.length },
      valid: results.valid,
      invalid: results.invalidEntries.map((entry) => ({
        location: entry.location,
        url: entry.value,
      })),
    },
    null,
    2
  ) + '\n';

/**
 * Writes results to `target`. When `target` is an existing directory the
 * file gets the default timestamped name inside it. Returns the path
 * written.
 *
 * @example
 * ```typescript
 * const written = yield* exportResults(report.results, './reports', 'json');
 * ```
 *
 * @group Export
 * @public
 */
export const exportResults = (
  results: ScanResults,
  target: string,
  format: ExportFormat
): Effect.Effect<string, ExportError, AuditLogger> =>
  Effect.gen(function* () {
    if (results.valid.length === 0 && results.invalid.length === 0) {
      return yield* Effect.fail(ExportError.noResults(target, format));
    }

    const logger = yield* AuditLogger;
    const outputPath = (yield* FileGuard.isDirectory(target))
      ? path.join(target, defaultExportFileName(format))
      : target;
    const content =
      format === 'csv' ? formatCsvExport(results) : formatJsonExport(results);

    yield* Effect.tryPromise({
      try: () => fs.writeFile(outputPath, content, 'utf-8'),
      catch: (error) => ExportError.writeFailed(outputPath, format, error),
    });

    yield* logger.logExport(
      outputPath,
      format,
      results.valid.length + results.invalidEntries.length
    );
    return outputPath;
  }).pipe(
    Effect.tapError((error) =>
      Effect.flatMap(AuditLogger, (logger) => logger.logError(error, target))
    )
  );
