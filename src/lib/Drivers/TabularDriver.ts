import csvParser from 'csv-parser';
import { Effect } from 'effect';
import { Readable } from 'stream';
import { fromCsvField } from '../CellValue/CellValue.js';
import { ProcessingError } from '../errors.js';
import { traverseSource } from '../Scan/traverseSource.js';
import type { DriverOptions, ScanResults, SourceItem } from '../Scan/types.js';

/**
 * @group Drivers
 * @public
 */
export interface TabularDriverOptions extends DriverOptions {
  /** Treat the first record as column names (default: true). */
  readonly hasHeader?: boolean;
}

const OVERFLOW_KEY = /^_?(\d+)$/;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

/**
 * csv-parser keys header-less rows by column index, and cells beyond the
 * first record's width by `_<index>`. Both become array positions here.
 */
const toCells = (row: unknown): string[] => {
  if (!isRecord(row)) return [];
  const cells = new Map<number, string>();
  let width = 0;
  for (const [key, value] of Object.entries(row)) {
    const match = OVERFLOW_KEY.exec(key);
    if (!match || typeof value !== 'string') continue;
    const index = Number(match[1]);
    cells.set(index, value);
    width = Math.max(width, index + 1);
  }
  return Array.from({ length: width }, (_, index) => cells.get(index) ?? '');
};

const isEmptyRecord = (cells: readonly string[]): boolean =>
  cells.length === 0 || (cells.length === 1 && cells[0] === '');

/**
 * Parses CSV text into records of raw fields. Empty lines are dropped.
 */
export const parseCsvRecords = (
  content: string
): Effect.Effect<string[][], Error> =>
  Effect.async<string[][], Error>((resume) => {
    const records: string[][] = [];
    Readable.from([content.replace(/^\uFEFF/, '')])
      .pipe(csvParser({ headers: false }))
      .on('data', (row: unknown) => {
        const cells = toCells(row);
        if (!isEmptyRecord(cells)) records.push(cells);
      })
      .on('end', () => resume(Effect.succeed(records)))
      .on('error', (error: Error) => resume(Effect.fail(error)));
  });

const columnNames = (header: readonly string[] | undefined, width: number): string[] =>
  Array.from({ length: width }, (_, index) => {
    if (!header) return String(index + 1);
    const name = header[index]?.trim() ?? '';
    return name === '' ? `Unnamed: ${index}` : name;
  });

function* recordUnits(
  records: readonly string[][],
  columns: readonly string[],
  firstRecordNumber: number
): Generator<SourceItem[]> {
  for (const [offset, record] of records.entries()) {
    const recordNumber = firstRecordNumber + offset;
    yield columns.map((column, index) => ({
      location: `column '${column}', row ${recordNumber}`,
      cell: fromCsvField(record[index]),
    }));
  }
}

/**
 * Scans CSV text cell by cell. Fields that read as numbers are typed as
 * numbers first, so `123.0` is seen as `123`; blank fields are skipped.
 *
 * @example
 * ```typescript
 * const results = yield* scanCsv('name,link\nDocs,https://example.com/docs\n');
 * // results.valid -> ['https://example.com/docs']
 * ```
 *
 * @group Drivers
 * @public
 */
export const scanCsv = (
  content: string,
  options: TabularDriverOptions = {}
): Effect.Effect<ScanResults, ProcessingError> =>
  Effect.gen(function* () {
    const records = yield* parseCsvRecords(content).pipe(
      Effect.mapError((cause) =>
        ProcessingError.fromCause('tabular', cause, options.sourceName)
      )
    );

    const hasHeader = options.hasHeader ?? true;
    const header = hasHeader ? records[0] : undefined;
    const dataRecords = hasHeader ? records.slice(1) : records;
    const width = records.reduce((max, record) => Math.max(max, record.length), 0);
    const columns = columnNames(header, width);

    return yield* traverseSource(
      {
        kind: 'tabular',
        gate: 'classify',
        total: dataRecords.length * columns.length,
        units: recordUnits(dataRecords, columns, hasHeader ? 2 : 1),
      },
      options
    );
  });
