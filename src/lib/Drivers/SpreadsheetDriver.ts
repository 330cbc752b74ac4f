import { Effect } from 'effect';
import ExcelJS, { type Worksheet } from 'exceljs';
import { CellValue } from '../CellValue/CellValue.js';
import { ProcessingError } from '../errors.js';
import { traverseSource } from '../Scan/traverseSource.js';
import type { DriverOptions, ScanResults, SourceItem } from '../Scan/types.js';

/**
 * @group Drivers
 * @public
 */
export interface SpreadsheetDriverOptions extends DriverOptions {
  /** Rows read per worksheet (default: 50 000). */
  readonly maxRows?: number;
  /** Columns read per worksheet (default: 200). */
  readonly maxColumns?: number;
}

export const DEFAULT_MAX_SHEET_ROWS = 50_000;
export const DEFAULT_MAX_SHEET_COLUMNS = 200;

/**
 * Excel column letters for a 1-based column number.
 *
 * @example
 * ```typescript
 * columnLetter(1);   // 'A'
 * columnLetter(27);  // 'AA'
 * columnLetter(703); // 'AAA'
 * ```
 */
export const columnLetter = (column: number): string => {
  let letters = '';
  let remaining = column;
  while (remaining > 0) {
    const offset = (remaining - 1) % 26;
    letters = String.fromCharCode(65 + offset) + letters;
    remaining = Math.floor((remaining - 1) / 26);
  }
  return letters;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

const richTextOf = (value: unknown): string | undefined => {
  if (!isRecord(value) || !Array.isArray(value.richText)) return undefined;
  return value.richText
    .map((run: unknown) => (isRecord(run) && typeof run.text === 'string' ? run.text : ''))
    .join('');
};

/**
 * Maps whatever exceljs stores in a cell to a cell value. Formula cells
 * contribute their cached result, hyperlink cells their display text.
 */
export const fromSheetValue = (value: unknown): CellValue => {
  if (value === null || value === undefined) return CellValue.Missing();
  if (typeof value === 'number') return CellValue.Numeric({ value });
  if (typeof value === 'string') return CellValue.Text({ value });
  if (typeof value === 'boolean') return CellValue.Text({ value: String(value) });
  if (value instanceof Date) {
    return Number.isNaN(value.getTime())
      ? CellValue.Missing()
      : CellValue.Text({ value: value.toISOString() });
  }
  if (!isRecord(value)) return CellValue.Text({ value: String(value) });

  const richText = richTextOf(value);
  if (richText !== undefined) return CellValue.Text({ value: richText });

  if ('hyperlink' in value) {
    const text = value.text;
    if (typeof text === 'string') return CellValue.Text({ value: text });
    return CellValue.Text({ value: richTextOf(text) ?? String(value.hyperlink) });
  }
  if ('formula' in value || 'sharedFormula' in value) {
    return fromSheetValue(value.result);
  }
  if ('error' in value) return CellValue.Missing();

  return CellValue.Text({ value: String(value) });
};

interface SheetWindow {
  readonly sheet: Worksheet;
  readonly rows: number;
  readonly columns: number;
}

function* sheetUnits(windows: readonly SheetWindow[]): Generator<SourceItem[]> {
  for (const { sheet, rows, columns } of windows) {
    for (let rowNumber = 1; rowNumber <= rows; rowNumber++) {
      const row = sheet.getRow(rowNumber);
      const items: SourceItem[] = [];
      for (let columnNumber = 1; columnNumber <= columns; columnNumber++) {
        items.push({
          location: `sheet '${sheet.name}', cell ${columnLetter(columnNumber)}${rowNumber}`,
          cell: fromSheetValue(row.getCell(columnNumber).value),
        });
      }
      yield items;
    }
  }
}

const toArrayBuffer = (data: Uint8Array): ArrayBuffer => {
  const buffer = new ArrayBuffer(data.byteLength);
  new Uint8Array(buffer).set(data);
  return buffer;
};

/**
 * Scans every worksheet of an `.xlsx` workbook, row by row, up to the
 * configured row and column limits per sheet.
 *
 * @group Drivers
 * @public
 */
export const scanSpreadsheet = (
  data: Uint8Array,
  options: SpreadsheetDriverOptions = {}
): Effect.Effect<ScanResults, ProcessingError> =>
  Effect.gen(function* () {
    const workbook = new ExcelJS.Workbook();
    yield* Effect.tryPromise({
      try: () => workbook.xlsx.load(toArrayBuffer(data)),
      catch: (cause) =>
        ProcessingError.fromCause('spreadsheet', cause, options.sourceName),
    });

    const maxRows = options.maxRows ?? DEFAULT_MAX_SHEET_ROWS;
    const maxColumns = options.maxColumns ?? DEFAULT_MAX_SHEET_COLUMNS;
    const windows: SheetWindow[] = workbook.worksheets.map((sheet) => ({
      sheet,
      rows: Math.min(sheet.rowCount, maxRows),
      columns: Math.min(sheet.columnCount, maxColumns),
    }));

    for (const window of windows) {
      if (window.sheet.rowCount > maxRows || window.sheet.columnCount > maxColumns) {
        yield* Effect.logDebug(
          `Sheet '${window.sheet.name}' truncated to ${window.rows} rows and ${window.columns} columns`
        );
      }
    }

    return yield* traverseSource(
      {
        kind: 'spreadsheet',
        gate: 'classify',
        total: windows.reduce((sum, window) => sum + window.rows * window.columns, 0),
        units: sheetUnits(windows),
      },
      options
    );
  });
