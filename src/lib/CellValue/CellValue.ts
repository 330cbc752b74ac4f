import { Data } from 'effect';

/**
 * A raw value read from a source location, before it is turned into a
 * fragment string.
 *
 * Readers disagree on what a cell holds: CSV yields text, spreadsheets
 * yield numbers and dates, markup yields attribute strings or nothing.
 * Drivers convert whatever they read into one of these three cases once,
 * at the boundary, and only the resulting string reaches the classifier.
 *
 * @group CellValue
 * @public
 */
export type CellValue = Data.TaggedEnum<{
  Text: { readonly value: string };
  Missing: {};
  Numeric: { readonly value: number };
}>;

export const CellValue = Data.taggedEnum<CellValue>();

/**
 * Converts a cell value into the string the classifier sees.
 *
 * Whole numbers print without a decimal part, so a spreadsheet cell holding
 * `123.0` becomes `"123"` rather than `"123.0"`.
 *
 * @example
 * ```typescript
 * toFragmentText(CellValue.Numeric({ value: 123 }));       // '123'
 * toFragmentText(CellValue.Numeric({ value: 123.45 }));    // '123.45'
 * toFragmentText(CellValue.Text({ value: '  spaced  ' })); // 'spaced'
 * toFragmentText(CellValue.Missing());                     // ''
 * ```
 */
export const toFragmentText = (cell: CellValue): string => {
  switch (cell._tag) {
    case 'Missing':
      return '';
    case 'Numeric':
      if (!Number.isFinite(cell.value)) return '';
      return Number.isInteger(cell.value)
        ? BigInt(cell.value).toString()
        : String(cell.value);
    case 'Text':
      return cell.value.trim();
  }
};

/**
 * Wraps an arbitrary value coming from a reader or a caller.
 */
export const fromUnknown = (value: unknown): CellValue => {
  if (value === null || value === undefined) return CellValue.Missing();
  if (typeof value === 'number') return CellValue.Numeric({ value });
  if (typeof value === 'string') return CellValue.Text({ value });
  return CellValue.Text({ value: String(value) });
};

/**
 * Reads a CSV field the way a dataframe reader would type it: blank fields
 * are missing, fields that are entirely a decimal number are numeric, and
 * everything else stays text.
 */
export const fromCsvField = (field: string | undefined): CellValue => {
  if (field === undefined) return CellValue.Missing();
  const trimmed = field.trim();
  if (trimmed === '') return CellValue.Missing();
  if (NUMERIC_FIELD.test(trimmed)) {
    return CellValue.Numeric({ value: Number(trimmed) });
  }
  return CellValue.Text({ value: field });
};

const NUMERIC_FIELD = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Shorthand for `toFragmentText(fromUnknown(value))`.
 */
export const safeStringConversion = (value: unknown): string =>
  toFragmentText(fromUnknown(value));
