import { Effect } from 'effect';
import { CellValue } from '../CellValue/CellValue.js';
import type { ProcessingError } from '../errors.js';
import { traverseSource } from '../Scan/traverseSource.js';
import type { DriverOptions, ScanResults, SourceItem } from '../Scan/types.js';

const LINE_BREAK = /\r\n|\r|\n/;

/**
 * Splits text into lines. A trailing line break does not start another line.
 */
export const splitLines = (content: string): string[] => {
  if (content === '') return [];
  const lines = content.split(LINE_BREAK);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
};

function* lineUnits(lines: readonly string[]): Generator<SourceItem[]> {
  for (const [index, line] of lines.entries()) {
    yield [{ location: `line ${index + 1}`, cell: CellValue.Text({ value: line }) }];
  }
}

/**
 * Scans plain text line by line. Each trimmed, non-empty line is one
 * fragment; blank lines still count towards progress.
 *
 * @example
 * ```typescript
 * const results = yield* scanText('https://example.com\nwww.example.com\n');
 * // results.valid   -> ['https://example.com']
 * // results.invalid -> ['www.example.com']
 * ```
 *
 * @group Drivers
 * @public
 */
export const scanText = (
  content: string,
  options: DriverOptions = {}
): Effect.Effect<ScanResults, ProcessingError> =>
  Effect.suspend(() => {
    const lines = splitLines(content);
    return traverseSource(
      { kind: 'text', gate: 'classify', total: lines.length, units: lineUnits(lines) },
      options
    );
  });
