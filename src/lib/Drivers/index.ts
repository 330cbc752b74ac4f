/**
 * Extraction drivers. Each one reads a single kind of source, turns what it
 * reads into located fragments and runs them through the shared traversal,
 * which classifies, validates, deduplicates and reports progress.
 *
 * @group Drivers
 * @public
 */

export {
  extractMarkupLinks,
  scanMarkup,
  type ExtractedLink,
  type MarkupDriverOptions,
  type MarkupExtractionResult,
  type MarkupExtractorConfig,
} from './MarkupDriver.js';
export {
  columnLetter,
  DEFAULT_MAX_SHEET_COLUMNS,
  DEFAULT_MAX_SHEET_ROWS,
  fromSheetValue,
  scanSpreadsheet,
  type SpreadsheetDriverOptions,
} from './SpreadsheetDriver.js';
export { parseCsvRecords, scanCsv, type TabularDriverOptions } from './TabularDriver.js';
export { scanText, splitLines } from './TextDriver.js';
