import type { ScanResults } from '../Scan/types.js';

const RULE = '='.repeat(50);
const SUBRULE = '-'.repeat(30);

export interface ResultsReportOptions {
  /** Longer URLs are shortened with `...` (default: 100) */
  readonly maxUrlDisplayLength?: number;
  /** Invalid entries listed before the rest are summarised (default: 50) */
  readonly maxReportedInvalid?: number;
}

/**
 * Shortens text to `maxLength` characters, the last three being `...`.
 *
 * @example
 * ```typescript
 * truncateText('https://example.com/a/very/long/path', 20); // 'https://example.c...'
 * ```
 */
export const truncateText = (text: string, maxLength: number): string =>
  text.length <= maxLength ? text : `${text.slice(0, Math.max(0, maxLength - 3))}...`;

/**
 * Plain-text summary of a scan, as printed by the CLI.
 *
 * @group Report
 * @public
 */
export const formatResultsReport = (
  results: ScanResults,
  options: ResultsReportOptions = {}
): string => {
  const maxUrlDisplayLength = options.maxUrlDisplayLength ?? 100;
  const maxReportedInvalid = options.maxReportedInvalid ?? 50;

  const lines = [
    RULE,
    'VALIDATION RESULTS',
    RULE,
    '',
    `Total links found: ${results.valid.length + results.invalid.length}`,
    `Valid links: ${results.valid.length}`,
    `Invalid links: ${results.invalid.length}`,
    '',
  ];

  if (results.invalidEntries.length === 0) {
    lines.push('No invalid links found!');
    return lines.join('\n');
  }

  lines.push('INVALID LINKS:', SUBRULE);
  results.invalidEntries.slice(0, maxReportedInvalid).forEach((entry, index) => {
    lines.push(
      `${index + 1}. Invalid link at ${entry.location}: ${truncateText(entry.value, maxUrlDisplayLength)}`
    );
  });

  const remaining = results.invalidEntries.length - maxReportedInvalid;
  if (remaining > 0) {
    lines.push(`... and ${remaining} more (use --export to see all)`);
  }
  return lines.join('\n');
};
