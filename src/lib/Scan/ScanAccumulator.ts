import { toFragmentText } from '../CellValue/CellValue.js';
import { looksLikeUrl } from '../Detection/FragmentClassifier.js';
import { isValidUrl } from '../Detection/UrlValidator.js';
import type { GateMode, ScanResults, SourceItem } from './types.js';

export type Verdict = 'skipped' | 'valid' | 'invalid';

export interface ScanAccumulator {
  readonly record: (item: SourceItem) => Verdict;
  readonly results: (itemsProcessed: number) => ScanResults;
}

/**
 * Collects valid and invalid values for one traversal. Each distinct value
 * is stored once; an invalid value keeps the location it was first seen at.
 */
export const makeScanAccumulator = (gate: GateMode): ScanAccumulator => {
  const valid = new Set<string>();
  const invalid = new Map<string, string>();

  const record = (item: SourceItem): Verdict => {
    const text = toFragmentText(item.cell);
    if (text === '') return 'skipped';
    if (gate === 'classify' && !looksLikeUrl(text)) return 'skipped';

    if (isValidUrl(text)) {
      valid.add(text);
      return 'valid';
    }
    if (!invalid.has(text)) {
      invalid.set(text, item.location);
    }
    return 'invalid';
  };

  const results = (itemsProcessed: number): ScanResults => {
    const invalidValues = [...invalid.keys()].sort();
    return {
      valid: [...valid].sort(),
      invalid: invalidValues,
      invalidEntries: invalidValues.map((value) => ({
        value,
        location: invalid.get(value) ?? '',
      })),
      itemsProcessed,
    };
  };

  return { record, results };
};
