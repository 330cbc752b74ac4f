import type { CellValue } from '../CellValue/CellValue.js';
import type { ProgressCallback, ProgressTier } from '../Progress/ProgressReporter.js';

/**
 * An invalid value and the first place it was seen.
 */
export interface InvalidEntry {
  readonly location: string;
  readonly value: string;
}

/**
 * Outcome of scanning one source. `valid` and `invalid` are sorted and
 * hold each value once; `invalidEntries` follows the order of `invalid`.
 *
 * @group Scan
 * @public
 */
export interface ScanResults {
  readonly valid: readonly string[];
  readonly invalid: readonly string[];
  readonly invalidEntries: readonly InvalidEntry[];
  /** Items visited before the traversal finished or was cancelled. */
  readonly itemsProcessed: number;
}

/**
 * How a driver decides which values go to the validator.
 *
 * - `classify`: only fragments accepted by `looksLikeUrl` are validated.
 * - `validate`: every non-blank value is validated.
 */
export type GateMode = 'classify' | 'validate';

/**
 * A single fragment together with where it came from.
 */
export interface SourceItem {
  readonly location: string;
  readonly cell: CellValue;
}

/**
 * Options every driver accepts.
 *
 * @group Drivers
 * @public
 */
export interface DriverOptions {
  /** Checked once per row, line or element; when aborted the scan stops early. */
  readonly signal?: AbortSignal;
  /** Called when the signal stops the scan before its last unit. */
  readonly onCancelled?: () => void;
  readonly onProgress?: ProgressCallback;
  readonly progressIntervals?: readonly ProgressTier[];
  /** Name used in error messages, usually the file path. */
  readonly sourceName?: string;
}
