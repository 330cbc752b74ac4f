import { Effect, Layer } from 'effect';
import {
  DEFAULT_PROGRESS_INTERVALS,
  type ProgressTier,
} from '../Progress/ProgressReporter.js';

/**
 * Severity names used for the audit log threshold.
 *
 * @group Configuration
 * @public
 */
export type LogLevelName = 'debug' | 'info' | 'warning' | 'error';

/**
 * Limits and defaults for scanning files.
 *
 * @group Configuration
 * @public
 */
export interface ScanConfigOptions {
  /** Largest file accepted, in megabytes (default: 100) */
  readonly maxFileSizeMb: number;
  /** Files above this size are logged as large (default: 10) */
  readonly largeFileThresholdMb: number;
  /** Rows read per worksheet (default: 50 000) */
  readonly maxSheetRows: number;
  /** Columns read per worksheet (default: 200) */
  readonly maxSheetColumns: number;
  /**
   * Encodings tried in order when decoding text files.
   * Known names: `utf-8`, `latin-1`, `cp1252`, `ascii`, `utf-16`.
   */
  readonly encodingFallbacks: readonly string[];
  /** Progress interval table, checked top to bottom */
  readonly progressIntervals: readonly ProgressTier[];
  /** Whether the first CSV record holds column names (default: true) */
  readonly csvHasHeader: boolean;
  /** URLs longer than this are shortened in reports (default: 100) */
  readonly maxUrlDisplayLength: number;
  /** Invalid entries listed in a report before summarising (default: 50) */
  readonly maxReportedInvalid: number;
  /** Lower-cased extensions, dot included, that have a driver */
  readonly supportedExtensions: readonly string[];
  /** Lowest severity written to the audit log (default: 'info') */
  readonly logLevel: LogLevelName;
  /** Directory for JSONL audit logs; no file is written when unset */
  readonly logDir?: string;
}

/**
 * Accessors over the scan configuration.
 *
 * @group Configuration
 * @public
 */
export interface ScanConfigService {
  getOptions: () => Effect.Effect<ScanConfigOptions>;
  /** Case-insensitive; expects the dot, as `path.extname` returns it */
  isSupportedExtension: (extension: string) => Effect.Effect<boolean>;
}

const DEFAULT_OPTIONS: ScanConfigOptions = {
  maxFileSizeMb: 100,
  largeFileThresholdMb: 10,
  maxSheetRows: 50_000,
  maxSheetColumns: 200,
  encodingFallbacks: ['utf-8', 'latin-1', 'cp1252', 'ascii', 'utf-16'],
  progressIntervals: DEFAULT_PROGRESS_INTERVALS,
  csvHasHeader: true,
  maxUrlDisplayLength: 100,
  maxReportedInvalid: 50,
  supportedExtensions: ['.csv', '.xlsx', '.txt', '.html', '.htm', '.xml'],
  logLevel: 'info',
};

/**
 * Named presets layered over the defaults.
 *
 * @example
 * ```typescript
 * const layer = ScanConfig.Live(ScanConfigProfiles.production);
 * ```
 *
 * @group Configuration
 * @public
 */
export const ScanConfigProfiles = {
  default: {},
  development: { maxFileSizeMb: 50, logLevel: 'debug' },
  production: { maxFileSizeMb: 200, logLevel: 'warning' },
} satisfies Record<string, Partial<ScanConfigOptions>>;

export type ScanConfigProfile = keyof typeof ScanConfigProfiles;

export const isScanConfigProfile = (name: string): name is ScanConfigProfile =>
  Object.prototype.hasOwnProperty.call(ScanConfigProfiles, name);

/**
 * Builds a {@link ScanConfigService} from options merged over the defaults.
 *
 * @group Configuration
 * @public
 */
export const makeScanConfig = (
  options: Partial<ScanConfigOptions> = {}
): ScanConfigService => {
  const config: ScanConfigOptions = { ...DEFAULT_OPTIONS, ...options };
  const supported = new Set(
    config.supportedExtensions.map((extension) => extension.toLowerCase())
  );

  return {
    getOptions: () => Effect.succeed(config),

    isSupportedExtension: (extension) =>
      Effect.succeed(supported.has(extension.toLowerCase())),
  };
};

/**
 * The scan configuration service.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const config = yield* ScanConfig;
 *   const { maxFileSizeMb } = yield* config.getOptions();
 *   console.log(`Accepting files up to ${maxFileSizeMb}MB`);
 * });
 *
 * await Effect.runPromise(program.pipe(Effect.provide(ScanConfig.Default)));
 * ```
 *
 * @group Configuration
 * @public
 */
export class ScanConfig extends Effect.Service<ScanConfigService>()(
  'linkscan/ScanConfig',
  {
    effect: Effect.sync(() => makeScanConfig({})),
  }
) {
  /**
   * Creates a Layer that provides ScanConfig with custom options
   * @param config - The configuration options or a pre-made ScanConfigService
   */
  static Live = (config: Partial<ScanConfigOptions> | ScanConfigService) =>
    Layer.effect(
      ScanConfig,
      Effect.succeed('getOptions' in config ? config : makeScanConfig(config))
    );
}
