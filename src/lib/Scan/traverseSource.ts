import { Effect } from 'effect';
import { ProcessingError, type SourceKind } from '../errors.js';
import { makeProgressReporter } from '../Progress/ProgressReporter.js';
import { makeScanAccumulator } from './ScanAccumulator.js';
import type { DriverOptions, GateMode, ScanResults, SourceItem } from './types.js';

/**
 * What a driver hands to the shared traversal: a lazily produced sequence of
 * outer units (rows, lines, elements), each holding its fragments.
 */
export interface FragmentSource {
  readonly kind: SourceKind;
  readonly gate: GateMode;
  /** Number of items the traversal will visit when it runs to completion. */
  readonly total: number;
  readonly units: Iterable<Iterable<SourceItem>>;
}

/**
 * Walks a fragment source, feeding every item through the accumulator.
 *
 * The abort signal is polled before each outer unit after the first that
 * remains; once aborted the walk stops, calls `onCancelled` and returns the
 * results gathered so far without a final progress report. A source whose
 * units are exhausted always completes, even if the signal fired meanwhile. After each progress report the fiber sleeps for zero
 * milliseconds so that timers and signal handlers get to run during long
 * scans. Any exception thrown while producing or recording items fails the
 * whole scan with a {@link ProcessingError}.
 */
export const traverseSource = (
  source: FragmentSource,
  options: DriverOptions = {}
): Effect.Effect<ScanResults, ProcessingError> =>
  Effect.gen(function* () {
    const accumulator = makeScanAccumulator(source.gate);
    const reporter = makeProgressReporter(
      source.total,
      options.onProgress,
      options.progressIntervals
    );
    const fail = (cause: unknown) =>
      ProcessingError.fromCause(source.kind, cause, options.sourceName);

    const units = yield* Effect.try({
      try: () => source.units[Symbol.iterator](),
      catch: fail,
    });

    while (true) {
      const next = yield* Effect.try({ try: () => units.next(), catch: fail });
      if (next.done) break;

      if (options.signal?.aborted) {
        yield* Effect.logDebug(
          `Scan of ${source.kind} source cancelled after ${reporter.processed()} items`
        );
        options.onCancelled?.();
        return accumulator.results(reporter.processed());
      }

      const reported = yield* Effect.try({
        try: () => {
          let emitted = false;
          for (const item of next.value) {
            accumulator.record(item);
            emitted = reporter.tick() || emitted;
          }
          return emitted;
        },
        catch: fail,
      });

      if (reported) {
        yield* Effect.sleep(0);
      }
    }

    reporter.complete();
    return accumulator.results(reporter.processed());
  });
