/**
 * Example 01: Scanning a File
 *
 * Scans the file named on the command line with the development profile,
 * logs every invalid URL with its location and writes a JSON export next
 * to the input.
 *
 * Usage: tsx src/examples/01-scan-file.ts ./links.csv
 */

import { Effect, Layer } from 'effect';
import * as path from 'path';
import {
  AuditLoggerFromConfig,
  describeError,
  exportResults,
  FileScanner,
  ScanConfig,
  ScanConfigProfiles,
} from '../index.js';

const program = (filePath: string) =>
  Effect.gen(function* () {
    const scanner = yield* FileScanner;
    const report = yield* scanner.scanFile(filePath, {
      onProgress: (fraction) => {
        Effect.runSync(Effect.logDebug(`Progress: ${Math.round(fraction * 100)}%`));
      },
    });

    yield* Effect.logInfo(
      `${report.file.name} (${report.file.sizeLabel}, ${report.kind}): ` +
        `${report.results.valid.length} valid, ${report.results.invalid.length} invalid`
    );
    for (const entry of report.results.invalidEntries) {
      yield* Effect.logInfo(`  ${entry.location}: ${entry.value}`);
    }

    const target = path.join(path.dirname(filePath), 'link-results.json');
    const written = yield* exportResults(report.results, target, 'json');
    yield* Effect.logInfo(`Exported to ${written}`);
  });

const configLayer = ScanConfig.Live(ScanConfigProfiles.development);
const layer = FileScanner.Default.pipe(
  Layer.provideMerge(Layer.merge(configLayer, AuditLoggerFromConfig.pipe(Layer.provide(configLayer))))
);

const filePath = process.argv[2] ?? 'links.csv';

Effect.runPromise(
  program(filePath).pipe(
    Effect.catchAll((error) => Effect.logError(describeError(error))),
    Effect.provide(layer)
  )
).catch((error: unknown) => {
  console.error('Example failed:', error);
  process.exitCode = 1;
});
