import { Context, Effect, Layer } from 'effect';
import * as fs from 'fs';
import * as path from 'path';
import { ScanConfig, type LogLevelName } from '../Config/ScanConfig.service.js';
import type { LinkScanError, SourceKind } from '../errors.js';
import type { ScanResults } from '../Scan/types.js';

export interface AuditLogEvent {
  timestamp: string;
  type:
    | 'file_start'
    | 'file_complete'
    | 'file_cancelled'
    | 'validation_stats'
    | 'large_file'
    | 'error'
    | 'export';
  level: LogLevelName;
  filePath?: string;
  message: string;
  details?: Record<string, unknown>;
}

export interface AuditLogger {
  readonly logEvent: (
    event: Omit<AuditLogEvent, 'timestamp'>
  ) => Effect.Effect<void>;
  readonly logFileStart: (
    filePath: string,
    sizeBytes: number,
    kind: SourceKind
  ) => Effect.Effect<void>;
  readonly logFileComplete: (
    filePath: string,
    results: ScanResults,
    durationMs: number
  ) => Effect.Effect<void>;
  readonly logFileCancelled: (
    filePath: string,
    results: ScanResults,
    durationMs: number
  ) => Effect.Effect<void>;
  readonly logValidationStats: (
    kind: SourceKind,
    itemsProcessed: number,
    durationMs: number
  ) => Effect.Effect<void>;
  readonly logLargeFile: (
    filePath: string,
    sizeBytes: number
  ) => Effect.Effect<void>;
  readonly logError: (
    error: LinkScanError,
    filePath?: string
  ) => Effect.Effect<void>;
  readonly logExport: (
    exportPath: string,
    format: string,
    recordCount: number
  ) => Effect.Effect<void>;
}

export const AuditLogger = Context.GenericTag<AuditLogger>('AuditLogger');

const SEVERITY: Record<LogLevelName, number> = {
  debug: 10,
  info: 20,
  warning: 30,
  error: 40,
};

const mirrorToEffectLog = (event: AuditLogEvent): Effect.Effect<void> => {
  const line = `[${event.type}] ${event.message}`;
  const annotations = event.filePath ? { filePath: event.filePath } : {};
  switch (event.level) {
    case 'debug':
      return Effect.logDebug(line).pipe(Effect.annotateLogs(annotations));
    case 'info':
      return Effect.logInfo(line).pipe(Effect.annotateLogs(annotations));
    case 'warning':
      return Effect.logWarning(line).pipe(Effect.annotateLogs(annotations));
    case 'error':
      return Effect.logError(line).pipe(Effect.annotateLogs(annotations));
  }
};

/**
 * Builds an audit logger around a sink. Events below `level` are dropped
 * before they reach the sink.
 */
const makeAuditLoggerWith = (
  sink: (event: AuditLogEvent) => Effect.Effect<void>,
  level: LogLevelName
): AuditLogger => {
  const logEvent = (event: Omit<AuditLogEvent, 'timestamp'>) =>
    SEVERITY[event.level] < SEVERITY[level]
      ? Effect.void
      : sink({ ...event, timestamp: new Date().toISOString() });

  const summarise = (results: ScanResults, durationMs: number) => ({
    valid: results.valid.length,
    invalid: results.invalid.length,
    itemsProcessed: results.itemsProcessed,
    durationMs,
  });

  return {
    logEvent,

    logFileStart: (filePath, sizeBytes, kind) =>
      logEvent({
        type: 'file_start',
        level: 'info',
        filePath,
        message: `Starting processing: ${path.basename(filePath)} (${sizeBytes} bytes)`,
        details: { sizeBytes, kind },
      }),

    logFileComplete: (filePath, results, durationMs) =>
      logEvent({
        type: 'file_complete',
        level: 'info',
        filePath,
        message: `Completed processing: ${path.basename(filePath)} - Valid: ${results.valid.length}, Invalid: ${results.invalid.length}, Time: ${(durationMs / 1000).toFixed(2)}s`,
        details: summarise(results, durationMs),
      }),

    logFileCancelled: (filePath, results, durationMs) =>
      logEvent({
        type: 'file_cancelled',
        level: 'warning',
        filePath,
        message: `Cancelled processing: ${path.basename(filePath)} after ${results.itemsProcessed} items`,
        details: summarise(results, durationMs),
      }),

    logValidationStats: (kind, itemsProcessed, durationMs) => {
      const seconds = durationMs / 1000;
      const rate = seconds > 0 ? itemsProcessed / seconds : 0;
      return logEvent({
        type: 'validation_stats',
        level: 'debug',
        message: `Validated ${itemsProcessed} ${kind} items in ${seconds.toFixed(2)}s (${rate.toFixed(1)} items/sec)`,
        details: { kind, itemsProcessed, durationMs, rate },
      });
    },

    logLargeFile: (filePath, sizeBytes) =>
      logEvent({
        type: 'large_file',
        level: 'warning',
        filePath,
        message: `Large file detected: ${path.basename(filePath)} (${(sizeBytes / (1024 * 1024)).toFixed(1)}MB)`,
        details: { sizeBytes },
      }),

    logError: (error, filePath) =>
      logEvent({
        type: 'error',
        level: 'error',
        filePath,
        message: `${error._tag}: ${error.message}`,
        details: { tag: error._tag },
      }),

    logExport: (exportPath, format, recordCount) =>
      logEvent({
        type: 'export',
        level: 'info',
        filePath: exportPath,
        message: `Exported ${recordCount} records as ${format} to ${exportPath}`,
        details: { format, recordCount },
      }),
  };
};

export interface AuditLoggerOptions {
  /** When set, events are appended as JSON lines to a file in this directory. */
  readonly logDir?: string;
  readonly level?: LogLevelName;
}

/**
 * Audit logger that mirrors events to Effect's logger and, given a log
 * directory, appends them to `linkscan-<timestamp>.jsonl` there.
 */
export const makeAuditLogger = (options: AuditLoggerOptions = {}): AuditLogger => {
  const { logDir } = options;
  let logFilePath: string | undefined;
  if (logDir) {
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }
    const logFileName = `linkscan-${new Date().toISOString().replace(/[:.]/g, '-')}.jsonl`;
    logFilePath = path.join(logDir, logFileName);
  }

  const writeLogEvent = (event: AuditLogEvent) =>
    Effect.gen(function* () {
      if (logFilePath) {
        const target = logFilePath;
        yield* Effect.sync(() => {
          fs.appendFileSync(target, JSON.stringify(event) + '\n');
        });
      }
      yield* mirrorToEffectLog(event);
    });

  return makeAuditLoggerWith(writeLogEvent, options.level ?? 'info');
};

/**
 * Audit logger that only records events in memory, for tests.
 */
export const makeMemoryAuditLogger = (
  level: LogLevelName = 'debug'
): { readonly logger: AuditLogger; readonly events: AuditLogEvent[] } => {
  const events: AuditLogEvent[] = [];
  const logger = makeAuditLoggerWith(
    (event) =>
      Effect.sync(() => {
        events.push(event);
      }),
    level
  );
  return { logger, events };
};

export const AuditLoggerLive = Layer.succeed(AuditLogger, makeAuditLogger());

/**
 * Audit logger whose level and log directory come from {@link ScanConfig}.
 */
export const AuditLoggerFromConfig = Layer.effect(
  AuditLogger,
  Effect.gen(function* () {
    const config = yield* ScanConfig;
    const options = yield* config.getOptions();
    return yield* Effect.sync(() =>
      makeAuditLogger({ logDir: options.logDir, level: options.logLevel })
    );
  })
);
