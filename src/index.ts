// Detection
export * from './lib/Detection/index.js';

// Cell values
export {
  CellValue,
  fromCsvField,
  fromUnknown,
  safeStringConversion,
  toFragmentText,
} from './lib/CellValue/CellValue.js';

// Progress
export type {
  ProgressCallback,
  ProgressReporter,
  ProgressTier,
} from './lib/Progress/ProgressReporter.js';
export {
  DEFAULT_PROGRESS_INTERVALS,
  makeProgressReporter,
  progressInterval,
} from './lib/Progress/ProgressReporter.js';

// Scan results and the shared traversal
export * from './lib/Scan/index.js';

// Extraction drivers
export * from './lib/Drivers/index.js';

// ScanConfig types, class, and factory function
export type {
  LogLevelName,
  ScanConfigOptions,
  ScanConfigProfile,
  ScanConfigService,
} from './lib/Config/ScanConfig.service.js';
export {
  isScanConfigProfile,
  makeScanConfig,
  ScanConfig,
  ScanConfigProfiles,
} from './lib/Config/ScanConfig.service.js';

// Audit logging
export type {
  AuditLogEvent,
  AuditLoggerOptions,
} from './lib/Logging/AuditLogger.service.js';
export {
  AuditLogger,
  AuditLoggerFromConfig,
  AuditLoggerLive,
  makeAuditLogger,
  makeMemoryAuditLogger,
} from './lib/Logging/AuditLogger.service.js';

// File checks
export type { DecodedText, FileInfo } from './lib/FileGuard/FileGuard.js';
export { decodeWith, FileGuard, formatFileSize } from './lib/FileGuard/FileGuard.js';

// Scanner
export type {
  ScanFileOptions,
  ScanReport,
  ScanStatus,
} from './lib/Scanner/FileScanner.service.js';
export { FileScanner, KIND_BY_EXTENSION } from './lib/Scanner/FileScanner.service.js';

// Export and report
export type { ExportFormat } from './lib/Export/ResultsExporter.js';
export {
  defaultExportFileName,
  EXPORT_FORMATS,
  exportResults,
  formatCsvExport,
  formatJsonExport,
  isExportFormat,
} from './lib/Export/ResultsExporter.js';
export type { ResultsReportOptions } from './lib/Report/ResultsReport.js';
export { formatResultsReport, truncateText } from './lib/Report/ResultsReport.js';

// Errors
export * from './lib/errors.js';

// Command line
export type { CliOptions } from './lib/Cli/CliArgs.js';
export { CliUsageError, parseCliArgs, USAGE } from './lib/Cli/CliArgs.js';
export type { CliOutput, CliRunOptions } from './lib/Cli/CliProgram.js';
export {
  EXIT_CANCELLED,
  EXIT_OK,
  EXIT_PRECONDITION_FAILED,
  EXIT_PROCESSING_FAILED,
  makeCliLayer,
  runCli,
} from './lib/Cli/CliProgram.js';
