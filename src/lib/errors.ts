import { Data } from 'effect';

/**
 * Kind of source a driver reads.
 */
export type SourceKind = 'tabular' | 'spreadsheet' | 'text' | 'markup';

/**
 * The path is empty or does not point at a regular file.
 */
export class InvalidPathError extends Data.TaggedError('InvalidPathError')<{
  readonly path: string;
  readonly reason: string;
}> {
  get message(): string {
    return this.path
      ? `Invalid file path ${this.path}: ${this.reason}`
      : `Invalid file path: ${this.reason}`;
  }
}

/**
 * Nothing exists at the path.
 */
export class FileNotFoundError extends Data.TaggedError('FileNotFoundError')<{
  readonly path: string;
  readonly cause?: unknown;
}> {
  get message(): string {
    return `File not found: ${this.path}`;
  }
}

/**
 * The file exists but holds zero bytes.
 */
export class EmptyFileError extends Data.TaggedError('EmptyFileError')<{
  readonly path: string;
}> {
  get message(): string {
    return `File is empty: ${this.path}`;
  }
}

/**
 * The file is larger than the configured limit.
 */
export class FileSizeError extends Data.TaggedError('FileSizeError')<{
  readonly path: string;
  readonly sizeBytes: number;
  readonly maxSizeMb: number;
}> {
  get message(): string {
    return `File ${this.path} is too large (${this.sizeBytes} bytes, max ${this.maxSizeMb}MB)`;
  }
}

/**
 * No driver handles the file's extension.
 */
export class UnsupportedFormatError extends Data.TaggedError(
  'UnsupportedFormatError'
)<{
  readonly path: string;
  readonly extension: string;
  readonly supported: readonly string[];
}> {
  get message(): string {
    const extension = this.extension || '(none)';
    return `Unsupported file format ${extension} for ${this.path}. Expected one of: ${this.supported.join(', ')}`;
  }
}

/**
 * None of the fallback encodings could decode the file.
 */
export class EncodingError extends Data.TaggedError('EncodingError')<{
  readonly path?: string;
  readonly triedEncodings: readonly string[];
}> {
  get message(): string {
    const target = this.path ? ` ${this.path}` : '';
    return `Could not decode file${target} with any of: ${this.triedEncodings.join(', ')}`;
  }
}

/**
 * A driver failed while reading or traversing its source. The scan is
 * aborted and whatever had accumulated is dropped.
 */
export class ProcessingError extends Data.TaggedError('ProcessingError')<{
  readonly kind: SourceKind;
  readonly source?: string;
  readonly cause?: unknown;
}> {
  get message(): string {
    const source = this.source ? ` ${this.source}` : '';
    const cause = this.cause instanceof Error ? this.cause.message : String(this.cause);
    return `Failed to process ${this.kind} source${source}: ${cause}`;
  }

  static fromCause(kind: SourceKind, cause: unknown, source?: string): ProcessingError {
    return new ProcessingError({ kind, source, cause });
  }
}

/**
 * Writing results to disk failed, or there was nothing to write.
 */
export class ExportError extends Data.TaggedError('ExportError')<{
  readonly path: string;
  readonly format: string;
  readonly reason: 'no_results' | 'write_failed';
  readonly cause?: unknown;
}> {
  get message(): string {
    if (this.reason === 'no_results') {
      return 'No results available to export.';
    }
    return `Failed to export ${this.format} results to ${this.path}: ${this.cause}`;
  }

  static noResults(path: string, format: string): ExportError {
    return new ExportError({ path, format, reason: 'no_results' });
  }

  static writeFailed(path: string, format: string, cause: unknown): ExportError {
    return new ExportError({ path, format, reason: 'write_failed', cause });
  }
}

/**
 * Errors raised before any driver runs.
 */
export type PreconditionError =
  | InvalidPathError
  | FileNotFoundError
  | EmptyFileError
  | FileSizeError
  | UnsupportedFormatError
  | EncodingError;

export type ScanError = PreconditionError | ProcessingError;

export type LinkScanError = ScanError | ExportError;

const PRECONDITION_TAGS: ReadonlySet<string> = new Set([
  'InvalidPathError',
  'FileNotFoundError',
  'EmptyFileError',
  'FileSizeError',
  'UnsupportedFormatError',
  'EncodingError',
]);

export const isPreconditionError = (
  error: LinkScanError
): error is PreconditionError => PRECONDITION_TAGS.has(error._tag);

/**
 * Message to show the user for an error, without internal detail.
 */
export const describeError = (error: LinkScanError): string => {
  switch (error._tag) {
    case 'InvalidPathError':
    case 'FileNotFoundError':
      return 'Please check that the file exists and is accessible.';
    case 'EmptyFileError':
      return 'The selected file is empty.';
    case 'FileSizeError':
      return `The file is too large to process. Maximum size allowed is ${error.maxSizeMb}MB.`;
    case 'UnsupportedFormatError':
      return 'This file format is not supported. Please use CSV, Excel, Text, or HTML files.';
    case 'EncodingError':
      return 'Could not read the file. It may be corrupted or use an unsupported encoding.';
    case 'ExportError':
      return error.reason === 'no_results'
        ? 'No results available to export.'
        : 'Failed to save the results. Please check file permissions and disk space.';
    case 'ProcessingError':
      return 'An unexpected error occurred. Please try again.';
  }
};
