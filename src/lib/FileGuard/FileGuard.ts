/**
 * File System Guards
 * Effect-based checks run on an input file before any driver sees it
 */

import { Effect } from 'effect';
import * as fs from 'fs/promises';
import * as path from 'path';
import {
  EmptyFileError,
  EncodingError,
  FileNotFoundError,
  FileSizeError,
  InvalidPathError,
} from '../errors.js';

const BYTES_PER_MB = 1024 * 1024;
const NOT_FOUND_CODES: ReadonlySet<string> = new Set(['ENOENT', 'ENOTDIR']);

export interface FileInfo {
  readonly path: string;
  readonly name: string;
  /** Lower-cased, dot included; empty when the name has none */
  readonly extension: string;
  readonly sizeBytes: number;
  readonly sizeLabel: string;
  /** Larger than the large-file threshold */
  readonly isLarge: boolean;
}

/**
 * Size limits applied by {@link FileGuard.inspect}, in megabytes.
 */
export interface FileLimits {
  readonly maxFileSizeMb: number;
  readonly largeFileThresholdMb: number;
}

export interface DecodedText {
  readonly text: string;
  readonly encoding: string;
}

const errorCode = (error: unknown): string | undefined =>
  typeof error === 'object' &&
  error !== null &&
  'code' in error &&
  typeof error.code === 'string'
    ? error.code
    : undefined;

const accessError = (filePath: string, error: unknown) => {
  const code = errorCode(error);
  if (code && NOT_FOUND_CODES.has(code)) {
    return new FileNotFoundError({ path: filePath, cause: error });
  }
  if (code === 'EACCES' || code === 'EPERM') {
    return new InvalidPathError({ path: filePath, reason: 'permission denied' });
  }
  return new InvalidPathError({
    path: filePath,
    reason: error instanceof Error ? error.message : String(error),
  });
};

/**
 * Human-readable size using binary units.
 *
 * @example
 * ```ts
 * formatFileSize(512);     // '512 B'
 * formatFileSize(1536);    // '1.5 KB'
 * formatFileSize(1048576); // '1.0 MB'
 * ```
 */
export const formatFileSize = (sizeBytes: number): string => {
  let size = sizeBytes;
  for (const unit of ['B', 'KB', 'MB', 'GB']) {
    if (size < 1024) {
      return unit === 'B' ? `${size} ${unit}` : `${size.toFixed(1)} ${unit}`;
    }
    size /= 1024;
  }
  return `${size.toFixed(1)} TB`;
};

const decodeStrict = (label: string, bytes: Uint8Array): string | undefined => {
  try {
    return new TextDecoder(label, { fatal: true }).decode(bytes);
  } catch {
    return undefined;
  }
};

// Characters for bytes 0x80-0x9F; U+FFFD marks the five undefined bytes.
const CP1252_HIGH =
  '\u20AC\uFFFD\u201A\u0192\u201E\u2026\u2020\u2021' +
  '\u02C6\u2030\u0160\u2039\u0152\uFFFD\u017D\uFFFD' +
  '\uFFFD\u2018\u2019\u201C\u201D\u2022\u2013\u2014' +
  '\u02DC\u2122\u0161\u203A\u0153\uFFFD\u017E\u0178';

const isCp1252Undefined = (byte: number): boolean =>
  byte >= 0x80 && byte <= 0x9f && CP1252_HIGH[byte - 0x80] === '\uFFFD';

const decodeCp1252 = (bytes: Uint8Array): string | undefined => {
  if (bytes.some(isCp1252Undefined)) return undefined;
  return Buffer.from(bytes)
    .toString('latin1')
    .replace(/[\u0080-\u009F]/g, (char) => CP1252_HIGH[char.charCodeAt(0) - 0x80]);
};

/**
 * Decodes bytes with one named encoding. Returns undefined when the bytes
 * are not valid in that encoding or the name is unknown.
 */
export const decodeWith = (
  bytes: Uint8Array,
  encoding: string
): string | undefined => {
  switch (encoding.toLowerCase().replace(/_/g, '-')) {
    case 'utf-8':
    case 'utf8':
      return decodeStrict('utf-8', bytes);
    case 'latin-1':
    case 'latin1':
    case 'iso-8859-1':
      return Buffer.from(bytes).toString('latin1');
    case 'cp1252':
    case 'windows-1252':
      return decodeCp1252(bytes);
    case 'ascii':
    case 'us-ascii':
      return bytes.every((byte) => byte < 0x80)
        ? Buffer.from(bytes).toString('ascii')
        : undefined;
    case 'utf-16':
    case 'utf-16le':
      return decodeStrict('utf-16le', bytes);
    default:
      return undefined;
  }
};

export const FileGuard = {
  /**
   * Checks that a path names a non-empty regular file within the size limit
   *
   * @example
   * ```ts
   * const info = yield* FileGuard.inspect('/data/links.csv', {
   *   maxFileSizeMb: 100,
   *   largeFileThresholdMb: 10,
   * });
   * console.log(`${info.name}: ${info.sizeLabel}`);
   * ```
   */
  inspect: (filePath: string, limits: FileLimits) =>
    Effect.gen(function* () {
      if (filePath.trim() === '') {
        return yield* Effect.fail(
          new InvalidPathError({ path: filePath, reason: 'no file path given' })
        );
      }

      const stats = yield* Effect.tryPromise({
        try: () => fs.stat(filePath),
        catch: (error) => accessError(filePath, error),
      });

      if (!stats.isFile()) {
        return yield* Effect.fail(
          new InvalidPathError({ path: filePath, reason: 'not a regular file' })
        );
      }
      if (stats.size === 0) {
        return yield* Effect.fail(new EmptyFileError({ path: filePath }));
      }
      if (stats.size > limits.maxFileSizeMb * BYTES_PER_MB) {
        return yield* Effect.fail(
          new FileSizeError({
            path: filePath,
            sizeBytes: stats.size,
            maxSizeMb: limits.maxFileSizeMb,
          })
        );
      }

      const info: FileInfo = {
        path: filePath,
        name: path.basename(filePath),
        extension: path.extname(filePath).toLowerCase(),
        sizeBytes: stats.size,
        sizeLabel: formatFileSize(stats.size),
        isLarge: stats.size > limits.largeFileThresholdMb * BYTES_PER_MB,
      };
      return info;
    }),

  /**
   * Read the whole file as bytes
   */
  readBytes: (filePath: string) =>
    Effect.tryPromise({
      try: () => fs.readFile(filePath),
      catch: (error) => accessError(filePath, error),
    }),

  /**
   * Decode bytes with the first encoding that accepts them
   *
   * @example
   * ```ts
   * const { text, encoding } = yield* FileGuard.decodeText(bytes, ['utf-8', 'latin-1']);
   * ```
   */
  decodeText: (
    bytes: Uint8Array,
    encodings: readonly string[],
    filePath?: string
  ): Effect.Effect<DecodedText, EncodingError> =>
    Effect.gen(function* () {
      for (const encoding of encodings) {
        const text = decodeWith(bytes, encoding);
        if (text !== undefined) {
          if (encoding !== encodings[0]) {
            yield* Effect.logDebug(
              `Decoded ${filePath ?? 'input'} with fallback encoding ${encoding}`
            );
          }
          return { text, encoding };
        }
      }
      return yield* Effect.fail(
        new EncodingError({ path: filePath, triedEncodings: encodings })
      );
    }),

  /**
   * Check whether a path names an existing directory
   */
  isDirectory: (dirPath: string) =>
    Effect.promise(() =>
      fs.stat(dirPath).then(
        (stats) => stats.isDirectory(),
        () => false
      )
    ),
};
