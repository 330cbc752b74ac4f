/**
 * FileScanner Tests
 * Tests for scanning files on disk end to end
 */

import { Effect } from 'effect';
import ExcelJS from 'exceljs';
import { describe, expect, it } from 'vitest';
import type { ScanConfigOptions } from '../../../lib/Config/ScanConfig.service.js';
import { FileScanner, type ScanFileOptions } from '../../../lib/Scanner/FileScanner.service.js';
import { createTestLayer, runEffect, runEffectEither, writeTempFile } from '../../utils/test-helpers.js';

const scanWith = (
  filePath: string,
  options: ScanFileOptions = {},
  config: Partial<ScanConfigOptions> = {}
) => {
  const { layer, events } = createTestLayer(config);
  const program = Effect.gen(function* () {
    const scanner = yield* FileScanner;
    return yield* scanner.scanFile(filePath, options);
  }).pipe(Effect.provide(layer));
  return { program, events };
};

const csvSample = [
  'URL,Description',
  'http://example.com,Example website',
  'https://google.com,Search engine',
  'not-a-url,Invalid URL',
  ',Empty cell',
  'http://localhost:3000,Local server',
].join('\n');

describe('FileScanner.scanFile', () => {
  it('should scan a CSV file and log its progress through the audit log', async () => {
    const filePath = await writeTempFile('links.csv', csvSample);
    const { program, events } = scanWith(filePath);

    const report = await runEffect(program);

    expect(report.kind).toBe('tabular');
    expect(report.encoding).toBe('utf-8');
    expect(report.status).toBe('completed');
    expect(report.file.name).toBe('links.csv');
    expect(report.results.valid).toEqual([
      'http://example.com',
      'http://localhost:3000',
      'https://google.com',
    ]);
    expect(events.map((event) => event.type)).toEqual([
      'file_start',
      'file_complete',
      'validation_stats',
    ]);
  });

  it('should read the first row as data when the header is switched off', async () => {
    const filePath = await writeTempFile('plain.csv', 'www.first.example.com\n');
    const { program } = scanWith(filePath, {}, { csvHasHeader: false });

    const report = await runEffect(program);

    expect(report.results.invalidEntries).toEqual([
      { value: 'www.first.example.com', location: "column '1', row 1" },
    ]);
  });

  it('should fall back to latin-1 for text that is not UTF-8', async () => {
    const content = new Uint8Array([
      ...new TextEncoder().encode('caf'),
      0xe9,
      ...new TextEncoder().encode('\nhttps://example.com\n'),
    ]);
    const filePath = await writeTempFile('menu.txt', content);
    const { program } = scanWith(filePath);

    const report = await runEffect(program);

    expect(report.kind).toBe('text');
    expect(report.encoding).toBe('latin-1');
    expect(report.results.valid).toEqual(['https://example.com']);
    expect(report.results.itemsProcessed).toBe(2);
  });

  it('should fail when no fallback encoding fits', async () => {
    const filePath = await writeTempFile('menu.txt', new Uint8Array([0x63, 0xe9]));
    const { program, events } = scanWith(filePath, {}, { encodingFallbacks: ['utf-8', 'ascii'] });

    const result = await runEffectEither(program);

    expect(result._tag === 'Left' && result.left._tag).toBe('EncodingError');
    expect(events.map((event) => event.type)).toEqual(['file_start', 'error']);
  });

  it('should pick the markup driver for HTML and XML', async () => {
    const htmlPath = await writeTempFile(
      'page.HTML',
      '<a href="https://google.com">G</a><a href="not-a-url">x</a>'
    );
    const xmlPath = await writeTempFile(
      'feed.xml',
      '<?xml version="1.0"?><feed><link href="https://feed.example.com/"/></feed>'
    );

    const html = await runEffect(scanWith(htmlPath).program);
    const xml = await runEffect(scanWith(xmlPath).program);

    expect(html.kind).toBe('markup');
    expect(html.results.valid).toEqual(['https://google.com']);
    expect(html.results.invalid).toEqual(['not-a-url']);
    expect(xml.results.valid).toEqual(['https://feed.example.com/']);
  });

  it('should scan an xlsx workbook without decoding it', async () => {
    const workbook = new ExcelJS.Workbook();
    workbook.addWorksheet('Links').addRow(['https://sheet.example.com', 'www.sheet.example.com']);
    const filePath = await writeTempFile(
      'book.xlsx',
      new Uint8Array(await workbook.xlsx.writeBuffer())
    );

    const report = await runEffect(scanWith(filePath).program);

    expect(report.kind).toBe('spreadsheet');
    expect(report.encoding).toBeUndefined();
    expect(report.results.valid).toEqual(['https://sheet.example.com']);
    expect(report.results.invalidEntries).toEqual([
      { value: 'www.sheet.example.com', location: "sheet 'Links', cell B1" },
    ]);
  });

  it('should reject an unsupported extension before reading the file', async () => {
    const filePath = await writeTempFile('report.pdf', 'https://example.com');
    const { program, events } = scanWith(filePath);

    const result = await runEffectEither(program);

    expect(result._tag).toBe('Left');
    if (result._tag === 'Left' && result.left._tag === 'UnsupportedFormatError') {
      expect(result.left.extension).toBe('.pdf');
    } else {
      expect.fail('expected an UnsupportedFormatError');
    }
    expect(events.map((event) => event.type)).toEqual(['error']);
  });

  it('should reject extensions that are configured but have no driver', async () => {
    const filePath = await writeTempFile('notes.md', 'https://example.com');
    const { program } = scanWith(filePath, {}, { supportedExtensions: ['.md'] });

    const result = await runEffectEither(program);

    expect(result._tag === 'Left' && result.left._tag).toBe('UnsupportedFormatError');
  });

  it('should reject extensions left out of the configuration', async () => {
    const filePath = await writeTempFile('notes.txt', 'https://example.com');
    const { program } = scanWith(filePath, {}, { supportedExtensions: ['.csv'] });

    const result = await runEffectEither(program);

    expect(result._tag === 'Left' && result.left._tag).toBe('UnsupportedFormatError');
  });

  it('should reject empty and oversized files', async () => {
    const emptyPath = await writeTempFile('empty.txt', '');
    const bigPath = await writeTempFile('big.txt', 'https://example.com');

    const empty = await runEffectEither(scanWith(emptyPath).program);
    const big = await runEffectEither(scanWith(bigPath, {}, { maxFileSizeMb: 0.00001 }).program);

    expect(empty._tag === 'Left' && empty.left._tag).toBe('EmptyFileError');
    expect(big._tag === 'Left' && big.left._tag).toBe('FileSizeError');
  });

  it('should flag large files in the audit log', async () => {
    const filePath = await writeTempFile('links.txt', 'https://example.com');
    const { program, events } = scanWith(filePath, {}, { largeFileThresholdMb: 0 });

    await runEffect(program);

    expect(events.map((event) => event.type)).toEqual([
      'file_start',
      'large_file',
      'file_complete',
      'validation_stats',
    ]);
  });

  it('should return a cancelled report when the signal has fired', async () => {
    const controller = new AbortController();
    controller.abort();
    const filePath = await writeTempFile('links.txt', 'https://example.com\nhttps://google.com');
    const { program, events } = scanWith(filePath, { signal: controller.signal });

    const report = await runEffect(program);

    expect(report.status).toBe('cancelled');
    expect(report.results.itemsProcessed).toBe(0);
    expect(events.map((event) => event.type)).toContain('file_cancelled');
  });

  it('should report a completed scan when the signal fires after the last line', async () => {
    const controller = new AbortController();
    const filePath = await writeTempFile('links.txt', 'https://example.com\nhttps://google.com');
    const { program, events } = scanWith(filePath, {
      signal: controller.signal,
      onProgress: () => controller.abort(),
    });

    const report = await runEffect(program);

    expect(controller.signal.aborted).toBe(true);
    expect(report.status).toBe('completed');
    expect(report.results.itemsProcessed).toBe(2);
    expect(events.map((event) => event.type)).toContain('file_complete');
    expect(events.map((event) => event.type)).not.toContain('file_cancelled');
  });

  it('should pass progress reports through', async () => {
    const calls: number[] = [];
    const filePath = await writeTempFile('links.txt', 'https://example.com\nhttps://google.com');

    await runEffect(scanWith(filePath, { onProgress: (fraction) => calls.push(fraction) }).program);

    expect(calls).toEqual([1]);
  });
});
