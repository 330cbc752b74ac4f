/**
 * TabularDriver Tests
 * Tests for cell-by-cell scanning of CSV content
 */

import { Effect } from 'effect';
import { describe, expect, it } from 'vitest';
import { parseCsvRecords, scanCsv } from '../../../lib/Drivers/TabularDriver.js';
import { createProgressRecorder, runEffect } from '../../utils/test-helpers.js';

describe('parseCsvRecords', () => {
  it('should honour quoted fields and drop empty lines', async () => {
    const records = await Effect.runPromise(
      parseCsvRecords('\uFEFFlink,note\r\n\r\n"https://example.com/a,b",x\r\n')
    );

    expect(records).toEqual([
      ['link', 'note'],
      ['https://example.com/a,b', 'x'],
    ]);
  });
});

describe('scanCsv', () => {
  const sample = [
    'URL,Description',
    'http://example.com,Example website',
    'https://google.com,Search engine',
    'not-a-url,Invalid URL',
    ',Empty cell',
    'http://localhost:3000,Local server',
  ].join('\n');

  it('should find links in any column and ignore descriptions', async () => {
    const results = await runEffect(scanCsv(sample));

    expect(results).toEqual({
      valid: ['http://example.com', 'http://localhost:3000', 'https://google.com'],
      invalid: [],
      invalidEntries: [],
      itemsProcessed: 10,
    });
  });

  it('should locate invalid values by column name and record number', async () => {
    const content = 'name,homepage\nDocs,www.docs.example.com\nBlog,https://blog.example.com\n';

    const results = await runEffect(scanCsv(content));

    expect(results.valid).toEqual(['https://blog.example.com']);
    expect(results.invalidEntries).toEqual([
      { value: 'www.docs.example.com', location: "column 'homepage', row 2" },
    ]);
  });

  it('should count records rather than lines when blank lines appear', async () => {
    const results = await runEffect(scanCsv('link\n\nwww.a.example.com\n'));

    expect(results.invalidEntries).toEqual([
      { value: 'www.a.example.com', location: "column 'link', row 2" },
    ]);
  });

  it('should name blank and extra header cells by position', async () => {
    const results = await runEffect(scanCsv('a,\nx,www.b.example.com,www.c.example.com\n'));

    expect(results.invalidEntries).toEqual([
      { value: 'www.b.example.com', location: "column 'Unnamed: 1', row 2" },
      { value: 'www.c.example.com', location: "column 'Unnamed: 2', row 2" },
    ]);
    expect(results.itemsProcessed).toBe(3);
  });

  it('should number columns from 1 when there is no header', async () => {
    const results = await runEffect(
      scanCsv('www.first.example.com\nhttps://second.example.com\n', { hasHeader: false })
    );

    expect(results.valid).toEqual(['https://second.example.com']);
    expect(results.invalidEntries).toEqual([
      { value: 'www.first.example.com', location: "column '1', row 1" },
    ]);
  });

  it('should return empty results for a header-only file', async () => {
    const results = await runEffect(scanCsv('URL,Description\n'));

    expect(results).toEqual({ valid: [], invalid: [], invalidEntries: [], itemsProcessed: 0 });
  });

  it('should report progress per cell', async () => {
    const { onProgress, calls } = createProgressRecorder();
    const content = Array.from({ length: 10 }, (_, i) => `https://e.com/${i}`).join('\n');

    const results = await runEffect(scanCsv(content, { hasHeader: false, onProgress }));

    expect(results.valid).toHaveLength(10);
    expect(calls).toEqual([0.5, 1, 1]);
  });
});
