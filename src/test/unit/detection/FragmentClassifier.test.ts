/**
 * FragmentClassifier Tests
 * Tests for the prefilter that separates probable URLs from prose
 */

import { describe, expect, it } from 'vitest';
import {
  looksLikeUrl,
  SENTENCE_INDICATORS,
  URL_MARKERS,
} from '../../../lib/Detection/FragmentClassifier.js';

describe('looksLikeUrl', () => {
  describe('length bounds', () => {
    it('should reject fragments shorter than 4 characters', () => {
      expect(looksLikeUrl('')).toBe(false);
      expect(looksLikeUrl('a.b')).toBe(false);
      expect(looksLikeUrl('   a.b   ')).toBe(false);
    });

    it('should reject fragments longer than 200 characters even with a marker', () => {
      const long = `https://example.com/${'a'.repeat(281)}`;
      expect(long.length).toBe(301);
      expect(looksLikeUrl(long)).toBe(false);
    });

    it('should accept a marker fragment of exactly 200 characters', () => {
      const exact = `https://example.com/${'a'.repeat(180)}`;
      expect(exact.length).toBe(200);
      expect(looksLikeUrl(exact)).toBe(true);
    });
  });

  describe('space count', () => {
    it('should reject fragments with more than two spaces', () => {
      expect(looksLikeUrl('go to https://example.com now')).toBe(false);
      expect(looksLikeUrl('The future of AI is bright')).toBe(false);
    });

    it('should allow up to two spaces', () => {
      expect(looksLikeUrl('see https://example.com now')).toBe(true);
    });
  });

  describe('URL markers', () => {
    it.each([
      'https://openai.com/research',
      'https://www.nih.gov/news-events/news-releases/artificial-intelligence',
      'http://localhost:3000',
      'www.example.com',
      'ftp://files.example.com',
      'HTTPS://EXAMPLE.COM',
    ])('should accept %s', (fragment) => {
      expect(looksLikeUrl(fragment)).toBe(true);
    });

    it('should check markers before sentence indicators', () => {
      expect(looksLikeUrl('see the https://x.io')).toBe(true);
    });

    it('should expose the four markers', () => {
      expect(URL_MARKERS).toEqual(['http://', 'https://', 'www.', 'ftp://']);
    });
  });

  describe('sentence indicators', () => {
    it('should reject prose even when it contains a domain-shaped token', () => {
      expect(looksLikeUrl('visit the example.com')).toBe(false);
      expect(looksLikeUrl('done. example.com')).toBe(false);
    });

    it('should list thirty-nine indicators', () => {
      expect(SENTENCE_INDICATORS).toHaveLength(39);
      expect(SENTENCE_INDICATORS).toContain(' within ');
    });
  });

  describe('domain-shaped tokens', () => {
    it.each([
      'arxiv.org/ai-safety',
      'broken-link.economics.gov',
      'complete-research.papers.ai',
      'ai-ethics.missing-domain',
      'see example.com',
      '(example.com)',
      'bücher.de',
    ])('should accept %s', (fragment) => {
      expect(looksLikeUrl(fragment)).toBe(true);
    });

    it.each([
      'not-a-url',
      'version 1.2.3',
      '10.20.30.40',
      'file.c',
      'Some text with, punctuation and normal words.',
    ])('should reject %s', (fragment) => {
      expect(looksLikeUrl(fragment)).toBe(false);
    });
  });

  it('should give the same answer for the same input', () => {
    const inputs = ['arxiv.org/ai-safety', 'not-a-url', 'www.example.com'];
    const first = inputs.map(looksLikeUrl);
    const second = inputs.map(looksLikeUrl);
    expect(second).toEqual(first);
  });
});
