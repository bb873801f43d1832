import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { ExaValidationError } from '../src/errors.js';
import {
  buildContentPayload,
  contentOptionsSchema,
  lenientShape,
  normalizeUrl,
  parseInput,
} from '../src/schemas/common.js';
import { searchInputSchema } from '../src/tools/search.js';
import { findSimilarInputSchema } from '../src/tools/similar.js';
import { getContentsInputSchema } from '../src/tools/contents.js';

describe('normalizeUrl', () => {
  it('adds https to bare domains', () => {
    expect(normalizeUrl('example.com')).toBe('https://example.com');
    expect(normalizeUrl('  docs.example.com/guide  ')).toBe('https://docs.example.com/guide');
  });

  it('keeps an existing scheme', () => {
    expect(normalizeUrl('http://example.com/a?b=1')).toBe('http://example.com/a?b=1');
  });

  it('rejects values with no scheme and no dot unless opaque ids are allowed', () => {
    expect(normalizeUrl('doc_12345')).toBeNull();
    expect(normalizeUrl('doc_12345', { allowOpaque: true })).toBe('doc_12345');
  });

  it('rejects blank and unparseable values', () => {
    expect(normalizeUrl('   ')).toBeNull();
    expect(normalizeUrl('https://')).toBeNull();
  });
});

describe('search input', () => {
  it('applies defaults', () => {
    const input = parseInput(searchInputSchema, { query: '  AI safety  ' });
    expect(input).toEqual({
      query: 'AI safety',
      num_results: 10,
      search_type: 'auto',
      use_autoprompt: true,
      response_format: 'markdown',
    });
  });

  it('normalizes domain lists', () => {
    const input = parseInput(searchInputSchema, { query: 'q', include_domains: ['  Foo.com ', '', 'BAR.org'] });
    expect(input.include_domains).toEqual(['foo.com', 'bar.org']);
  });

  it('accepts the num_results bounds and rejects values outside them', () => {
    expect(parseInput(searchInputSchema, { query: 'q', num_results: 100 }).num_results).toBe(100);
    expect(parseInput(searchInputSchema, { query: 'q', num_results: 1 }).num_results).toBe(1);
    expect(() => parseInput(searchInputSchema, { query: 'q', num_results: 101 })).toThrow(ExaValidationError);
    expect(() => parseInput(searchInputSchema, { query: 'q', num_results: 0 })).toThrow(ExaValidationError);
  });

  it('names the offending field', () => {
    expect(() => parseInput(searchInputSchema, { query: 'q', num_results: 101 })).toThrow(
      'num_results: Number must be less than or equal to 100',
    );
  });

  it('rejects unknown enum values and unknown keys', () => {
    expect(() => parseInput(searchInputSchema, { query: 'q', search_type: 'fuzzy' })).toThrow(ExaValidationError);
    expect(() => parseInput(searchInputSchema, { query: 'q', page: 2 })).toThrow(ExaValidationError);
  });

  it('rejects empty queries and malformed dates', () => {
    expect(() => parseInput(searchInputSchema, { query: '   ' })).toThrow(ExaValidationError);
    expect(() => parseInput(searchInputSchema, { query: 'q', start_published_date: 'last week' })).toThrow(
      'start_published_date: Expected an ISO 8601 date (YYYY-MM-DD)',
    );
    expect(parseInput(searchInputSchema, { query: 'q', end_crawl_date: '2024-06-01T12:00:00Z' }).end_crawl_date).toBe(
      '2024-06-01T12:00:00Z',
    );
  });
});

describe('find similar input', () => {
  it('normalizes the source url', () => {
    expect(parseInput(findSimilarInputSchema, { url: 'example.com' }).url).toBe('https://example.com');
  });

  it('rejects values that are not urls', () => {
    expect(() => parseInput(findSimilarInputSchema, { url: 'not a url' })).toThrow('url: Invalid URL: not a url');
  });
});

describe('get contents input', () => {
  it('drops blank entries and mixes urls with document ids', () => {
    const input = parseInput(getContentsInputSchema, { urls: ['example.com', ' ', 'doc_42'] });
    expect(input.urls).toEqual(['https://example.com', 'doc_42']);
  });

  it('requires at least one usable entry', () => {
    expect(() => parseInput(getContentsInputSchema, { urls: ['', '  '] })).toThrow(
      'urls: At least one valid URL is required',
    );
    expect(() => parseInput(getContentsInputSchema, { urls: [] })).toThrow(ExaValidationError);
  });

  it('bounds subpages', () => {
    expect(() => parseInput(getContentsInputSchema, { urls: ['example.com'], subpages: 6 })).toThrow(
      ExaValidationError,
    );
  });
});

describe('buildContentPayload', () => {
  it('returns nothing when no options are given', () => {
    expect(buildContentPayload(undefined)).toEqual({});
  });

  it('uses true for toggles without settings', () => {
    const options = contentOptionsSchema.parse({ include_text: true, include_highlights: true });
    expect(buildContentPayload(options)).toEqual({ text: true, highlights: true });
  });

  it('turns settings into option objects', () => {
    const options = contentOptionsSchema.parse({
      include_text: true,
      max_characters: 2000,
      include_highlights: true,
      num_sentences: 3,
      include_summary: true,
      summary_query: 'main argument',
    });
    expect(buildContentPayload(options)).toEqual({
      text: { maxCharacters: 2000 },
      highlights: { numSentences: 3 },
      summary: { query: 'main argument' },
    });
  });

  it('leaves out disabled toggles even when their settings are present', () => {
    const options = contentOptionsSchema.parse({ include_text: false, max_characters: 500, include_summary: true });
    expect(buildContentPayload(options)).toEqual({ summary: true });
  });

  it('bounds max_characters', () => {
    expect(contentOptionsSchema.safeParse({ max_characters: 99 }).success).toBe(false);
    expect(contentOptionsSchema.safeParse({ max_characters: 50_001 }).success).toBe(false);
  });
});

describe('lenientShape', () => {
  const lenient = z.object(lenientShape(searchInputSchema));

  it('keeps the fields and their descriptions', () => {
    const shape = lenientShape(searchInputSchema);
    expect(Object.keys(shape)).toEqual(Object.keys(searchInputSchema.shape));
    expect(shape.num_results?.description).toBe('Number of results to return (1-100, default 10)');
  });

  it('leaves bounds, enums and refinements to the handler', () => {
    expect(
      lenient.safeParse({ query: 'q', num_results: 101, search_type: 'fuzzy', start_published_date: 'last week' })
        .success,
    ).toBe(true);
    expect(z.object(lenientShape(findSimilarInputSchema)).safeParse({ url: 'not a url' }).success).toBe(true);
  });

  it('keeps required fields and primitive types', () => {
    expect(lenient.safeParse({}).success).toBe(false);
    expect(lenient.safeParse({ query: 'q', num_results: 'ten' }).success).toBe(false);
  });

  it('passes unknown nested keys through for the strict check', () => {
    const parsed = lenient.parse({ query: 'q', content: { include_text: true, extra: 1 } });
    expect(() => parseInput(searchInputSchema, parsed)).toThrow('content: Unrecognized key(s) in object: \'extra\'');
  });
});
