import { beforeAll, describe, expect, it } from 'vitest';
import { setLogLevel } from '../src/logger.js';
import { exaAnswer } from '../src/tools/answer.js';
import { buildContentsPayload, exaGetContents, getContentsInputSchema } from '../src/tools/contents.js';
import { buildSearchPayload, createCodeSearchHandler, exaSearch, mergeDomains, searchInputSchema } from '../src/tools/search.js';
import { exaFindSimilar } from '../src/tools/similar.js';
import { createTestClient, mockFetch, recordedRequest } from './helpers.js';

const CODE_DOMAINS = ['github.com', 'gitlab.com', 'bitbucket.org', 'stackoverflow.com'];

beforeAll(() => {
  setLogLevel('error');
});

describe('exa_search', () => {
  it('reports an empty result set', async () => {
    const fetch = mockFetch({ results: [] });
    const text = await exaSearch({ query: 'AI safety' }, createTestClient(fetch));

    expect(text).toBe("No results found for: 'AI safety'");
  });

  it('sends the camelCase payload with only the filters that were set', async () => {
    const fetch = mockFetch({ results: [] });
    await exaSearch(
      {
        query: 'rust async runtimes',
        num_results: 3,
        category: 'news',
        include_domains: [' Example.COM '],
        exclude_domains: [],
        content: { include_text: true, max_characters: 1000 },
      },
      createTestClient(fetch),
    );

    expect(recordedRequest(fetch).body).toEqual({
      query: 'rust async runtimes',
      numResults: 3,
      type: 'auto',
      useAutoprompt: true,
      category: 'news',
      includeDomains: ['example.com'],
      text: { maxCharacters: 1000 },
    });
  });

  it('renders results in markdown', async () => {
    const fetch = mockFetch({
      autopromptString: 'recent AI safety research',
      results: [
        { title: 'Alignment', url: 'https://a.example', score: 0.5 },
        { title: 'Interpretability', url: 'https://b.example' },
      ],
    });
    const text = await exaSearch({ query: 'AI safety' }, createTestClient(fetch));

    expect(text).toBe(
      [
        "# Search Results for: 'AI safety'",
        '',
        'Found **2** results',
        '\n*Query optimized to: "recent AI safety research"*',
        '',
        '### 1. Alignment\n**URL:** https://a.example\n**Relevance:** 0.50',
        '',
        '### 2. Interpretability\n**URL:** https://b.example',
        '',
      ].join('\n'),
    );
  });

  it('returns the raw response in json mode', async () => {
    const body = { requestId: 'req_1', results: [{ url: 'https://a.example' }] };
    const fetch = mockFetch(body);
    const text = await exaSearch({ query: 'q', response_format: 'json' }, createTestClient(fetch));

    expect(JSON.parse(text)).toEqual(body);
    expect(text).toBe(JSON.stringify(body, null, 2));
  });

  it('returns validation failures as text without calling the API', async () => {
    const fetch = mockFetch({ results: [] });
    const text = await exaSearch({ query: 'q', num_results: 101 }, createTestClient(fetch));

    expect(text).toBe(
      'Error: Invalid input - num_results: Number must be less than or equal to 100. Please check your parameters.',
    );
    expect(fetch).not.toHaveBeenCalled();
  });

  it('returns API failures as text', async () => {
    const fetch = mockFetch({ error: 'invalid key' }, 401);
    const text = await exaSearch({ query: 'q' }, createTestClient(fetch));

    expect(text.startsWith('Error: Authentication failed.')).toBe(true);
  });

  it('truncates oversized responses', async () => {
    const results = Array.from({ length: 100 }, (_, i) => ({
      title: `Result ${i}`,
      url: `https://example.com/${i}`,
      text: 'x'.repeat(500),
    }));
    const fetch = mockFetch({ results });
    const text = await exaSearch({ query: 'q', num_results: 100 }, createTestClient(fetch));

    expect(text.length).toBeLessThanOrEqual(25_000);
    expect(text).toMatch(/\n\n---\n\[Response truncated from \d+ characters\. Use more specific filters or reduce num_results\.\]$/);
  });
});

describe('buildSearchPayload', () => {
  it('omits empty phrase lists and passes set dates', () => {
    const input = searchInputSchema.parse({
      query: 'q',
      include_text: ['  ', ''],
      start_published_date: '2024-01-01',
      livecrawl: 'always',
      use_autoprompt: false,
    });

    expect(buildSearchPayload(input)).toEqual({
      query: 'q',
      numResults: 10,
      type: 'auto',
      useAutoprompt: false,
      startPublishedDate: '2024-01-01',
      livecrawl: 'always',
    });
  });
});

describe('exa_code_search', () => {
  it('searches the code platforms plus caller domains', async () => {
    const fetch = mockFetch({ results: [] });
    const codeSearch = createCodeSearchHandler(CODE_DOMAINS);

    const text = await codeSearch(
      { query: 'zod discriminated union', include_domains: ['GitHub.com', 'dev.to'] },
      createTestClient(fetch),
    );

    expect(text).toBe("No code results found for: 'zod discriminated union'");
    expect(recordedRequest(fetch).body).toEqual({
      query: 'zod discriminated union',
      numResults: 10,
      type: 'auto',
      useAutoprompt: true,
      category: 'github',
      includeDomains: ['github.com', 'gitlab.com', 'bitbucket.org', 'stackoverflow.com', 'dev.to'],
    });
  });

  it('uses its own heading', async () => {
    const fetch = mockFetch({ results: [{ title: 'repo', url: 'https://github.com/o/r' }] });
    const text = await createCodeSearchHandler(CODE_DOMAINS)({ query: 'q' }, createTestClient(fetch));

    expect(text.startsWith("# Code Search Results for: 'q'\n\nFound **1** results")).toBe(true);
  });

  it('merges domains in order without duplicates', () => {
    expect(mergeDomains(['a.com', 'b.com'], ['b.com', 'c.com', 'a.com'])).toEqual(['a.com', 'b.com', 'c.com']);
    expect(mergeDomains(['a.com'])).toEqual(['a.com']);
  });
});

describe('exa_find_similar', () => {
  it('normalizes the url and excludes the source domain by default', async () => {
    const fetch = mockFetch({ results: [] });
    const text = await exaFindSimilar({ url: 'example.com/post' }, createTestClient(fetch));

    expect(text).toBe('No similar pages found for: https://example.com/post');
    expect(recordedRequest(fetch).url).toBe('https://api.exa.test/findSimilar');
    expect(recordedRequest(fetch).body).toEqual({
      url: 'https://example.com/post',
      numResults: 10,
      excludeSourceDomain: true,
    });
  });

  it('labels scores as similarity', async () => {
    const fetch = mockFetch({ results: [{ title: 'Neighbour', url: 'https://n.example', score: 0.912 }] });
    const text = await exaFindSimilar({ url: 'https://example.com' }, createTestClient(fetch));

    expect(text).toBe(
      [
        '# Pages Similar to: https://example.com',
        '',
        'Found **1** similar pages',
        '',
        '### 1. Neighbour\n**URL:** https://n.example\n**Similarity:** 0.91',
        '',
      ].join('\n'),
    );
  });
});

describe('exa_get_contents', () => {
  it('asks for full text when no content option is enabled', () => {
    const input = getContentsInputSchema.parse({ urls: ['example.com', 'doc_1'], subpages: 0 });
    expect(buildContentsPayload(input)).toEqual({
      ids: ['https://example.com', 'doc_1'],
      text: true,
      subpages: 0,
    });
  });

  it('keeps the requested content options', () => {
    const input = getContentsInputSchema.parse({
      urls: ['https://example.com'],
      content: { include_summary: true },
      livecrawl: 'fallback',
    });
    expect(buildContentsPayload(input)).toEqual({
      ids: ['https://example.com'],
      summary: true,
      livecrawl: 'fallback',
    });
  });

  it('surfaces rate limits with the retry delay', async () => {
    const fetch = mockFetch({ error: 'slow down' }, 429, { 'Retry-After': '30' });
    const text = await exaGetContents({ urls: ['https://example.com'] }, createTestClient(fetch));

    expect(text).toBe(
      'Error: Rate limit exceeded. Please wait before making more requests. Retry after 30 seconds.',
    );
  });

  it('lists extracted pages and failed ids', async () => {
    const fetch = mockFetch({
      results: [{ title: 'Guide', url: 'https://example.com', text: 'Full body', highlights: ['h1'] }],
      statuses: [
        { id: 'https://example.com', status: 'success' },
        { id: 'https://gone.example', status: 'error', error: { tag: 'CRAWL_NOT_FOUND', httpStatusCode: 404 } },
      ],
    });
    const text = await exaGetContents(
      { urls: ['https://example.com', 'https://gone.example'] },
      createTestClient(fetch),
    );

    expect(text).toBe(
      [
        '# Extracted Content',
        '',
        'Successfully extracted content from **1** URLs',
        '',
        '## 1. Guide\n**URL:** https://example.com\n\n### Highlights\n> h1\n\n### Full Content\nFull body\n',
        '---',
        '',
        '## Failed URLs',
        '',
        '- https://gone.example: CRAWL_NOT_FOUND, HTTP 404',
        '',
      ].join('\n'),
    );
  });

  it('reports when nothing was extracted', async () => {
    const fetch = mockFetch({ results: [], statuses: [] });
    const text = await exaGetContents({ urls: ['example.com'] }, createTestClient(fetch));

    expect(text).toBe('No content extracted from the provided URLs.');
  });
});

describe('exa_answer', () => {
  it('numbers each citation once', async () => {
    const fetch = mockFetch({
      answer: 'Paris is the capital of France.',
      citations: [
        { title: 'France', url: 'https://wiki.example/france', publishedDate: '2023-03-01', text: 'Capital: Paris' },
        { title: 'Paris', url: 'https://wiki.example/paris' },
      ],
    });
    const text = await exaAnswer({ query: 'What is the capital of France?' }, createTestClient(fetch));

    expect(text.match(/\*\*\[\d+\]\*\*/g)).toEqual(['**[1]**', '**[2]**']);
    expect(text).toBe(
      [
        '# Answer',
        '',
        'Paris is the capital of France.',
        '',
        '## Sources',
        '',
        '**[1]** [France](https://wiki.example/france) (2023-03-01)\n   > Capital: Paris',
        '',
        '**[2]** [Paris](https://wiki.example/paris)',
        '',
      ].join('\n'),
    );
    expect(recordedRequest(fetch).body).toEqual({ query: 'What is the capital of France?', text: true });
  });

  it('sends the model and system prompt when given', async () => {
    const fetch = mockFetch({ answer: '' });
    const text = await exaAnswer(
      { query: 'q', model: 'exa-pro', system_prompt: 'Answer briefly.', include_text: false },
      createTestClient(fetch),
    );

    expect(text).toBe('# Answer\n\nNo answer generated.\n');
    expect(recordedRequest(fetch).body).toEqual({
      query: 'q',
      text: false,
      model: 'exa-pro',
      systemPrompt: 'Answer briefly.',
    });
  });

  it('treats a null answer as missing', async () => {
    const fetch = mockFetch({ answer: null, citations: [] });
    const text = await exaAnswer({ query: 'q' }, createTestClient(fetch));

    expect(text).toBe('# Answer\n\nNo answer generated.\n');
  });

  it('renders structured answers as JSON', async () => {
    const fetch = mockFetch({ answer: { capital: 'Paris' } });
    const text = await exaAnswer({ query: 'q' }, createTestClient(fetch));

    expect(text).toBe('# Answer\n\n```json\n{\n  "capital": "Paris"\n}\n```\n');
  });
});
