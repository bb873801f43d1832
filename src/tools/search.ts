import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { CATEGORIES, CODE_SEARCH_CATEGORY, LIVECRAWL_MODES, SEARCH_TYPES } from '../constants.js';
import { formatResultList, renderResponse } from '../formatters/markdown.js';
import {
  buildContentPayload,
  contentOptionsSchema,
  domainListSchema,
  isoDateSchema,
  lenientShape,
  numResultsSchema,
  phraseListSchema,
  responseFormatSchema,
} from '../schemas/common.js';
import type { ExaClient } from '../services/exa-client.js';
import type { SearchPayload, SearchResponse } from '../types/exa.js';
import { defineToolHandler, READ_ONLY, textResult, type ToolHandler } from './define.js';

export const searchInputSchema = z
  .object({
    query: z
      .string()
      .trim()
      .min(1)
      .max(2000)
      .describe('Search query string. Can be a question, topic, or keywords.'),
    num_results: numResultsSchema(),
    search_type: z
      .enum(SEARCH_TYPES)
      .default('auto')
      .describe("Search type: 'auto' (recommended), 'neural' for semantic, 'keyword' for exact"),
    category: z
      .enum(CATEGORIES)
      .optional()
      .describe('Filter by content type: company, news, research paper, github, tweet, pdf, personal site, linkedin profile'),
    include_domains: domainListSchema.optional().describe("Only include results from these domains (e.g. ['arxiv.org'])"),
    exclude_domains: domainListSchema.optional().describe('Exclude results from these domains'),
    start_published_date: isoDateSchema.optional().describe('Only results published after this date (YYYY-MM-DD)'),
    end_published_date: isoDateSchema.optional().describe('Only results published before this date (YYYY-MM-DD)'),
    start_crawl_date: isoDateSchema.optional().describe('Only results crawled after this date (YYYY-MM-DD)'),
    end_crawl_date: isoDateSchema.optional().describe('Only results crawled before this date (YYYY-MM-DD)'),
    include_text: phraseListSchema.optional().describe('Results must contain ALL of these phrases'),
    exclude_text: phraseListSchema.optional().describe('Results must NOT contain any of these phrases'),
    use_autoprompt: z.boolean().default(true).describe('Let Exa optimize the query for better results'),
    livecrawl: z.enum(LIVECRAWL_MODES).optional().describe("Live crawl mode: 'fallback', 'preferred', or 'always'"),
    content: contentOptionsSchema.optional(),
    response_format: responseFormatSchema,
  })
  .strict();

export type SearchInput = z.infer<typeof searchInputSchema>;

export const codeSearchInputSchema = z
  .object({
    query: z
      .string()
      .trim()
      .min(1)
      .max(2000)
      .describe('What to look for: an API, error message, library usage, or code pattern'),
    num_results: numResultsSchema(),
    include_domains: domainListSchema.optional().describe('Extra domains searched alongside the code platforms'),
    exclude_domains: domainListSchema.optional().describe('Exclude results from these domains'),
    start_published_date: isoDateSchema.optional().describe('Only results published after this date (YYYY-MM-DD)'),
    end_published_date: isoDateSchema.optional().describe('Only results published before this date (YYYY-MM-DD)'),
    content: contentOptionsSchema.optional(),
    response_format: responseFormatSchema,
  })
  .strict();

export type CodeSearchInput = z.infer<typeof codeSearchInputSchema>;

export function buildSearchPayload(input: SearchInput): SearchPayload {
  const payload: SearchPayload = {
    query: input.query,
    numResults: input.num_results,
    type: input.search_type,
    useAutoprompt: input.use_autoprompt,
  };

  if (input.category) payload.category = input.category;
  if (input.include_domains?.length) payload.includeDomains = input.include_domains;
  if (input.exclude_domains?.length) payload.excludeDomains = input.exclude_domains;
  if (input.start_published_date) payload.startPublishedDate = input.start_published_date;
  if (input.end_published_date) payload.endPublishedDate = input.end_published_date;
  if (input.start_crawl_date) payload.startCrawlDate = input.start_crawl_date;
  if (input.end_crawl_date) payload.endCrawlDate = input.end_crawl_date;
  if (input.include_text?.length) payload.includeText = input.include_text;
  if (input.exclude_text?.length) payload.excludeText = input.exclude_text;
  if (input.livecrawl) payload.livecrawl = input.livecrawl;

  return { ...payload, ...buildContentPayload(input.content) };
}

/** Allow-list first, then the caller's domains, without duplicates. */
export function mergeDomains(fixed: string[], extra: string[] = []): string[] {
  return [...new Set([...fixed, ...extra])];
}

export function buildCodeSearchPayload(input: CodeSearchInput, codeDomains: string[]): SearchPayload {
  const payload: SearchPayload = {
    query: input.query,
    numResults: input.num_results,
    type: 'auto',
    useAutoprompt: true,
    category: CODE_SEARCH_CATEGORY,
    includeDomains: mergeDomains(codeDomains, input.include_domains),
  };

  if (input.exclude_domains?.length) payload.excludeDomains = input.exclude_domains;
  if (input.start_published_date) payload.startPublishedDate = input.start_published_date;
  if (input.end_published_date) payload.endPublishedDate = input.end_published_date;

  return { ...payload, ...buildContentPayload(input.content) };
}

export function formatSearchMarkdown(data: SearchResponse, query: string, heading = 'Search Results'): string {
  const results = data.results ?? [];

  if (results.length === 0) {
    return `No results found for: '${query}'`;
  }

  const lines = [`# ${heading} for: '${query}'`, ''];
  lines.push(`Found **${results.length}** results`);

  if (data.autopromptString) {
    lines.push(`\n*Query optimized to: "${data.autopromptString}"*`);
  }

  lines.push('');
  lines.push(...formatResultList(results, 'Relevance'));

  return lines.join('\n');
}

export function formatCodeSearchMarkdown(data: SearchResponse, query: string): string {
  if (!data.results?.length) {
    return `No code results found for: '${query}'`;
  }
  return formatSearchMarkdown(data, query, 'Code Search Results');
}

export const exaSearch: ToolHandler = defineToolHandler('exa_search', searchInputSchema, async (input, client, signal) => {
  const data = await client.search(buildSearchPayload(input), signal);
  return renderResponse(data, input.response_format, () => formatSearchMarkdown(data, input.query));
});

export function createCodeSearchHandler(codeDomains: string[]): ToolHandler {
  return defineToolHandler('exa_code_search', codeSearchInputSchema, async (input, client, signal) => {
    const data = await client.search(buildCodeSearchPayload(input, codeDomains), signal);
    return renderResponse(data, input.response_format, () => formatCodeSearchMarkdown(data, input.query));
  });
}

export function registerSearchTools(server: McpServer, client: ExaClient, codeDomains: string[]): void {
  server.tool(
    'exa_search',
    "Search the web using Exa's neural search engine. Supports category, domain, date and phrase filters, " +
      'and can return full text, highlights or summaries for each result.',
    lenientShape(searchInputSchema),
    { ...READ_ONLY, title: 'Exa Web Search' },
    async (args, extra) => textResult(await exaSearch(args, client, extra.signal)),
  );

  const codeSearch = createCodeSearchHandler(codeDomains);
  server.tool(
    'exa_code_search',
    `Search code hosting and developer Q&A sites (${codeDomains.join(', ')}) for code examples, ` +
      'library usage and fixes. Extra domains are searched in addition to these.',
    lenientShape(codeSearchInputSchema),
    { ...READ_ONLY, title: 'Exa Code Search' },
    async (args, extra) => textResult(await codeSearch(args, client, extra.signal)),
  );
}
