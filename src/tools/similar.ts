import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { formatResultList, renderResponse } from '../formatters/markdown.js';
import {
  buildContentPayload,
  contentOptionsSchema,
  domainListSchema,
  isoDateSchema,
  lenientShape,
  numResultsSchema,
  responseFormatSchema,
  urlSchema,
} from '../schemas/common.js';
import type { ExaClient } from '../services/exa-client.js';
import type { FindSimilarPayload, SearchResponse } from '../types/exa.js';
import { defineToolHandler, READ_ONLY, textResult, type ToolHandler } from './define.js';

export const findSimilarInputSchema = z
  .object({
    url: urlSchema().describe('Source URL to find similar pages for. https:// is added when missing.'),
    num_results: numResultsSchema(),
    include_domains: domainListSchema.optional().describe('Only include results from these domains'),
    exclude_domains: domainListSchema.optional().describe('Exclude results from these domains'),
    start_published_date: isoDateSchema.optional().describe('Only results published after this date (YYYY-MM-DD)'),
    end_published_date: isoDateSchema.optional().describe('Only results published before this date (YYYY-MM-DD)'),
    exclude_source_domain: z.boolean().default(true).describe("Exclude results from the source URL's domain"),
    content: contentOptionsSchema.optional(),
    response_format: responseFormatSchema,
  })
  .strict();

export type FindSimilarInput = z.infer<typeof findSimilarInputSchema>;

export function buildFindSimilarPayload(input: FindSimilarInput): FindSimilarPayload {
  const payload: FindSimilarPayload = {
    url: input.url,
    numResults: input.num_results,
    excludeSourceDomain: input.exclude_source_domain,
  };

  if (input.include_domains?.length) payload.includeDomains = input.include_domains;
  if (input.exclude_domains?.length) payload.excludeDomains = input.exclude_domains;
  if (input.start_published_date) payload.startPublishedDate = input.start_published_date;
  if (input.end_published_date) payload.endPublishedDate = input.end_published_date;

  return { ...payload, ...buildContentPayload(input.content) };
}

export function formatSimilarMarkdown(data: SearchResponse, sourceUrl: string): string {
  const results = data.results ?? [];

  if (results.length === 0) {
    return `No similar pages found for: ${sourceUrl}`;
  }

  const lines = [`# Pages Similar to: ${sourceUrl}`, ''];
  lines.push(`Found **${results.length}** similar pages`);
  lines.push('');
  lines.push(...formatResultList(results, 'Similarity'));

  return lines.join('\n');
}

export const exaFindSimilar: ToolHandler = defineToolHandler(
  'exa_find_similar',
  findSimilarInputSchema,
  async (input, client, signal) => {
    const data = await client.findSimilar(buildFindSimilarPayload(input), signal);
    return renderResponse(data, input.response_format, () => formatSimilarMarkdown(data, input.url));
  },
);

export function registerFindSimilarTool(server: McpServer, client: ExaClient): void {
  server.tool(
    'exa_find_similar',
    'Find web pages similar to a given URL: related articles, competitor sites, or alternative sources on a topic.',
    lenientShape(findSimilarInputSchema),
    { ...READ_ONLY, title: 'Find Similar Pages' },
    async (args, extra) => textResult(await exaFindSimilar(args, client, extra.signal)),
  );
}
