import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { ENRICHMENT_FORMATS, TEXT_PREVIEW_CHARS } from '../constants.js';
import { preview, renderResponse } from '../formatters/markdown.js';
import { lenientShape, responseFormatSchema } from '../schemas/common.js';
import type { ExaClient } from '../services/exa-client.js';
import type {
  EnrichmentPayload,
  Page,
  Webset,
  WebsetCreatePayload,
  WebsetEnrichment,
  WebsetItem,
} from '../types/exa.js';
import {
  CREATES_REMOTE_STATE,
  defineToolHandler,
  DESTRUCTIVE,
  READ_ONLY,
  textResult,
  type ToolHandler,
} from './define.js';

const TRUNCATION_HINT = 'Use a smaller limit and page with the cursor.';

const websetIdSchema = z.string().trim().min(1).describe('The webset ID');

const pageLimitSchema = z.number().int().min(1).max(100).default(20).describe('Maximum entries per page (1-100)');

const cursorSchema = z.string().trim().min(1).optional().describe('Pagination cursor from a previous call');

export const websetCreateInputSchema = z
  .object({
    query: z.string().trim().min(1).max(2000).describe('Search query used to populate the webset'),
    count: z.number().int().min(1).max(1000).default(100).describe('Number of items to find (1-1000)'),
    criteria: z
      .array(z.string().trim().min(1).max(1000))
      .max(10)
      .optional()
      .describe('Natural language criteria every item must satisfy'),
    response_format: responseFormatSchema,
  })
  .strict();

export type WebsetCreateInput = z.infer<typeof websetCreateInputSchema>;

export const websetIdInputSchema = z
  .object({
    webset_id: websetIdSchema,
    response_format: responseFormatSchema,
  })
  .strict();

export const websetListInputSchema = z
  .object({
    limit: pageLimitSchema,
    cursor: cursorSchema,
    response_format: responseFormatSchema,
  })
  .strict();

export const websetItemsInputSchema = z
  .object({
    webset_id: websetIdSchema,
    limit: pageLimitSchema,
    cursor: cursorSchema,
    response_format: responseFormatSchema,
  })
  .strict();

export const websetEnrichInputSchema = z
  .object({
    webset_id: websetIdSchema,
    description: z.string().trim().min(1).max(2000).describe('What to extract for every item in the webset'),
    format: z
      .enum(ENRICHMENT_FORMATS)
      .default('text')
      .describe('Format of the extracted value: text, date, number, email, phone or url'),
    response_format: responseFormatSchema,
  })
  .strict();

export type WebsetEnrichInput = z.infer<typeof websetEnrichInputSchema>;

export function buildWebsetPayload(input: WebsetCreateInput): WebsetCreatePayload {
  const search: WebsetCreatePayload['search'] = { query: input.query, count: input.count };
  if (input.criteria && input.criteria.length > 0) {
    search.criteria = input.criteria.map((description) => ({ description }));
  }
  return { search };
}

export function buildEnrichmentPayload(input: WebsetEnrichInput): EnrichmentPayload {
  return { description: input.description, format: input.format };
}

export function formatWebsetMarkdown(webset: Webset, heading = 'Webset'): string {
  const lines = [`## ${heading}: ${webset.id ?? 'unknown'}`, `**Status:** ${webset.status ?? 'unknown'}`];

  if (webset.createdAt) lines.push(`**Created:** ${webset.createdAt}`);

  for (const search of webset.searches ?? []) {
    if (search.query) lines.push(`**Search:** ${search.query}`);
    const found = search.progress?.found;
    if (typeof found === 'number') {
      lines.push(`**Items:** ${found}${typeof search.count === 'number' ? ` of ${search.count}` : ''}`);
    }
    const criteria = (search.criteria ?? []).map((c) => c.description).filter(Boolean);
    if (criteria.length > 0) lines.push(`**Criteria:** ${criteria.join('; ')}`);
  }

  const enrichments = webset.enrichments ?? [];
  if (enrichments.length > 0) {
    lines.push(`**Enrichments:** ${enrichments.length}`);
  }

  return lines.join('\n');
}

export function formatWebsetCreatedMarkdown(webset: Webset): string {
  return [
    '# Webset Created',
    '',
    formatWebsetMarkdown(webset),
    '',
    `Use \`exa_webset_items\` with webset_id='${webset.id ?? 'unknown'}' to read the results once items arrive.`,
  ].join('\n');
}

export function formatWebsetListMarkdown(page: Page<Webset>): string {
  const websets = page.data ?? [];
  if (websets.length === 0) {
    return 'No websets found.';
  }

  const lines = ['# Websets', '', `Found **${websets.length}** websets`, ''];
  for (const webset of websets) {
    lines.push(formatWebsetMarkdown(webset));
    lines.push('');
  }
  if (page.hasMore && page.nextCursor) {
    lines.push(`*More websets available. Pass cursor='${page.nextCursor}' to see the next page.*`);
  }
  return lines.join('\n');
}

function formatItemMarkdown(item: WebsetItem, index: number): string {
  const props = item.properties ?? {};
  const lines = [`### ${index}. ${props.description ? preview(props.description, 120) : item.id ?? 'Item'}`];
  lines.push(`**URL:** ${props.url || 'N/A'}`);
  if (props.type) lines.push(`**Type:** ${props.type}`);
  if (props.content) {
    lines.push(`\n**Content Preview:**\n${preview(props.content, TEXT_PREVIEW_CHARS)}`);
  }
  return lines.join('\n');
}

export function formatItemsMarkdown(websetId: string, page: Page<WebsetItem>): string {
  const items = page.data ?? [];
  if (items.length === 0) {
    return `No items found in webset: ${websetId}`;
  }

  const lines = [`# Webset Items: ${websetId}`, '', `Showing **${items.length}** items`, ''];
  items.forEach((item, i) => {
    lines.push(formatItemMarkdown(item, i + 1));
    lines.push('');
  });
  if (page.hasMore && page.nextCursor) {
    lines.push(`*More items available. Pass cursor='${page.nextCursor}' to see the next page.*`);
  }
  return lines.join('\n');
}

export function formatEnrichmentMarkdown(websetId: string, enrichment: WebsetEnrichment): string {
  return [
    '# Enrichment Created',
    '',
    `**Webset:** ${websetId}`,
    `**Enrichment ID:** ${enrichment.id ?? 'unknown'}`,
    `**Status:** ${enrichment.status ?? 'pending'}`,
    `**Description:** ${enrichment.description ?? 'N/A'}`,
    `**Format:** ${enrichment.format ?? 'text'}`,
  ].join('\n');
}

export const exaWebsetCreate: ToolHandler = defineToolHandler(
  'exa_webset_create',
  websetCreateInputSchema,
  async (input, client, signal) => {
    const webset = await client.websetCreate(buildWebsetPayload(input), signal);
    return renderResponse(webset, input.response_format, () => formatWebsetCreatedMarkdown(webset));
  },
);

export const exaWebsetGet: ToolHandler = defineToolHandler('exa_webset_get', websetIdInputSchema, async (input, client, signal) => {
  const webset = await client.websetGet(input.webset_id, signal);
  return renderResponse(webset, input.response_format, () => formatWebsetMarkdown(webset));
});

export const exaWebsetList: ToolHandler = defineToolHandler(
  'exa_webset_list',
  websetListInputSchema,
  async (input, client, signal) => {
    const page = await client.websetList({ limit: input.limit, cursor: input.cursor }, signal);
    return renderResponse(page, input.response_format, () => formatWebsetListMarkdown(page), TRUNCATION_HINT);
  },
);

export const exaWebsetItems: ToolHandler = defineToolHandler(
  'exa_webset_items',
  websetItemsInputSchema,
  async (input, client, signal) => {
    const page = await client.websetItems(input.webset_id, { limit: input.limit, cursor: input.cursor }, signal);
    return renderResponse(
      page,
      input.response_format,
      () => formatItemsMarkdown(input.webset_id, page),
      TRUNCATION_HINT,
    );
  },
);

export const exaWebsetDelete: ToolHandler = defineToolHandler(
  'exa_webset_delete',
  websetIdInputSchema,
  async (input, client, signal) => {
    const webset = await client.websetDelete(input.webset_id, signal);
    return renderResponse(webset, input.response_format, () => `Webset deleted: ${webset.id ?? input.webset_id}`);
  },
);

export const exaWebsetEnrich: ToolHandler = defineToolHandler(
  'exa_webset_enrich',
  websetEnrichInputSchema,
  async (input, client, signal) => {
    const enrichment = await client.websetEnrich(input.webset_id, buildEnrichmentPayload(input), signal);
    return renderResponse(enrichment, input.response_format, () => formatEnrichmentMarkdown(input.webset_id, enrichment));
  },
);

export function registerWebsetTools(server: McpServer, client: ExaClient): void {
  server.tool(
    'exa_webset_create',
    'Create a webset: a curated collection of web entities found by a search query and optional criteria. Results populate asynchronously.',
    lenientShape(websetCreateInputSchema),
    { ...CREATES_REMOTE_STATE, title: 'Create Webset' },
    async (args, extra) => textResult(await exaWebsetCreate(args, client, extra.signal)),
  );

  server.tool(
    'exa_webset_get',
    'Get the status, searches and enrichments of a webset.',
    lenientShape(websetIdInputSchema),
    { ...READ_ONLY, title: 'Get Webset' },
    async (args, extra) => textResult(await exaWebsetGet(args, client, extra.signal)),
  );

  server.tool(
    'exa_webset_list',
    'List websets, newest first.',
    lenientShape(websetListInputSchema),
    { ...READ_ONLY, title: 'List Websets' },
    async (args, extra) => textResult(await exaWebsetList(args, client, extra.signal)),
  );

  server.tool(
    'exa_webset_items',
    'List the items found for a webset.',
    lenientShape(websetItemsInputSchema),
    { ...READ_ONLY, title: 'List Webset Items' },
    async (args, extra) => textResult(await exaWebsetItems(args, client, extra.signal)),
  );

  server.tool(
    'exa_webset_delete',
    'Delete a webset and all of its items. This cannot be undone.',
    lenientShape(websetIdInputSchema),
    { ...DESTRUCTIVE, title: 'Delete Webset' },
    async (args, extra) => textResult(await exaWebsetDelete(args, client, extra.signal)),
  );

  server.tool(
    'exa_webset_enrich',
    'Add an enrichment to a webset, extracting a new field (for example a contact email) for every item.',
    lenientShape(websetEnrichInputSchema),
    { ...CREATES_REMOTE_STATE, title: 'Enrich Webset' },
    async (args, extra) => textResult(await exaWebsetEnrich(args, client, extra.signal)),
  );
}
