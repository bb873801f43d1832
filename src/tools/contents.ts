import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { LIVECRAWL_MODES } from '../constants.js';
import { renderResponse } from '../formatters/markdown.js';
import {
  buildContentPayload,
  contentOptionsSchema,
  lenientShape,
  normalizeUrl,
  responseFormatSchema,
} from '../schemas/common.js';
import type { ExaClient } from '../services/exa-client.js';
import type { ContentStatus, ContentsPayload, ContentsResponse, ExaResult } from '../types/exa.js';
import { defineToolHandler, READ_ONLY, textResult, type ToolHandler } from './define.js';

const TRUNCATION_HINT = 'Request fewer URLs or use more specific content options.';

/** Trim, drop blanks, add a scheme to bare domains; opaque document IDs pass through. */
const idListSchema = z
  .array(z.string())
  .min(1)
  .max(100)
  .transform((values, ctx) => {
    const ids: string[] = [];
    for (const value of values) {
      if (!value.trim()) continue;
      const normalized = normalizeUrl(value, { allowOpaque: true });
      if (normalized === null) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid URL: ${value.trim()}` });
        return z.NEVER;
      }
      ids.push(normalized);
    }
    if (ids.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'At least one valid URL is required' });
      return z.NEVER;
    }
    return ids;
  });

export const getContentsInputSchema = z
  .object({
    urls: idListSchema.describe('URLs or Exa document IDs to extract content from (max 100)'),
    content: contentOptionsSchema.optional(),
    livecrawl: z.enum(LIVECRAWL_MODES).optional().describe("Live crawl mode: 'fallback', 'preferred', or 'always'"),
    subpages: z.number().int().min(0).max(5).optional().describe('Number of subpages to crawl from each URL (0-5)'),
    response_format: responseFormatSchema,
  })
  .strict();

export type GetContentsInput = z.infer<typeof getContentsInputSchema>;

export function buildContentsPayload(input: GetContentsInput): ContentsPayload {
  const content = buildContentPayload(input.content);
  // Full text unless the caller picked something else
  if (!content.text && !content.highlights && !content.summary) {
    content.text = true;
  }
  const payload: ContentsPayload = { ids: input.urls, ...content };

  if (input.livecrawl) payload.livecrawl = input.livecrawl;
  if (input.subpages !== undefined) payload.subpages = input.subpages;

  return payload;
}

function formatContentBlock(result: ExaResult, index: number): string {
  const lines = [`## ${index}. ${result.title || 'Untitled'}`];
  lines.push(`**URL:** ${result.url || 'N/A'}`);

  if (result.publishedDate) {
    lines.push(`**Published:** ${result.publishedDate}`);
  }
  if (result.author) {
    lines.push(`**Author:** ${result.author}`);
  }

  if (result.highlights && result.highlights.length > 0) {
    lines.push('\n### Highlights');
    for (const highlight of result.highlights) {
      lines.push(`> ${highlight}`);
    }
    lines.push('');
  }

  if (result.summary) {
    lines.push(`### Summary\n${result.summary}`);
    lines.push('');
  }

  if (result.text) {
    lines.push('### Full Content');
    lines.push(result.text);
    lines.push('');
  }

  return lines.join('\n');
}

function describeStatusError(status: ContentStatus): string {
  if (!status.error) return status.status ?? 'error';
  if (typeof status.error === 'string') return status.error;
  const parts = [status.error.tag, status.error.httpStatusCode ? `HTTP ${status.error.httpStatusCode}` : undefined];
  return parts.filter(Boolean).join(', ') || 'error';
}

export function formatContentsMarkdown(data: ContentsResponse): string {
  const results = data.results ?? [];
  const failures = (data.statuses ?? []).filter((status) => status.status && status.status !== 'success');

  if (results.length === 0 && failures.length === 0) {
    return 'No content extracted from the provided URLs.';
  }

  const lines = ['# Extracted Content', ''];
  lines.push(`Successfully extracted content from **${results.length}** URLs`);
  lines.push('');

  results.forEach((result, i) => {
    lines.push(formatContentBlock(result, i + 1));
    lines.push('---');
    lines.push('');
  });

  if (failures.length > 0) {
    lines.push('## Failed URLs');
    lines.push('');
    for (const failure of failures) {
      lines.push(`- ${failure.id ?? 'unknown'}: ${describeStatusError(failure)}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

export const exaGetContents: ToolHandler = defineToolHandler(
  'exa_get_contents',
  getContentsInputSchema,
  async (input, client, signal) => {
    const data = await client.getContents(buildContentsPayload(input), signal);
    return renderResponse(data, input.response_format, () => formatContentsMarkdown(data), TRUNCATION_HINT);
  },
);

export function registerGetContentsTool(server: McpServer, client: ExaClient): void {
  server.tool(
    'exa_get_contents',
    'Extract full text, highlights or summaries from a list of URLs or Exa document IDs. ' +
      'Returns full text by default.',
    lenientShape(getContentsInputSchema),
    { ...READ_ONLY, title: 'Get Page Contents' },
    async (args, extra) => textResult(await exaGetContents(args, client, extra.signal)),
  );
}
