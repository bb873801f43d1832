import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { RESEARCH_MODELS } from '../constants.js';
import { codeBlock, renderResponse } from '../formatters/markdown.js';
import { lenientShape, responseFormatSchema } from '../schemas/common.js';
import type { ExaClient } from '../services/exa-client.js';
import type { Page, ResearchCreatePayload, ResearchTask } from '../types/exa.js';
import { CREATES_REMOTE_STATE, defineToolHandler, READ_ONLY, textResult, type ToolHandler } from './define.js';

const TRUNCATION_HINT = 'Research results may be large; use response_format=json and read the parts you need.';

const STATUS_ICONS: Record<string, string> = {
  pending: '⏳',
  queued: '⏳',
  running: '🔄',
  completed: '✅',
  failed: '❌',
  canceled: '🚫',
};

export const researchStartInputSchema = z
  .object({
    instructions: z
      .string()
      .trim()
      .min(1)
      .max(4096)
      .describe('Natural language instructions describing what to research'),
    model: z
      .enum(RESEARCH_MODELS)
      .default('exa-research')
      .describe("'exa-research' (default) or 'exa-research-pro' (higher quality, slower)"),
    output_schema: z
      .record(z.unknown())
      .optional()
      .describe('Optional JSON schema the final result should follow'),
    response_format: responseFormatSchema,
  })
  .strict();

export type ResearchStartInput = z.infer<typeof researchStartInputSchema>;

export const researchCheckInputSchema = z
  .object({
    research_id: z.string().trim().min(1).describe('The research task ID returned by exa_research_start'),
    response_format: responseFormatSchema,
  })
  .strict();

export const researchListInputSchema = z
  .object({
    limit: z.number().int().min(1).max(100).default(10).describe('Maximum number of tasks to return (1-100)'),
    cursor: z.string().trim().min(1).optional().describe('Pagination cursor from a previous call'),
    response_format: responseFormatSchema,
  })
  .strict();

export function buildResearchPayload(input: ResearchStartInput): ResearchCreatePayload {
  const payload: ResearchCreatePayload = { instructions: input.instructions, model: input.model };
  if (input.output_schema && Object.keys(input.output_schema).length > 0) {
    payload.outputSchema = input.output_schema;
  }
  return payload;
}

export function formatTaskCreatedMarkdown(task: ResearchTask, input: ResearchStartInput): string {
  const researchId = task.researchId ?? 'unknown';
  return [
    '# Research Task Created',
    '',
    `**Research ID:** \`${researchId}\``,
    `**Status:** ${task.status ?? 'pending'}`,
    `**Model:** ${task.model ?? input.model}`,
    `**Instructions:** ${task.instructions ?? input.instructions}`,
    '',
    `Use \`exa_research_check\` with research_id='${researchId}' to get results.`,
  ].join('\n');
}

export function formatTaskMarkdown(task: ResearchTask): string {
  const status = task.status ?? 'unknown';
  const icon = STATUS_ICONS[status] ?? '❓';

  const lines = [
    `### ${icon} Task: ${task.researchId ?? 'unknown'}`,
    `**Status:** ${status}`,
    `**Instructions:** ${task.instructions ?? 'N/A'}`,
  ];

  if (task.model) lines.push(`**Model:** ${task.model}`);
  if (task.createdAt) lines.push(`**Created:** ${task.createdAt}`);
  if (task.completedAt) lines.push(`**Completed:** ${task.completedAt}`);
  if (task.error) lines.push(`**Error:** ${task.error}`);

  return lines.join('\n');
}

export function formatResearchResultMarkdown(task: ResearchTask): string {
  const status = task.status ?? 'unknown';

  const lines = [
    `# Research Results: ${task.researchId ?? 'unknown'}`,
    '',
    `**Status:** ${status}`,
    `**Instructions:** ${task.instructions ?? 'N/A'}`,
  ];
  if (task.completedAt) lines.push(`**Completed:** ${task.completedAt}`);
  lines.push('');

  if (task.result) {
    lines.push('## Report');
    lines.push('');
    lines.push(typeof task.result === 'string' ? task.result : codeBlock(task.result));
  } else if (status === 'running') {
    lines.push('*Research is still in progress. Check back later.*');
  } else if (status === 'pending' || status === 'queued') {
    lines.push('*Research task is queued and will start soon.*');
  } else if (task.error) {
    lines.push(`**Error:** ${task.error}`);
  }

  return lines.join('\n');
}

export function formatTaskListMarkdown(page: Page<ResearchTask>): string {
  const tasks = page.data ?? [];

  if (tasks.length === 0) {
    return 'No research tasks found.';
  }

  const lines = ['# Research Tasks', '', `Found **${tasks.length}** tasks`, ''];

  for (const task of tasks) {
    lines.push(formatTaskMarkdown(task));
    lines.push('');
  }

  if (page.hasMore && page.nextCursor) {
    lines.push(`*More tasks available. Pass cursor='${page.nextCursor}' to see the next page.*`);
  }

  return lines.join('\n');
}

export const exaResearchStart: ToolHandler = defineToolHandler(
  'exa_research_start',
  researchStartInputSchema,
  async (input, client, signal) => {
    const task = await client.researchCreate(buildResearchPayload(input), signal);
    return renderResponse(task, input.response_format, () => formatTaskCreatedMarkdown(task, input));
  },
);

export const exaResearchCheck: ToolHandler = defineToolHandler(
  'exa_research_check',
  researchCheckInputSchema,
  async (input, client, signal) => {
    const task = await client.researchGet(input.research_id, signal);
    return renderResponse(task, input.response_format, () => formatResearchResultMarkdown(task), TRUNCATION_HINT);
  },
);

export const exaResearchList: ToolHandler = defineToolHandler(
  'exa_research_list',
  researchListInputSchema,
  async (input, client, signal) => {
    const page = await client.researchList({ limit: input.limit, cursor: input.cursor }, signal);
    return renderResponse(page, input.response_format, () => formatTaskListMarkdown(page));
  },
);

export function registerResearchTools(server: McpServer, client: ExaClient): void {
  server.tool(
    'exa_research_start',
    'Start an asynchronous deep research task. Returns a research ID immediately; poll it with exa_research_check.',
    lenientShape(researchStartInputSchema),
    { ...CREATES_REMOTE_STATE, title: 'Start Research Task' },
    async (args, extra) => textResult(await exaResearchStart(args, client, extra.signal)),
  );

  server.tool(
    'exa_research_check',
    'Check the status of a research task and return its report once completed.',
    lenientShape(researchCheckInputSchema),
    { ...READ_ONLY, title: 'Check Research Task' },
    async (args, extra) => textResult(await exaResearchCheck(args, client, extra.signal)),
  );

  server.tool(
    'exa_research_list',
    'List research tasks with their statuses, newest first.',
    lenientShape(researchListInputSchema),
    { ...READ_ONLY, title: 'List Research Tasks' },
    async (args, extra) => textResult(await exaResearchList(args, client, extra.signal)),
  );
}
