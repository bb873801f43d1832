import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { ANSWER_MODELS, CITATION_PREVIEW_CHARS } from '../constants.js';
import { codeBlock, preview, renderResponse } from '../formatters/markdown.js';
import { lenientShape, responseFormatSchema } from '../schemas/common.js';
import type { ExaClient } from '../services/exa-client.js';
import type { AnswerPayload, AnswerResponse, Citation } from '../types/exa.js';
import { defineToolHandler, READ_ONLY, textResult, type ToolHandler } from './define.js';

const TRUNCATION_HINT = 'Use more specific questions for shorter answers.';

export const answerInputSchema = z
  .object({
    query: z.string().trim().min(1).max(2000).describe('The question to answer'),
    include_text: z.boolean().default(true).describe('Include source text with each citation'),
    model: z.enum(ANSWER_MODELS).optional().describe("Answer model: 'exa' (default) or 'exa-pro'"),
    system_prompt: z
      .string()
      .trim()
      .min(1)
      .max(4000)
      .optional()
      .describe('Custom instructions guiding how the answer is written'),
    response_format: responseFormatSchema,
  })
  .strict();

export type AnswerInput = z.infer<typeof answerInputSchema>;

export function buildAnswerPayload(input: AnswerInput): AnswerPayload {
  const payload: AnswerPayload = { query: input.query, text: input.include_text };
  if (input.model) payload.model = input.model;
  if (input.system_prompt) payload.systemPrompt = input.system_prompt;
  return payload;
}

function formatCitation(citation: Citation, index: number): string {
  let header = `**[${index}]** [${citation.title || 'Untitled'}](${citation.url || '#'})`;
  if (citation.publishedDate) {
    header += ` (${citation.publishedDate})`;
  }

  const lines = [header];
  if (citation.text) {
    lines.push(`   > ${preview(citation.text, CITATION_PREVIEW_CHARS)}`);
  }
  return lines.join('\n');
}

export function formatAnswerMarkdown(data: AnswerResponse): string {
  const answer = data.answer == null || data.answer === '' ? 'No answer generated.' : data.answer;
  const citations = data.citations ?? [];

  const lines = ['# Answer', '', typeof answer === 'string' ? answer : codeBlock(answer), ''];

  if (citations.length > 0) {
    lines.push('## Sources');
    lines.push('');
    citations.forEach((citation, i) => {
      lines.push(formatCitation(citation, i + 1));
      lines.push('');
    });
  }

  return lines.join('\n');
}

export const exaAnswer: ToolHandler = defineToolHandler('exa_answer', answerInputSchema, async (input, client, signal) => {
  const data = await client.answer(buildAnswerPayload(input), signal);
  return renderResponse(data, input.response_format, () => formatAnswerMarkdown(data), TRUNCATION_HINT);
});

export function registerAnswerTool(server: McpServer, client: ExaClient): void {
  server.tool(
    'exa_answer',
    'Get a direct answer to a question, generated from a web search, with numbered source citations.',
    lenientShape(answerInputSchema),
    { ...READ_ONLY, title: 'Get Answer with Citations' },
    async (args, extra) => textResult(await exaAnswer(args, client, extra.signal)),
  );
}
