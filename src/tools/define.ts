import type { z } from 'zod';
import type { ToolAnnotations } from '@modelcontextprotocol/sdk/types.js';
import { formatErrorForLlm } from '../errors.js';
import { createLogger, errorMessage } from '../logger.js';
import { parseInput } from '../schemas/common.js';
import type { ExaClient } from '../services/exa-client.js';

const log = createLogger('tool');

export type ToolHandler = (args: unknown, client: ExaClient, signal?: AbortSignal) => Promise<string>;

/**
 * Wrap a tool body so that it validates its own arguments and never throws:
 * every failure comes back as an `Error: ...` string for the caller to read.
 */
export function defineToolHandler<S extends z.ZodTypeAny>(
  name: string,
  schema: S,
  run: (input: z.output<S>, client: ExaClient, signal?: AbortSignal) => Promise<string>,
): ToolHandler {
  const toolLog = log.child(name);

  return async (args, client, signal) => {
    const start = Date.now();
    try {
      const input = parseInput(schema, args);
      toolLog.info('Tool call', { responseFormat: responseFormatOf(input) });
      const text = await run(input, client, signal);
      toolLog.info('Tool call complete', { length: text.length, durationMs: Date.now() - start });
      return text;
    } catch (error) {
      toolLog.warn('Tool call failed', { error: errorMessage(error), durationMs: Date.now() - start });
      return formatErrorForLlm(error);
    }
  };
}

function responseFormatOf(input: unknown): unknown {
  if (input && typeof input === 'object' && 'response_format' in input) {
    return input.response_format;
  }
  return undefined;
}

export function textResult(text: string): { content: Array<{ type: 'text'; text: string }> } {
  return { content: [{ type: 'text' as const, text }] };
}

export const READ_ONLY: ToolAnnotations = {
  readOnlyHint: true,
  destructiveHint: false,
  idempotentHint: true,
  openWorldHint: true,
};

export const CREATES_REMOTE_STATE: ToolAnnotations = {
  readOnlyHint: false,
  destructiveHint: false,
  idempotentHint: false,
  openWorldHint: true,
};

export const DESTRUCTIVE: ToolAnnotations = {
  readOnlyHint: false,
  destructiveHint: true,
  idempotentHint: true,
  openWorldHint: true,
};
