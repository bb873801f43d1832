import { z } from 'zod';
import { ExaValidationError } from '../errors.js';
import { DEFAULT_NUM_RESULTS, MAX_NUM_RESULTS, RESPONSE_FORMATS } from '../constants.js';
import type { ContentPayload } from '../types/exa.js';

const SCHEME_RE = /^https?:\/\//i;
const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}(T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

export function normalizeDomains(domains: string[]): string[] {
  return domains.map((domain) => domain.trim().toLowerCase()).filter(Boolean);
}

export function normalizePhrases(phrases: string[]): string[] {
  return phrases.map((phrase) => phrase.trim()).filter(Boolean);
}

/**
 * Trim, and add `https://` to scheme-less values that contain a dot.
 *
 * Returns `null` when the value cannot be used as a URL. With `allowOpaque`,
 * values that have no scheme and no dot are passed through unchanged so that
 * Exa document IDs can be mixed with URLs.
 */
export function normalizeUrl(value: string, options: { allowOpaque?: boolean } = {}): string | null {
  let candidate = value.trim();
  if (!candidate) return null;

  if (!SCHEME_RE.test(candidate)) {
    if (!candidate.includes('.')) return options.allowOpaque ? candidate : null;
    candidate = `https://${candidate}`;
  }

  try {
    const parsed = new URL(candidate);
    if (!parsed.hostname) return null;
  } catch {
    return null;
  }
  return candidate;
}

export const responseFormatSchema = z
  .enum(RESPONSE_FORMATS)
  .default('markdown')
  .describe("Output format: 'markdown' for human-readable or 'json' for machine-readable");

export function numResultsSchema(max = MAX_NUM_RESULTS, fallback = DEFAULT_NUM_RESULTS) {
  return z
    .number()
    .int()
    .min(1)
    .max(max)
    .default(fallback)
    .describe(`Number of results to return (1-${max}, default ${fallback})`);
}

export const domainListSchema = z
  .array(z.string())
  .max(50)
  .transform(normalizeDomains);

export const phraseListSchema = z
  .array(z.string())
  .max(10)
  .transform(normalizePhrases);

export const isoDateSchema = z
  .string()
  .trim()
  .regex(ISO_DATE_RE, 'Expected an ISO 8601 date (YYYY-MM-DD)');

export function urlSchema(options: { allowOpaque?: boolean } = {}) {
  return z
    .string()
    .trim()
    .min(1)
    .max(2000)
    .transform((value, ctx) => {
      const normalized = normalizeUrl(value, options);
      if (normalized === null) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid URL: ${value}` });
        return z.NEVER;
      }
      return normalized;
    });
}

export const contentOptionsSchema = z
  .object({
    include_text: z.boolean().default(false).describe('Include full text content from pages'),
    max_characters: z
      .number()
      .int()
      .min(100)
      .max(50_000)
      .optional()
      .describe('Maximum characters of text to extract per result'),
    include_highlights: z.boolean().default(false).describe('Include relevant text excerpts'),
    num_sentences: z.number().int().min(1).max(10).optional().describe('Number of sentences per highlight'),
    include_summary: z.boolean().default(false).describe('Include an AI-generated summary per result'),
    summary_query: z.string().trim().min(1).max(500).optional().describe('Focus the summary on this question'),
  })
  .strict()
  .describe('Content extraction options (text, highlights, summary)');

export type ContentOptions = z.infer<typeof contentOptionsSchema>;

/**
 * Collapse content toggles into Exa's `text` / `highlights` / `summary` keys.
 * A disabled toggle contributes no key at all.
 */
export function buildContentPayload(options?: ContentOptions): ContentPayload {
  const payload: ContentPayload = {};
  if (!options) return payload;

  if (options.include_text) {
    payload.text = options.max_characters !== undefined ? { maxCharacters: options.max_characters } : true;
  }
  if (options.include_highlights) {
    payload.highlights = options.num_sentences !== undefined ? { numSentences: options.num_sentences } : true;
  }
  if (options.include_summary) {
    payload.summary = options.summary_query !== undefined ? { query: options.summary_query } : true;
  }
  return payload;
}

/**
 * The shape handed to the MCP SDK when registering a tool: same fields, types
 * and descriptions as `schema`, with every bound, enum, transform and default
 * removed. The SDK rejects arguments that fail its own parse with a protocol
 * error, so constraint checks are left to `parseInput` inside the handler.
 */
export function lenientShape(schema: z.AnyZodObject): z.ZodRawShape {
  const shape: z.ZodRawShape = {};
  for (const [key, field] of Object.entries<z.ZodTypeAny>(schema.shape)) {
    shape[key] = lenientType(field);
  }
  return shape;
}

function lenientType(type: z.ZodTypeAny): z.ZodTypeAny {
  const base = lenientBase(type);
  return type.description ? base.describe(type.description) : base;
}

function lenientBase(type: z.ZodTypeAny): z.ZodTypeAny {
  if (type instanceof z.ZodOptional) return lenientType(type.unwrap()).optional();
  if (type instanceof z.ZodDefault) return lenientType(type.removeDefault()).optional();
  if (type instanceof z.ZodEffects) return lenientType(type.innerType());
  if (type instanceof z.ZodString || type instanceof z.ZodEnum) return z.string();
  if (type instanceof z.ZodNumber) return z.number();
  if (type instanceof z.ZodBoolean) return z.boolean();
  if (type instanceof z.ZodArray) return z.array(lenientType(type.element));
  if (type instanceof z.ZodObject) return z.object(lenientShape(type)).passthrough();
  if (type instanceof z.ZodRecord) return z.record(z.unknown());
  return z.unknown();
}

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const field = issue.path.join('.');
      return field ? `${field}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

export function parseInput<S extends z.ZodTypeAny>(schema: S, args: unknown): z.output<S> {
  const result = schema.safeParse(args ?? {});
  if (!result.success) {
    throw new ExaValidationError(describeIssues(result.error));
  }
  return result.data;
}
