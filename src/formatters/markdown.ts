import {
  CHARACTER_LIMIT,
  MAX_HIGHLIGHTS_SHOWN,
  TEXT_PREVIEW_CHARS,
  TRUNCATION_MARGIN,
  type ResponseFormat,
} from '../constants.js';
import type { ExaResult } from '../types/exa.js';

export const DEFAULT_TRUNCATION_HINT = 'Use more specific filters or reduce num_results.';

/** Cut to `limit` characters, marking the cut with `...`. */
export function preview(text: string, limit: number): string {
  return text.length > limit ? `${text.slice(0, limit)}...` : text;
}

/**
 * Enforce CHARACTER_LIMIT on an already-assembled response. The cut is
 * positional and may land inside a block.
 */
export function truncateResponse(text: string, hint: string = DEFAULT_TRUNCATION_HINT): string {
  if (text.length <= CHARACTER_LIMIT) return text;

  let cut = CHARACTER_LIMIT - TRUNCATION_MARGIN;
  // Never end on the first half of a surrogate pair
  if (isHighSurrogate(text.charCodeAt(cut - 1))) cut -= 1;

  return (
    text.slice(0, cut) +
    `\n\n---\n[Response truncated from ${text.length} characters. ${hint}]`
  );
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

export function toJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/** Pick the rendering for `format`, then apply the size cap. */
export function renderResponse(
  data: unknown,
  format: ResponseFormat,
  markdown: () => string,
  hint?: string,
): string {
  const text = format === 'json' ? toJson(data) : markdown();
  return truncateResponse(text, hint);
}

export type ScoreLabel = 'Relevance' | 'Similarity';

/** One search-style result: title, URL, metadata, then whatever content came back. */
export function formatResultBlock(result: ExaResult, index: number, scoreLabel: ScoreLabel): string {
  const lines = [`### ${index}. ${result.title || 'Untitled'}`];
  lines.push(`**URL:** ${result.url || 'N/A'}`);

  if (result.publishedDate) {
    lines.push(`**Published:** ${result.publishedDate}`);
  }
  if (result.author) {
    lines.push(`**Author:** ${result.author}`);
  }
  if (typeof result.score === 'number') {
    lines.push(`**${scoreLabel}:** ${result.score.toFixed(2)}`);
  }

  if (result.highlights && result.highlights.length > 0) {
    lines.push('\n**Highlights:**');
    for (const highlight of result.highlights.slice(0, MAX_HIGHLIGHTS_SHOWN)) {
      lines.push(`> ${highlight}`);
    }
  }

  if (result.summary) {
    lines.push(`\n**Summary:** ${result.summary}`);
  }

  if (result.text) {
    lines.push(`\n**Content Preview:**\n${preview(result.text, TEXT_PREVIEW_CHARS)}`);
  }

  return lines.join('\n');
}

/** Numbered result blocks in the order received, each followed by a blank line. */
export function formatResultList(results: ExaResult[], scoreLabel: ScoreLabel): string[] {
  const lines: string[] = [];
  results.forEach((result, i) => {
    lines.push(formatResultBlock(result, i + 1, scoreLabel));
    lines.push('');
  });
  return lines;
}

export function codeBlock(value: unknown): string {
  return ['```json', toJson(value), '```'].join('\n');
}
