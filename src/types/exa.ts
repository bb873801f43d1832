/**
 * Wire shapes of the Exa API (camelCase, as sent and received).
 *
 * Response fields are all optional: the API omits keys freely and the
 * formatters render only what is present.
 */

export type JsonObject = { [key: string]: unknown };

export interface ContentPayload {
  text?: true | { maxCharacters: number };
  highlights?: true | { numSentences: number };
  summary?: true | { query: string };
}

export interface SearchPayload extends ContentPayload {
  query: string;
  numResults: number;
  type: string;
  useAutoprompt: boolean;
  category?: string;
  includeDomains?: string[];
  excludeDomains?: string[];
  startPublishedDate?: string;
  endPublishedDate?: string;
  startCrawlDate?: string;
  endCrawlDate?: string;
  includeText?: string[];
  excludeText?: string[];
  livecrawl?: string;
}

export interface FindSimilarPayload extends ContentPayload {
  url: string;
  numResults: number;
  excludeSourceDomain: boolean;
  includeDomains?: string[];
  excludeDomains?: string[];
  startPublishedDate?: string;
  endPublishedDate?: string;
}

export interface ContentsPayload extends ContentPayload {
  ids: string[];
  livecrawl?: string;
  subpages?: number;
}

export interface AnswerPayload {
  query: string;
  text: boolean;
  model?: string;
  systemPrompt?: string;
}

export interface ResearchCreatePayload {
  instructions: string;
  model: string;
  outputSchema?: JsonObject;
}

export interface WebsetCreatePayload {
  search: {
    query: string;
    count: number;
    criteria?: Array<{ description: string }>;
  };
}

export interface EnrichmentPayload {
  description: string;
  format: string;
}

export interface PageQuery {
  limit: number;
  cursor?: string;
}

export interface ExaResult {
  id?: string;
  title?: string | null;
  url?: string;
  publishedDate?: string | null;
  author?: string | null;
  score?: number | null;
  text?: string | null;
  highlights?: string[];
  highlightScores?: number[];
  summary?: string | null;
  subpages?: ExaResult[];
}

export interface SearchResponse {
  requestId?: string;
  results?: ExaResult[];
  autopromptString?: string;
  resolvedSearchType?: string;
}

export interface ContentStatus {
  id?: string;
  status?: string;
  error?: { tag?: string; httpStatusCode?: number } | string | null;
}

export interface ContentsResponse {
  requestId?: string;
  results?: ExaResult[];
  statuses?: ContentStatus[];
}

export interface Citation {
  id?: string;
  url?: string;
  title?: string | null;
  author?: string | null;
  publishedDate?: string | null;
  text?: string | null;
}

export interface AnswerResponse {
  requestId?: string;
  answer?: string | JsonObject | null;
  citations?: Citation[];
}

export type ResearchStatus = 'pending' | 'queued' | 'running' | 'completed' | 'failed' | 'canceled';

export interface ResearchTask {
  researchId?: string;
  status?: ResearchStatus | string;
  instructions?: string;
  model?: string;
  createdAt?: string;
  completedAt?: string;
  result?: string | JsonObject | null;
  error?: string | null;
}

export interface Page<T> {
  data?: T[];
  hasMore?: boolean;
  nextCursor?: string | null;
}

export interface WebsetSearch {
  id?: string;
  query?: string;
  count?: number;
  status?: string;
  criteria?: Array<{ description?: string }>;
  progress?: { found?: number; completion?: number };
}

export interface WebsetEnrichment {
  id?: string;
  status?: string;
  description?: string;
  format?: string;
  createdAt?: string;
}

export interface Webset {
  id?: string;
  status?: string;
  createdAt?: string;
  updatedAt?: string;
  searches?: WebsetSearch[];
  enrichments?: WebsetEnrichment[];
}

export interface WebsetItem {
  id?: string;
  createdAt?: string;
  properties?: {
    type?: string;
    url?: string;
    description?: string;
    content?: string;
  };
}
