import {
  ExaApiError,
  ExaAuthenticationError,
  ExaCancelledError,
  ExaConnectionError,
  ExaNotFoundError,
  ExaRateLimitError,
  ExaServerError,
  ExaTimeoutError,
} from '../errors.js';
import { DEFAULT_TIMEOUT_MS, EXA_API_BASE_URL, websetsBaseUrl } from '../constants.js';
import { createLogger, errorMessage } from '../logger.js';
import type {
  AnswerPayload,
  AnswerResponse,
  ContentsPayload,
  ContentsResponse,
  EnrichmentPayload,
  FindSimilarPayload,
  JsonObject,
  Page,
  PageQuery,
  ResearchCreatePayload,
  ResearchTask,
  SearchPayload,
  SearchResponse,
  Webset,
  WebsetCreatePayload,
  WebsetEnrichment,
  WebsetItem,
} from '../types/exa.js';

const log = createLogger('exa-client');

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface ExaClientConfig {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  /** Defaults to the global fetch, whose keep-alive pool is shared by every call. */
  fetch?: FetchLike;
}

export interface RequestOptions {
  baseUrl?: string;
  body?: object;
  query?: Record<string, string | number | undefined>;
  signal?: AbortSignal;
}

function buildUrl(baseUrl: string, path: string, query?: RequestOptions['query']): string {
  const url = new URL(`${baseUrl}${path}`);
  if (query) {
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }
  }
  return url.toString();
}

function extractErrorDetail(bodyText: string): string {
  try {
    const parsed: unknown = JSON.parse(bodyText);
    if (parsed && typeof parsed === 'object' && 'error' in parsed) {
      const detail = parsed.error;
      return typeof detail === 'string' ? detail : JSON.stringify(detail);
    }
  } catch {
    // not JSON; fall through to the raw text
  }
  return bodyText;
}

function parseRetryAfter(header: string | null): number | undefined {
  if (!header) return undefined;
  const seconds = Number.parseInt(header.trim(), 10);
  return Number.isNaN(seconds) ? undefined : seconds;
}

/** Map a non-2xx response to the matching error class. */
export function errorForStatus(status: number, bodyText: string, retryAfterHeader: string | null): Error {
  const detail = extractErrorDetail(bodyText);

  if (status === 401) return new ExaAuthenticationError(`Authentication failed: ${detail}`);
  if (status === 404) return new ExaNotFoundError(`Not found: ${detail}`);
  if (status === 429) {
    return new ExaRateLimitError(`Rate limit exceeded: ${detail}`, parseRetryAfter(retryAfterHeader));
  }
  if (status >= 500) return new ExaServerError(`Server error (${status}): ${detail}`);
  return new ExaApiError(`API error (${status}): ${detail}`, status);
}

/**
 * Thin client over the Exa HTTP API. One instance is created at startup and
 * shared by every tool call; each method performs exactly one request.
 */
export class ExaClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly lifecycle = new AbortController();

  constructor(config: ExaClientConfig) {
    this.apiKey = config.apiKey;
    this.baseUrl = (config.baseUrl ?? EXA_API_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init));
  }

  get closed(): boolean {
    return this.lifecycle.signal.aborted;
  }

  get websetsUrl(): string {
    return websetsBaseUrl(this.baseUrl);
  }

  /** Abort anything in flight and refuse further requests. */
  close(): void {
    if (this.closed) return;
    this.lifecycle.abort();
    log.debug('Client closed');
  }

  async request<T extends object = JsonObject>(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<T> {
    if (this.closed) {
      throw new ExaConnectionError('Client is closed');
    }

    const url = buildUrl(options.baseUrl ?? this.baseUrl, path, options.query);
    const timeoutSignal = AbortSignal.timeout(this.timeoutMs);
    const signals = [timeoutSignal, this.lifecycle.signal];
    if (options.signal) signals.push(options.signal);

    const start = Date.now();
    log.debug('Request', { method, url });

    let response: Response;
    let bodyText: string;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers: {
          'x-api-key': this.apiKey,
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: AbortSignal.any(signals),
      });
      bodyText = await response.text();
    } catch (error) {
      const durationMs = Date.now() - start;
      if (options.signal?.aborted) {
        log.debug('Request cancelled', { method, url, durationMs });
        throw new ExaCancelledError(`${method} ${path} was cancelled`);
      }
      if (timeoutSignal.aborted) {
        log.warn('Request timed out', { method, url, timeoutMs: this.timeoutMs, durationMs });
        throw new ExaTimeoutError(`${method} ${path} timed out after ${this.timeoutMs}ms`);
      }
      if (this.closed) {
        throw new ExaConnectionError('Client is closed');
      }
      const message = errorMessage(error);
      log.warn('Request failed', { method, url, error: message, durationMs });
      throw new ExaConnectionError(`${method} ${path} failed: ${message}`);
    }

    const durationMs = Date.now() - start;
    if (!response.ok) {
      log.warn('Request returned error status', { method, url, status: response.status, durationMs });
      throw errorForStatus(response.status, bodyText, response.headers.get('Retry-After'));
    }

    log.debug('Request complete', { method, url, status: response.status, durationMs });
    try {
      return JSON.parse(bodyText || '{}') as T;
    } catch {
      throw new ExaApiError(`API error (${response.status}): response was not valid JSON`, response.status);
    }
  }

  async search(payload: SearchPayload, signal?: AbortSignal): Promise<SearchResponse> {
    return this.request<SearchResponse>('POST', '/search', { body: payload, signal });
  }

  async findSimilar(payload: FindSimilarPayload, signal?: AbortSignal): Promise<SearchResponse> {
    return this.request<SearchResponse>('POST', '/findSimilar', { body: payload, signal });
  }

  async getContents(payload: ContentsPayload, signal?: AbortSignal): Promise<ContentsResponse> {
    return this.request<ContentsResponse>('POST', '/contents', { body: payload, signal });
  }

  async answer(payload: AnswerPayload, signal?: AbortSignal): Promise<AnswerResponse> {
    return this.request<AnswerResponse>('POST', '/answer', { body: payload, signal });
  }

  async researchCreate(payload: ResearchCreatePayload, signal?: AbortSignal): Promise<ResearchTask> {
    return this.request<ResearchTask>('POST', '/research/v1', { body: payload, signal });
  }

  async researchGet(researchId: string, signal?: AbortSignal): Promise<ResearchTask> {
    return this.request<ResearchTask>('GET', `/research/v1/${encodeURIComponent(researchId)}`, { signal });
  }

  async researchList(page: PageQuery, signal?: AbortSignal): Promise<Page<ResearchTask>> {
    return this.request<Page<ResearchTask>>('GET', '/research/v1', { query: { ...page }, signal });
  }

  async websetCreate(payload: WebsetCreatePayload, signal?: AbortSignal): Promise<Webset> {
    return this.request<Webset>('POST', '/websets', { baseUrl: this.websetsUrl, body: payload, signal });
  }

  async websetGet(websetId: string, signal?: AbortSignal): Promise<Webset> {
    return this.request<Webset>('GET', `/websets/${encodeURIComponent(websetId)}`, {
      baseUrl: this.websetsUrl,
      signal,
    });
  }

  async websetList(page: PageQuery, signal?: AbortSignal): Promise<Page<Webset>> {
    return this.request<Page<Webset>>('GET', '/websets', { baseUrl: this.websetsUrl, query: { ...page }, signal });
  }

  async websetDelete(websetId: string, signal?: AbortSignal): Promise<Webset> {
    return this.request<Webset>('DELETE', `/websets/${encodeURIComponent(websetId)}`, {
      baseUrl: this.websetsUrl,
      signal,
    });
  }

  async websetItems(websetId: string, page: PageQuery, signal?: AbortSignal): Promise<Page<WebsetItem>> {
    return this.request<Page<WebsetItem>>('GET', `/websets/${encodeURIComponent(websetId)}/items`, {
      baseUrl: this.websetsUrl,
      query: { ...page },
      signal,
    });
  }

  async websetEnrich(websetId: string, payload: EnrichmentPayload, signal?: AbortSignal): Promise<WebsetEnrichment> {
    return this.request<WebsetEnrichment>('POST', `/websets/${encodeURIComponent(websetId)}/enrichments`, {
      baseUrl: this.websetsUrl,
      body: payload,
      signal,
    });
  }
}
