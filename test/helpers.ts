import { vi, type Mock } from 'vitest';
import type { AppConfig } from '../src/config.js';
import { ExaClient, type FetchLike } from '../src/services/exa-client.js';

export const TEST_API_KEY = 'test-secret';
export const TEST_BASE_URL = 'https://api.exa.test';

export type FetchMock = Mock<FetchLike>;

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}

/** A fetch that answers every call with the same JSON body. */
export function mockFetch(body: unknown = {}, status = 200, headers: Record<string, string> = {}): FetchMock {
  return vi.fn<FetchLike>(async () => jsonResponse(body, status, headers));
}

/** A fetch that never settles until its signal aborts. */
export function hangingFetch(): FetchMock {
  return vi.fn<FetchLike>(
    (_url, init) =>
      new Promise<Response>((_resolve, reject) => {
        const signal = init.signal;
        if (!signal) return;
        if (signal.aborted) {
          reject(signal.reason);
          return;
        }
        signal.addEventListener('abort', () => reject(signal.reason), { once: true });
      }),
  );
}

export function createTestClient(fetch: FetchLike, timeoutMs = 5_000): ExaClient {
  return new ExaClient({ apiKey: TEST_API_KEY, baseUrl: TEST_BASE_URL, timeoutMs, fetch });
}

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    apiKey: TEST_API_KEY,
    baseUrl: TEST_BASE_URL,
    timeoutMs: 5_000,
    logLevel: 'error',
    debug: false,
    transport: 'stdio',
    host: '127.0.0.1',
    port: 8080,
    codeSearchDomains: ['github.com', 'gitlab.com', 'bitbucket.org', 'stackoverflow.com'],
    ...overrides,
  };
}

export interface RecordedRequest {
  url: string;
  method: string | undefined;
  headers: Headers;
  body: unknown;
}

export function recordedRequest(fetch: FetchMock, index = 0): RecordedRequest {
  const call = fetch.mock.calls[index];
  if (!call) {
    throw new Error(`fetch call #${index} was not made`);
  }
  const [url, init] = call;
  const body: unknown = typeof init.body === 'string' ? JSON.parse(init.body) : undefined;
  return { url, method: init.method, headers: new Headers(init.headers), body };
}

export async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected the promise to reject');
}
