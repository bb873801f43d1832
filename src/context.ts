import type { AppConfig } from './config.js';
import { createLogger } from './logger.js';
import { ExaClient, type FetchLike } from './services/exa-client.js';

const log = createLogger('context');

/** Process-wide state shared by every tool call. */
export interface AppContext {
  config: AppConfig;
  client: ExaClient;
}

export interface AppContextOptions {
  fetch?: FetchLike;
}

export function createAppContext(config: AppConfig, options: AppContextOptions = {}): AppContext {
  const client = new ExaClient({
    apiKey: config.apiKey,
    baseUrl: config.baseUrl,
    timeoutMs: config.timeoutMs,
    fetch: options.fetch,
  });
  log.debug('Context created', { baseUrl: config.baseUrl, timeoutMs: config.timeoutMs });
  return { config, client };
}

export function closeAppContext(context: AppContext): void {
  context.client.close();
  log.debug('Context closed');
}

/** Run `fn` with a fresh context that is closed however `fn` finishes. */
export async function withAppContext<T>(
  config: AppConfig,
  fn: (context: AppContext) => Promise<T>,
  options: AppContextOptions = {},
): Promise<T> {
  const context = createAppContext(config, options);
  try {
    return await fn(context);
  } finally {
    closeAppContext(context);
  }
}
