export const EXA_API_BASE_URL = 'https://api.exa.ai';

/** Websets live under a versioned prefix of the same host. */
export function websetsBaseUrl(baseUrl: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/v0`;
}

export const DEFAULT_TIMEOUT_MS = 30_000;

// Response size cap for anything handed back to the MCP client
export const CHARACTER_LIMIT = 25_000;
export const TRUNCATION_MARGIN = 200;

export const DEFAULT_NUM_RESULTS = 10;
export const MAX_NUM_RESULTS = 100;

export const TEXT_PREVIEW_CHARS = 500;
export const CITATION_PREVIEW_CHARS = 300;
export const MAX_HIGHLIGHTS_SHOWN = 3;

export const RESPONSE_FORMATS = ['markdown', 'json'] as const;
export type ResponseFormat = (typeof RESPONSE_FORMATS)[number];

export const SEARCH_TYPES = ['auto', 'neural', 'keyword'] as const;

export const CATEGORIES = [
  'company',
  'news',
  'research paper',
  'github',
  'tweet',
  'pdf',
  'personal site',
  'linkedin profile',
] as const;
export type Category = (typeof CATEGORIES)[number];

export const LIVECRAWL_MODES = ['fallback', 'preferred', 'always'] as const;

export const ANSWER_MODELS = ['exa', 'exa-pro'] as const;

export const RESEARCH_MODELS = ['exa-research', 'exa-research-pro'] as const;

export const ENRICHMENT_FORMATS = ['text', 'date', 'number', 'email', 'phone', 'url'] as const;

export const CODE_SEARCH_CATEGORY: Category = 'github';

/** Platforms always searched by exa_code_search; override with CODE_SEARCH_DOMAINS. */
export const DEFAULT_CODE_SEARCH_DOMAINS = ['github.com', 'gitlab.com', 'bitbucket.org', 'stackoverflow.com'];
