import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { DEFAULT_CODE_SEARCH_DOMAINS, DEFAULT_TIMEOUT_MS, EXA_API_BASE_URL } from './constants.js';
import { LOG_LEVELS, type LogLevel } from './logger.js';

export type TransportKind = 'stdio' | 'http';

export interface AppConfig {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  logLevel: LogLevel;
  debug: boolean;
  transport: TransportKind;
  host: string;
  port: number;
  codeSearchDomains: string[];
}

export class ConfigError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

const API_KEY_REQUIRED = 'EXA_API_KEY environment variable is required';

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .transform((value) => ['1', 'true', 'yes', 'on'].includes(value));

const envSchema = z.object({
  EXA_API_KEY: z.string({ required_error: API_KEY_REQUIRED }).trim().min(1, API_KEY_REQUIRED),
  EXA_BASE_URL: z
    .string()
    .trim()
    .url()
    .transform((value) => value.replace(/\/+$/, ''))
    .default(EXA_API_BASE_URL),
  EXA_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .transform((value) => (value === 'warning' ? 'warn' : value))
    .pipe(z.enum(LOG_LEVELS))
    .default('info'),
  DEBUG: booleanFlag.default('false'),
  MCP_TRANSPORT: z.string().trim().toLowerCase().pipe(z.enum(['stdio', 'http'])).default('stdio'),
  MCP_HOST: z.string().trim().min(1).default('0.0.0.0'),
  MCP_PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  CODE_SEARCH_DOMAINS: z
    .string()
    .transform((value) =>
      value
        .split(',')
        .map((domain) => domain.trim().toLowerCase())
        .filter(Boolean),
    )
    .optional(),
});

/** Load `.env` from the working directory into `process.env` (existing values win). */
export function loadEnvFile(): void {
  loadDotenv();
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => {
        const field = issue.path.join('.');
        return issue.message === API_KEY_REQUIRED ? issue.message : `${field}: ${issue.message}`;
      }),
    );
  }

  const values = parsed.data;
  const codeSearchDomains =
    values.CODE_SEARCH_DOMAINS && values.CODE_SEARCH_DOMAINS.length > 0
      ? values.CODE_SEARCH_DOMAINS
      : [...DEFAULT_CODE_SEARCH_DOMAINS];

  return {
    apiKey: values.EXA_API_KEY,
    baseUrl: values.EXA_BASE_URL,
    timeoutMs: values.EXA_TIMEOUT_MS,
    logLevel: values.LOG_LEVEL,
    debug: values.DEBUG,
    transport: values.MCP_TRANSPORT,
    host: values.MCP_HOST,
    port: values.MCP_PORT,
    codeSearchDomains,
  };
}
