/**
 * Leveled logger that writes to stderr (stdout is reserved for MCP protocol
 * traffic on the stdio transport).
 *
 * Each line: `[timestamp] [LEVEL] [component] message {meta}`.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

type LogSink = (line: string) => void;

let minLevel: LogLevel = 'info';
let sink: LogSink = (line) => {
  process.stderr.write(line + '\n');
};

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function getLogLevel(): LogLevel {
  return minLevel;
}

/** Debug mode wins over the configured level. */
export function configureLogging(options: { level: LogLevel; debug?: boolean }): void {
  setLogLevel(options.debug ? 'debug' : options.level);
}

/** Redirect output; returns a function restoring the previous sink. Used by tests. */
export function setLogSink(next: LogSink): () => void {
  const previous = sink;
  sink = next;
  return () => {
    sink = previous;
  };
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
}

export function formatLogLine(
  level: LogLevel,
  component: string,
  message: string,
  meta?: Record<string, unknown>,
  now: Date = new Date(),
): string {
  const prefix = `[${now.toISOString()}] [${level.toUpperCase()}] [${component}]`;
  const metaStr = meta ? ' ' + JSON.stringify(meta) : '';
  return `${prefix} ${message}${metaStr}`;
}

function log(level: LogLevel, component: string, message: string, meta?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;
  sink(formatLogLine(level, component, message, meta));
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(subcomponent: string): Logger;
}

export function createLogger(component: string): Logger {
  return {
    debug: (message, meta) => log('debug', component, message, meta),
    info: (message, meta) => log('info', component, message, meta),
    warn: (message, meta) => log('warn', component, message, meta),
    error: (message, meta) => log('error', component, message, meta),
    child: (subcomponent) => createLogger(`${component}:${subcomponent}`),
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
