#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { ConfigError, loadConfig, loadEnvFile, type AppConfig } from './config.js';
import { withAppContext, type AppContext } from './context.js';
import { startHttpServer } from './http.js';
import { configureLogging, createLogger, errorMessage } from './logger.js';
import { createServer, SERVER_NAME, SERVER_VERSION } from './server.js';

const log = createLogger('main');

type ShutdownReason = 'SIGINT' | 'SIGTERM' | 'transport closed' | 'uncaught exception';

function readConfig(): AppConfig {
  loadEnvFile();
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      log.error(error.message, { problems: error.problems });
      process.exit(1);
    }
    throw error;
  }
}

/** Resolves with the first of: a signal, the transport closing, or a fatal error. */
function shutdownSignal(): { wait: Promise<ShutdownReason>; trigger: (reason: ShutdownReason) => void } {
  let trigger: (reason: ShutdownReason) => void = () => {};
  const wait = new Promise<ShutdownReason>((resolve) => {
    trigger = resolve;
  });

  process.once('SIGINT', () => trigger('SIGINT'));
  process.once('SIGTERM', () => trigger('SIGTERM'));

  process.on('uncaughtException', (error) => {
    log.error('Uncaught exception', { error: error.message, stack: error.stack });
    trigger('uncaught exception');
  });

  process.on('unhandledRejection', (reason) => {
    log.error('Unhandled promise rejection', { error: errorMessage(reason) });
  });

  return { wait, trigger };
}

async function serveStdio(context: AppContext, shutdown: ReturnType<typeof shutdownSignal>): Promise<ShutdownReason> {
  const server = createServer(context);
  const transport = new StdioServerTransport();

  server.server.onclose = () => shutdown.trigger('transport closed');
  process.stdin.once('end', () => shutdown.trigger('transport closed'));

  await server.connect(transport);
  log.info('MCP server connected and ready', { transport: 'stdio' });

  const reason = await shutdown.wait;
  await server.close();
  return reason;
}

async function serveHttp(context: AppContext, shutdown: ReturnType<typeof shutdownSignal>): Promise<ShutdownReason> {
  const handle = await startHttpServer(context);
  handle.closed.then(
    () => shutdown.trigger('transport closed'),
    (error: unknown) => log.error('HTTP server error', { error: errorMessage(error) }),
  );

  const reason = await shutdown.wait;
  await handle.close();
  return reason;
}

async function main(): Promise<void> {
  const config = readConfig();
  configureLogging({ level: config.logLevel, debug: config.debug });

  log.info('Starting Exa MCP server', {
    name: SERVER_NAME,
    version: SERVER_VERSION,
    nodeVersion: process.version,
    pid: process.pid,
    transport: config.transport,
    logLevel: config.debug ? 'debug' : config.logLevel,
  });

  const shutdown = shutdownSignal();

  const reason = await withAppContext(config, (context) =>
    config.transport === 'http' ? serveHttp(context, shutdown) : serveStdio(context, shutdown),
  );

  log.info('Shut down', { reason });
  process.exit(reason === 'uncaught exception' ? 1 : 0);
}

main().catch((error: unknown) => {
  log.error('Failed to start server', {
    error: errorMessage(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
