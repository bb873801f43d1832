import type { Server } from 'node:http';
import express, { type Express, type Request, type Response } from 'express';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import type { AppContext } from './context.js';
import { createLogger, errorMessage } from './logger.js';
import { createServer } from './server.js';

const log = createLogger('http');

export const MCP_PATH = '/mcp';
export const HEALTH_PATH = '/health';

export interface HttpHandle {
  server: Server;
  /** Resolves once the server stops listening, for any reason. */
  closed: Promise<void>;
  close(): Promise<void>;
}

function methodNotAllowed(allow: string) {
  return (_req: Request, res: Response): void => {
    res.set('Allow', allow).status(405).json({ error: 'Method not allowed' });
  };
}

/**
 * Stateless streamable HTTP: every POST gets a fresh MCP server and transport,
 * both torn down when the response closes. The Exa client is shared.
 */
export async function handleMcpRequest(context: AppContext, req: Request, res: Response): Promise<void> {
  const server = createServer(context);
  const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });

  res.on('close', () => {
    Promise.all([transport.close(), server.close()]).catch((error: unknown) => {
      log.warn('Error closing request transport', { error: errorMessage(error) });
    });
  });

  await server.connect(transport);
  await transport.handleRequest(req, res, req.body);
}

export function createHttpApp(context: AppContext): Express {
  const app = express();
  app.use(express.json({ limit: '1mb' }));

  app.get(HEALTH_PATH, (_req, res) => {
    res.json({ status: 'ok' });
  });
  app.all(HEALTH_PATH, methodNotAllowed('GET'));

  app.post(MCP_PATH, (req, res) => {
    handleMcpRequest(context, req, res).catch((error: unknown) => {
      log.error('MCP request failed', { error: errorMessage(error) });
      if (!res.headersSent) {
        res.status(500).json({ jsonrpc: '2.0', error: { code: -32603, message: 'Internal server error' }, id: null });
      }
    });
  });
  app.all(MCP_PATH, methodNotAllowed('POST'));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}

export function startHttpServer(context: AppContext): Promise<HttpHandle> {
  const { host, port } = context.config;
  const server = createHttpApp(context).listen(port, host);

  const closed = new Promise<void>((resolve) => {
    server.on('close', () => resolve());
  });

  const close = (): Promise<void> =>
    new Promise((resolve, reject) => {
      if (!server.listening) {
        resolve();
        return;
      }
      server.close((error) => (error ? reject(error) : resolve()));
      server.closeAllConnections();
    });

  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.once('listening', () => {
      server.off('error', reject);
      log.info('HTTP transport listening', { host, port, path: MCP_PATH });
      resolve({ server, closed, close });
    });
  });
}
