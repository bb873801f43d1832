import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from './context.js';
import { createLogger } from './logger.js';
import { registerResearchPrompts } from './prompts/web-research.js';
import { registerAnswerTool } from './tools/answer.js';
import { registerGetContentsTool } from './tools/contents.js';
import { registerResearchTools } from './tools/research.js';
import { registerSearchTools } from './tools/search.js';
import { registerFindSimilarTool } from './tools/similar.js';
import { registerWebsetTools } from './tools/websets.js';

const log = createLogger('server');

export const SERVER_NAME = 'exa-mcp-server';
export const SERVER_VERSION = '1.0.0';

export function createServer(context: AppContext): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  const { client, config } = context;

  registerSearchTools(server, client, config.codeSearchDomains);
  registerFindSimilarTool(server, client);
  registerGetContentsTool(server, client);
  registerAnswerTool(server, client);
  registerResearchTools(server, client);
  registerWebsetTools(server, client);
  registerResearchPrompts(server);

  log.debug('Tools registered', { codeSearchDomains: config.codeSearchDomains });

  return server;
}
