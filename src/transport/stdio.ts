import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { logger } from '../shared/logger.js';
import type { RunningTransport, ServerFactory } from './types.js';

export async function startStdioTransport(createServer: ServerFactory): Promise<RunningTransport> {
  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info('MCP server running on stdio');
  return {
    description: 'stdio',
    close: () => server.close(),
  };
}
