// HTTP + Server-Sent Events transport. GET /sse opens a session backed by its own
// MCP server instance; the client then POSTs JSON-RPC messages to
// /message?sessionId=<id>. Closing the SSE stream closes that session's server.
import http from 'node:http';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js';
import { logger } from '../shared/logger.js';
import type { RunningTransport, ServerFactory } from './types.js';

export const SSE_PATH = '/sse';
export const MESSAGE_PATH = '/message';

export interface SseOptions {
  hostname: string;
  port: number;
}

export interface RunningSseTransport extends RunningTransport {
  /** Bound port; differs from the requested one when that was 0. */
  readonly port: number;
}

interface SseSession {
  transport: SSEServerTransport;
  server: Server;
}

export async function startSseTransport(
  createServer: ServerFactory,
  options: SseOptions
): Promise<RunningSseTransport> {
  const sessions = new Map<string, SseSession>();

  const httpServer = http.createServer((req, res) => {
    handleRequest(req, res).catch((err: unknown) => {
      logger.error({ error: err instanceof Error ? err.message : String(err) }, 'SSE request failed');
      if (!res.headersSent) {
        res.statusCode = 500;
        res.end('Internal error');
      }
    });
  });

  async function handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);

    if (req.method === 'GET' && url.pathname === SSE_PATH) {
      const transport = new SSEServerTransport(MESSAGE_PATH, res);
      const server = createServer();
      const sessionId = transport.sessionId;
      sessions.set(sessionId, { transport, server });
      transport.onclose = () => {
        sessions.delete(sessionId);
        logger.info({ sessionId }, 'SSE session closed');
      };
      await server.connect(transport);
      logger.info({ sessionId }, 'SSE session opened');
      return;
    }

    if (req.method === 'POST' && url.pathname === MESSAGE_PATH) {
      const sessionId = url.searchParams.get('sessionId');
      const session = sessionId === null ? undefined : sessions.get(sessionId);
      if (!session) {
        res.statusCode = 404;
        res.end('Unknown session');
        return;
      }
      await session.transport.handlePostMessage(req, res);
      return;
    }

    res.statusCode = 404;
    res.end('Not found');
  }

  await new Promise<void>((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(options.port, options.hostname, () => {
      httpServer.off('error', reject);
      resolve();
    });
  });
  httpServer.on('error', err => {
    logger.error({ error: err.message }, 'SSE server error');
  });

  const address = httpServer.address();
  const port = typeof address === 'object' && address !== null ? address.port : options.port;
  const base = `http://${options.hostname}:${port}`;
  return {
    port,
    description: `SSE endpoint ${base}${SSE_PATH}, message endpoint ${base}${MESSAGE_PATH}`,
    close: async () => {
      for (const session of [...sessions.values()]) {
        await session.server.close();
      }
      sessions.clear();
      await new Promise<void>((resolve, reject) => {
        httpServer.close(err => (err ? reject(err) : resolve()));
        // Every session is closed; keep-alive sockets would otherwise hold close() open.
        httpServer.closeAllConnections();
      });
    },
  };
}
