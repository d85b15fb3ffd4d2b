import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'http';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';

import type { Log } from '../logging/Logger.js';

export const MCP_PATH = '/mcp';

export interface HttpTransportOptions {
  readonly host: string;
  readonly port: number;
  readonly logger: Log;
  /** Called once per request; the returned server is closed with the response */
  readonly createServer: () => McpServer;
}

function sendJsonRpcError(res: ServerResponse, status: number, message: string): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify({ jsonrpc: '2.0', error: { code: -32000, message }, id: null }));
}

/**
 * Stateless Streamable HTTP: every POST to /mcp gets a fresh server and
 * transport, torn down when the response closes.
 */
async function handleRequest(req: IncomingMessage, res: ServerResponse, options: HttpTransportOptions): Promise<void> {
  const { pathname } = new URL(req.url ?? '/', 'http://localhost');
  if (pathname !== MCP_PATH) {
    sendJsonRpcError(res, 404, `Not found: use ${MCP_PATH}`);
    return;
  }
  if (req.method !== 'POST') {
    sendJsonRpcError(res, 405, 'Method not allowed.');
    return;
  }

  const server = options.createServer();
  const transport = new StreamableHTTPServerTransport({
    sessionIdGenerator: undefined,
    enableJsonResponse: true
  });

  res.on('close', () => {
    Promise.all([transport.close(), server.close()]).catch(error => {
      options.logger.warn('Failed to close MCP request context', error);
    });
  });

  await server.connect(transport);
  await transport.handleRequest(req, res);
}

/**
 * Listen on host:port and serve MCP requests on /mcp
 */
export async function startHttpTransport(options: HttpTransportOptions): Promise<Server> {
  const httpServer = createServer((req, res) => {
    handleRequest(req, res, options).catch(error => {
      options.logger.error('Error handling MCP request', error);
      if (!res.headersSent) {
        sendJsonRpcError(res, 500, 'Internal server error');
      }
    });
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(options.port, options.host, () => {
      httpServer.off('error', reject);
      resolve();
    });
  });

  const address = httpServer.address();
  const port = address !== null && typeof address !== 'string' ? address.port : options.port;
  options.logger.info(`MCP HTTP transport listening on http://${options.host}:${port}${MCP_PATH}`);
  return httpServer;
}

export function closeHttpServer(httpServer: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    httpServer.close(error => (error ? reject(error) : resolve()));
    httpServer.closeAllConnections();
  });
}
