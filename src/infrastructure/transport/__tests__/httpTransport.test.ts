import { describe, it, expect, afterEach } from 'vitest';
import type { Server } from 'http';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import { closeHttpServer, startHttpTransport } from '../httpTransport.js';
import { memoryLogger } from '../../../__tests__/helpers/FakeZammadClient.js';

describe('startHttpTransport', () => {
  let httpServer: Server | null = null;

  afterEach(async () => {
    if (httpServer) {
      await closeHttpServer(httpServer);
      httpServer = null;
    }
  });

  async function start(): Promise<{ url: string; lines: string[] }> {
    const { logger, lines } = memoryLogger('info');
    httpServer = await startHttpTransport({
      host: '127.0.0.1',
      port: 0,
      logger,
      createServer: () => new McpServer({ name: 'test-server', version: '0.0.0' })
    });
    const address = httpServer.address();
    if (address === null || typeof address === 'string') {
      throw new Error('test server is not listening on a TCP port');
    }
    return { url: `http://127.0.0.1:${address.port}`, lines };
  }

  it('answers unknown paths with a JSON-RPC error', async () => {
    const { url } = await start();

    const response = await fetch(`${url}/other`, { method: 'POST' });

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({
      jsonrpc: '2.0',
      error: { code: -32000, message: 'Not found: use /mcp' },
      id: null
    });
  });

  it('accepts only POST on the MCP path', async () => {
    const { url } = await start();

    const response = await fetch(`${url}/mcp`);

    expect(response.status).toBe(405);
    expect(await response.json()).toEqual({
      jsonrpc: '2.0',
      error: { code: -32000, message: 'Method not allowed.' },
      id: null
    });
  });

  it('logs where it listens', async () => {
    const { url, lines } = await start();

    expect(lines[0]?.endsWith(`MCP HTTP transport listening on ${url}/mcp`)).toBe(true);
  });

  it('serves an initialize request', async () => {
    const { url } = await start();

    const response = await fetch(`${url}/mcp`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Accept: 'application/json, text/event-stream' },
      body: JSON.stringify({
        jsonrpc: '2.0',
        id: 1,
        method: 'initialize',
        params: {
          protocolVersion: '2025-03-26',
          capabilities: {},
          clientInfo: { name: 'test-client', version: '0.0.0' }
        }
      })
    });

    expect(response.status).toBe(200);
    const body: unknown = await response.json();
    expect(body).toMatchObject({ jsonrpc: '2.0', id: 1, result: { serverInfo: { name: 'test-server', version: '0.0.0' } } });
  });
});
