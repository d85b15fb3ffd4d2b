import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createServer, type IncomingHttpHeaders, type Server, type ServerResponse } from 'http';
import { buildTicketQuery, classifyHttpError, toSearchResult, ZammadApiClient } from '../ZammadApiClient.js';
import {
  RemoteAuthError,
  RemoteNotFoundError,
  RemotePermissionError,
  RemoteTimeoutError,
  RemoteUnavailableError,
  ZammadApiError
} from '../../errors/ZammadApiError.js';
import type { ZammadAuth } from '../types/ApiResponseTypes.js';

interface RecordedRequest {
  method: string;
  path: string;
  query: URLSearchParams;
  headers: IncomingHttpHeaders;
  body: string;
}

type Responder = (req: RecordedRequest, res: ServerResponse) => void;

function json(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

describe('ZammadApiClient', () => {
  let server: Server;
  let baseUrl: string;
  let requests: RecordedRequest[];
  let respond: Responder;
  const clients: ZammadApiClient[] = [];

  function client(auth: ZammadAuth = { type: 'token', token: 'test-secret' }, timeoutMs?: number): ZammadApiClient {
    const instance = new ZammadApiClient({ baseUrl, auth, timeoutMs });
    clients.push(instance);
    return instance;
  }

  beforeEach(async () => {
    requests = [];
    respond = (_req, res) => json(res, 200, []);
    server = createServer((req, res) => {
      const chunks: Buffer[] = [];
      req.on('data', (chunk: Buffer) => chunks.push(chunk));
      req.on('end', () => {
        const url = new URL(req.url ?? '/', 'http://localhost');
        const recorded: RecordedRequest = {
          method: req.method ?? '',
          path: url.pathname,
          query: url.searchParams,
          headers: req.headers,
          body: Buffer.concat(chunks).toString('utf8')
        };
        requests.push(recorded);
        respond(recorded, res);
      });
    });
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('test server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}/api/v1/`;
  });

  afterEach(async () => {
    clients.splice(0).forEach(instance => instance.destroy());
    server.closeAllConnections();
    await new Promise<void>(resolve => server.close(() => resolve()));
  });

  it('sends token authentication and the combined search query', async () => {
    respond = (_req, res) => json(res, 200, { tickets: [{ id: 1 }], tickets_count: 7 });

    const result = await client().searchTickets({ query: 'printer', state: 'open', page: 2, perPage: 10 });

    expect(result).toEqual({ items: [{ id: 1 }], total: 7 });
    const [request] = requests;
    expect(request?.method).toBe('GET');
    expect(request?.path).toBe('/api/v1/tickets/search');
    expect(request?.query.get('query')).toBe('printer AND state.name:"open"');
    expect(request?.query.get('page')).toBe('2');
    expect(request?.query.get('per_page')).toBe('10');
    expect(request?.query.get('expand')).toBe('true');
    expect(request?.headers.authorization).toBe('Token token=test-secret');
    expect(request?.headers['user-agent']).toBe('zammad-mcp-server/1.0.0');
  });

  it('lists tickets without a query when no filter is given', async () => {
    respond = (_req, res) => json(res, 200, [{ id: 1 }, { id: 2 }]);

    const result = await client().searchTickets({ page: 1, perPage: 25 });

    expect(result).toEqual({ items: [{ id: 1 }, { id: 2 }], total: null });
    expect(requests[0]?.path).toBe('/api/v1/tickets');
    expect(requests[0]?.query.has('query')).toBe(false);
  });

  it('uses bearer and basic authentication headers', async () => {
    await client({ type: 'oauth2', token: 'test-oauth' }).getGroups();
    await client({ type: 'basic', username: 'agent', password: 'test-password' }).getGroups();

    expect(requests[0]?.headers.authorization).toBe('Bearer test-oauth');
    expect(requests[1]?.headers.authorization).toBe(`Basic ${Buffer.from('agent:test-password').toString('base64')}`);
  });

  it('creates a ticket with its first article', async () => {
    respond = (_req, res) => json(res, 201, { id: 9 });

    const created = await client().createTicket({
      title: 'VPN down',
      group: 'Users',
      customer: 'nicole@example.com',
      article_body: 'It broke',
      state: 'new',
      priority: '2 normal',
      article_type: 'note',
      article_internal: false
    });

    expect(created).toEqual({ id: 9 });
    expect(requests[0]?.method).toBe('POST');
    expect(requests[0]?.headers['content-type']).toBe('application/json');
    expect(JSON.parse(requests[0]?.body ?? '')).toEqual({
      title: 'VPN down',
      group: 'Users',
      customer: 'nicole@example.com',
      state: 'new',
      priority: '2 normal',
      article: { subject: 'VPN down', body: 'It broke', type: 'note', internal: false }
    });
  });

  it('sends only the fields being updated', async () => {
    respond = (_req, res) => json(res, 200, { id: 3 });

    await client().updateTicket({ ticket_id: 3, state: 'closed' });

    expect(requests[0]?.method).toBe('PUT');
    expect(requests[0]?.path).toBe('/api/v1/tickets/3');
    expect(JSON.parse(requests[0]?.body ?? '')).toEqual({ state: 'closed' });
  });

  it('returns attachment bytes unchanged', async () => {
    const bytes = Buffer.from([0, 255, 1, 254]);
    respond = (_req, res) => {
      res.writeHead(200, { 'Content-Type': 'application/octet-stream' });
      res.end(bytes);
    };

    const content = await client().downloadAttachment(3, 10, 900);

    expect(content.equals(bytes)).toBe(true);
    expect(requests[0]?.path).toBe('/api/v1/ticket_attachment/3/10/900');
  });

  it('keeps only string tags', async () => {
    respond = (_req, res) => json(res, 200, { tags: ['vip', 3, 'urgent'] });

    await expect(client().getTicketTags(3)).resolves.toEqual(['vip', 'urgent']);
    expect(requests[0]?.query.get('object')).toBe('Ticket');
    expect(requests[0]?.query.get('o_id')).toBe('3');
  });

  it('removes a tag with a DELETE body', async () => {
    respond = (_req, res) => json(res, 200, true);

    await client().removeTicketTag(3, 'vip');

    expect(requests[0]?.method).toBe('DELETE');
    expect(requests[0]?.path).toBe('/api/v1/tags/remove');
    expect(JSON.parse(requests[0]?.body ?? '')).toEqual({ object: 'Ticket', o_id: 3, item: 'vip' });
  });

  it('maps 404 to a not-found error with the remote detail', async () => {
    respond = (_req, res) => json(res, 404, { error: "Couldn't find Ticket with 'id'=9" });

    const failure = client().getTicket(9);

    await expect(failure).rejects.toBeInstanceOf(RemoteNotFoundError);
    await expect(failure).rejects.toThrow("Not found (404) for GET /tickets/9: Couldn't find Ticket with 'id'=9");
    await expect(failure).rejects.toMatchObject({ path: '/tickets/9' });
  });

  it('maps 401 to an authentication error', async () => {
    respond = (_req, res) => json(res, 401, { error: 'authentication failed' });

    await expect(client().getCurrentUser()).rejects.toBeInstanceOf(RemoteAuthError);
  });

  it('reports invalid JSON bodies', async () => {
    respond = (_req, res) => {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end('{not json');
    };

    await expect(client().getGroups()).rejects.toThrow('Invalid JSON in response to GET /groups');
  });

  it('rejects a reference list that is not a list', async () => {
    respond = (_req, res) => json(res, 200, { id: 1 });

    await expect(client().getTicketStates()).rejects.toThrow('Unexpected response for ticket states: expected a list');
  });

  it('times out requests that get no response', async () => {
    respond = () => undefined;

    const failure = client({ type: 'token', token: 'test-secret' }, 50).getGroups();

    await expect(failure).rejects.toBeInstanceOf(RemoteTimeoutError);
    await expect(failure).rejects.toThrow('Request timed out after 50 ms (GET /groups)');
  });

  it('reports unreachable servers as unavailable', async () => {
    const unreachable = client();
    server.closeAllConnections();
    await new Promise<void>(resolve => server.close(() => resolve()));
    server = createServer();
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));

    await expect(unreachable.getGroups()).rejects.toBeInstanceOf(RemoteUnavailableError);
  });
});

describe('buildTicketQuery', () => {
  it('returns null when nothing narrows the search', () => {
    expect(buildTicketQuery({ query: '  ', page: 1, perPage: 25 })).toBeNull();
  });

  it('quotes field filters and joins them with AND', () => {
    expect(buildTicketQuery({
      query: 'vpn',
      group: 'Second Level',
      owner: 'agent',
      customer: 'nicole@example.com',
      priority: '3 high',
      page: 1,
      perPage: 25
    })).toBe(
      'vpn AND priority.name:"3 high" AND group.name:"Second Level" AND owner.login:"agent" AND customer.email:"nicole@example.com"'
    );
  });

  it('escapes quotes inside filter values', () => {
    expect(buildTicketQuery({ state: 'say "hi"', page: 1, perPage: 25 })).toBe('state.name:"say \\"hi\\""');
  });
});

describe('toSearchResult', () => {
  it('accepts a bare list with an unknown total', () => {
    expect(toSearchResult([{ id: 1 }], 'users')).toEqual({ items: [{ id: 1 }], total: null });
  });

  it('reads the count next to the list', () => {
    expect(toSearchResult({ users: [], users_count: 0 }, 'users')).toEqual({ items: [], total: 0 });
    expect(toSearchResult({ users: [{ id: 1 }], users_count: -1 }, 'users')).toEqual({ items: [{ id: 1 }], total: null });
  });

  it('rejects other shapes', () => {
    expect(() => toSearchResult({ users: 'none' }, 'users')).toThrow('Unexpected response for users search: expected a list');
  });
});

describe('classifyHttpError', () => {
  it('maps status codes onto error kinds', () => {
    expect(classifyHttpError(403, '{"error":"Not authorized"}', 'GET', '/groups')).toBeInstanceOf(RemotePermissionError);
    expect(classifyHttpError(504, '', 'GET', '/groups')).toBeInstanceOf(RemoteTimeoutError);
    expect(classifyHttpError(503, '<html>down</html>', 'GET', '/groups')).toBeInstanceOf(RemoteUnavailableError);
  });

  it('treats a "couldn\'t find" detail as not found', () => {
    const error = classifyHttpError(422, '{"error":"Couldn\'t find Group"}', 'POST', '/tickets');

    expect(error).toBeInstanceOf(RemoteNotFoundError);
    expect(error.statusCode).toBe(422);
  });

  it('prefers the human-readable detail', () => {
    const error = classifyHttpError(422, '{"error":"invalid","error_human":"Title is required"}', 'POST', '/tickets');

    expect(error.message).toBe('Zammad API error (422) for POST /tickets: Title is required');
    expect(error.kind).toBe('rejected');
  });

  it('keeps a short plain-text detail and drops HTML pages', () => {
    expect(classifyHttpError(500, 'boom', 'GET', '/groups').message).toBe('Zammad API error (500) for GET /groups: boom');
    expect(classifyHttpError(500, '<html>error</html>', 'GET', '/groups').message).toBe('Zammad API error (500) for GET /groups');
    expect(classifyHttpError(500, '', 'GET', '/groups')).toBeInstanceOf(ZammadApiError);
  });
});
