import https from 'https';
import http from 'http';
import { API_TIMEOUT_MS, SERVER_NAME, SERVER_VERSION } from '../../constants.js';
import { isJsonObject } from '../../core/entities/Json.js';
import type {
  IZammadClient,
  SearchResult,
  TicketSearchQuery,
  UserSearchQuery
} from '../../core/repositories/IZammadClient.js';
import type { ArticleCreate, TicketCreate, TicketUpdate } from '../../core/entities/Inputs.js';
import { toApiAttachment } from '../../utils/attachments.js';
import type { Log } from '../logging/Logger.js';
import {
  RemoteAuthError,
  RemoteNotFoundError,
  RemotePermissionError,
  RemoteTimeoutError,
  RemoteUnavailableError,
  ZammadApiError
} from '../errors/ZammadApiError.js';
import type {
  CreateArticleRequest,
  CreateTicketRequest,
  ErrorResponse,
  TagRequest,
  UpdateTicketRequest,
  ZammadAuth
} from './types/ApiResponseTypes.js';

export interface ZammadClientOptions {
  /** API base including the version, e.g. https://support.example.com/api/v1 */
  readonly baseUrl: string;
  readonly auth: ZammadAuth;
  readonly timeoutMs?: number;
  readonly rejectUnauthorized?: boolean;
  readonly logger?: Log;
}

type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

type QueryParams = Record<string, string | number | boolean | undefined>;

interface RawResponse {
  readonly statusCode: number;
  readonly body: Buffer;
}

const MAX_ERROR_DETAIL_LENGTH = 200;

/**
 * Zammad API Client
 * Handles HTTP communication with the Zammad REST API.
 *
 * One instance per process; the keep-alive agent pools connections
 * across calls until {@link destroy}.
 */
export class ZammadApiClient implements IZammadClient {
  private readonly baseUrl: URL;
  private readonly authorization: string;
  private readonly timeoutMs: number;
  private readonly agent: http.Agent;
  private readonly logger: Log | undefined;

  constructor(options: ZammadClientOptions) {
    this.baseUrl = new URL(options.baseUrl.replace(/\/+$/, ''));
    this.authorization = authorizationHeader(options.auth);
    this.timeoutMs = options.timeoutMs ?? API_TIMEOUT_MS;
    this.logger = options.logger;
    this.agent = this.baseUrl.protocol === 'https:'
      ? new https.Agent({ keepAlive: true, rejectUnauthorized: options.rejectUnauthorized ?? true })
      : new http.Agent({ keepAlive: true });
  }

  // ==========================================================================
  // Tickets
  // ==========================================================================

  /**
   * Search tickets
   * GET /tickets/search (or GET /tickets when no filter is given)
   */
  async searchTickets(params: TicketSearchQuery): Promise<SearchResult> {
    const query = buildTicketQuery(params);
    const paging = { page: params.page, per_page: params.perPage, expand: true };

    if (query === null) {
      const body = await this.requestJson('GET', '/tickets', paging);
      return toSearchResult(body, 'tickets');
    }

    const body = await this.requestJson('GET', '/tickets/search', { ...paging, query });
    return toSearchResult(body, 'tickets');
  }

  /**
   * GET /tickets/{id}
   */
  async getTicket(ticketId: number): Promise<unknown> {
    return this.requestJson('GET', `/tickets/${ticketId}`, { expand: true });
  }

  /**
   * All articles of a ticket, oldest first
   * GET /ticket_articles/by_ticket/{id}
   */
  async getTicketArticles(ticketId: number): Promise<readonly unknown[]> {
    const body = await this.requestJson('GET', `/ticket_articles/by_ticket/${ticketId}`, { expand: true });
    return expectList(body, 'ticket articles');
  }

  /**
   * POST /tickets with the first article
   */
  async createTicket(input: TicketCreate): Promise<unknown> {
    const body: CreateTicketRequest = {
      title: input.title,
      group: input.group,
      customer: input.customer,
      state: input.state,
      priority: input.priority,
      article: {
        subject: input.title,
        body: input.article_body,
        type: input.article_type,
        internal: input.article_internal
      }
    };
    return this.requestJson('POST', '/tickets', { expand: true }, body);
  }

  /**
   * PUT /tickets/{id}; only the fields present are sent
   */
  async updateTicket(update: TicketUpdate): Promise<unknown> {
    const body: UpdateTicketRequest = {};
    if (update.title !== undefined) body.title = update.title;
    if (update.state !== undefined) body.state = update.state;
    if (update.priority !== undefined) body.priority = update.priority;
    if (update.owner !== undefined) body.owner = update.owner;
    if (update.group !== undefined) body.group = update.group;
    if (update.pending_time !== undefined) body.pending_time = update.pending_time;

    return this.requestJson('PUT', `/tickets/${update.ticket_id}`, { expand: true }, body);
  }

  // ==========================================================================
  // Articles & attachments
  // ==========================================================================

  /**
   * POST /ticket_articles
   */
  async addArticle(input: ArticleCreate): Promise<unknown> {
    const body: CreateArticleRequest = {
      ticket_id: input.ticket_id,
      body: input.body,
      type: input.type,
      internal: input.internal,
      sender: input.sender,
      content_type: input.content_type
    };
    if (input.attachments.length > 0) {
      body.attachments = input.attachments.map(toApiAttachment);
    }
    return this.requestJson('POST', '/ticket_articles', { expand: true }, body);
  }

  /**
   * GET /ticket_articles/{id}
   */
  async getArticle(articleId: number): Promise<unknown> {
    return this.requestJson('GET', `/ticket_articles/${articleId}`, { expand: true });
  }

  /**
   * Raw attachment content
   * GET /ticket_attachment/{ticket}/{article}/{attachment}
   */
  async downloadAttachment(ticketId: number, articleId: number, attachmentId: number): Promise<Buffer> {
    const response = await this.request('GET', `/ticket_attachment/${ticketId}/${articleId}/${attachmentId}`);
    return response.body;
  }

  /**
   * DELETE /ticket_attachment/{ticket}/{article}/{attachment}
   */
  async deleteAttachment(ticketId: number, articleId: number, attachmentId: number): Promise<void> {
    await this.request('DELETE', `/ticket_attachment/${ticketId}/${articleId}/${attachmentId}`);
  }

  // ==========================================================================
  // Tags
  // ==========================================================================

  /**
   * GET /tags?object=Ticket&o_id={id}
   */
  async getTicketTags(ticketId: number): Promise<string[]> {
    const body = await this.requestJson('GET', '/tags', { object: 'Ticket', o_id: ticketId });
    const tags = isJsonObject(body) ? body.tags : undefined;
    if (!Array.isArray(tags)) {
      throw new ZammadApiError(null, 'Unexpected response for ticket tags: missing "tags" list');
    }
    return tags.filter((tag): tag is string => typeof tag === 'string');
  }

  async addTicketTag(ticketId: number, tag: string): Promise<void> {
    const body: TagRequest = { object: 'Ticket', o_id: ticketId, item: tag };
    await this.request('POST', '/tags/add', {}, body);
  }

  async removeTicketTag(ticketId: number, tag: string): Promise<void> {
    const body: TagRequest = { object: 'Ticket', o_id: ticketId, item: tag };
    await this.request('DELETE', '/tags/remove', {}, body);
  }

  // ==========================================================================
  // Users & organizations
  // ==========================================================================

  async getUser(userId: number): Promise<unknown> {
    return this.requestJson('GET', `/users/${userId}`, { expand: true });
  }

  async searchUsers(params: UserSearchQuery): Promise<SearchResult> {
    const body = await this.requestJson('GET', '/users/search', {
      query: params.query,
      page: params.page,
      per_page: params.perPage,
      expand: true
    });
    return toSearchResult(body, 'users');
  }

  /**
   * The user the credentials belong to
   * GET /users/me
   */
  async getCurrentUser(): Promise<unknown> {
    return this.requestJson('GET', '/users/me', { expand: true });
  }

  async getOrganization(organizationId: number): Promise<unknown> {
    return this.requestJson('GET', `/organizations/${organizationId}`, { expand: true });
  }

  async searchOrganizations(params: UserSearchQuery): Promise<SearchResult> {
    const body = await this.requestJson('GET', '/organizations/search', {
      query: params.query,
      page: params.page,
      per_page: params.perPage,
      expand: true
    });
    return toSearchResult(body, 'organizations');
  }

  // ==========================================================================
  // Reference data
  // ==========================================================================

  async getGroups(): Promise<readonly unknown[]> {
    return expectList(await this.requestJson('GET', '/groups', { expand: true }), 'groups');
  }

  async getTicketStates(): Promise<readonly unknown[]> {
    return expectList(await this.requestJson('GET', '/ticket_states', { expand: true }), 'ticket states');
  }

  async getTicketPriorities(): Promise<readonly unknown[]> {
    return expectList(await this.requestJson('GET', '/ticket_priorities', { expand: true }), 'ticket priorities');
  }

  destroy(): void {
    this.agent.destroy();
  }

  // ==========================================================================
  // Transport
  // ==========================================================================

  private async requestJson(method: HttpMethod, path: string, query: QueryParams = {}, body?: object): Promise<unknown> {
    const response = await this.request(method, path, query, body);
    const text = response.body.toString('utf8').trim();
    if (text === '') {
      return null;
    }
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch {
      throw new ZammadApiError(response.statusCode, `Invalid JSON in response to ${method} ${path}`);
    }
  }

  /**
   * Make HTTP request to Zammad API
   */
  private request(method: HttpMethod, path: string, query: QueryParams = {}, body?: object): Promise<RawResponse> {
    const url = new URL(`${this.baseUrl.pathname.replace(/\/+$/, '')}${path}`, this.baseUrl);
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) {
        url.searchParams.append(key, String(value));
      }
    }

    const payload = body === undefined ? undefined : JSON.stringify(body);
    const headers: http.OutgoingHttpHeaders = {
      Authorization: this.authorization,
      Accept: 'application/json',
      'User-Agent': `${SERVER_NAME}/${SERVER_VERSION}`
    };
    if (payload !== undefined) {
      headers['Content-Type'] = 'application/json';
      headers['Content-Length'] = Buffer.byteLength(payload);
    }

    this.logger?.debug(`${method} ${url.pathname}${url.search}`);

    return new Promise<RawResponse>((resolve, reject) => {
      const onResponse = (res: http.IncomingMessage): void => {
        const chunks: Buffer[] = [];

        res.on('data', (chunk: Buffer) => {
          chunks.push(chunk);
        });

        res.on('error', error => {
          reject(new RemoteUnavailableError(`Response stream failed: ${error.message}`));
        });

        res.on('end', () => {
          const statusCode = res.statusCode ?? 500;
          const responseBody = Buffer.concat(chunks);

          if (statusCode >= 200 && statusCode < 300) {
            resolve({ statusCode, body: responseBody });
            return;
          }

          reject(classifyHttpError(statusCode, responseBody.toString('utf8'), method, path));
        });
      };

      const options: http.RequestOptions = { method, headers, agent: this.agent };
      const req = url.protocol === 'https:'
        ? https.request(url, options, onResponse)
        : http.request(url, options, onResponse);

      req.setTimeout(this.timeoutMs, () => {
        req.destroy(new RemoteTimeoutError(`Request timed out after ${this.timeoutMs} ms (${method} ${path})`, this.timeoutMs));
      });

      req.on('error', error => {
        if (error instanceof ZammadApiError) {
          reject(error);
          return;
        }
        reject(new RemoteUnavailableError(`Request failed: ${error.message}`));
      });

      if (payload !== undefined) {
        req.write(payload);
      }
      req.end();
    });
  }
}

function authorizationHeader(auth: ZammadAuth): string {
  switch (auth.type) {
    case 'token':
      return `Token token=${auth.token}`;
    case 'oauth2':
      return `Bearer ${auth.token}`;
    case 'basic':
      return `Basic ${Buffer.from(`${auth.username}:${auth.password}`).toString('base64')}`;
  }
}

function quote(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/**
 * Combine free text and field filters into one Zammad search query.
 * Returns null when nothing narrows the search.
 */
export function buildTicketQuery(params: TicketSearchQuery): string | null {
  const parts: string[] = [];
  if (params.query && params.query.trim() !== '') parts.push(params.query.trim());
  if (params.state) parts.push(`state.name:${quote(params.state)}`);
  if (params.priority) parts.push(`priority.name:${quote(params.priority)}`);
  if (params.group) parts.push(`group.name:${quote(params.group)}`);
  if (params.owner) parts.push(`owner.login:${quote(params.owner)}`);
  if (params.customer) parts.push(`customer.email:${quote(params.customer)}`);
  return parts.length > 0 ? parts.join(' AND ') : null;
}

/**
 * Accept either a bare list (total unknown) or `{<key>: [...], <key>_count: n}`
 */
export function toSearchResult(body: unknown, key: string): SearchResult {
  if (Array.isArray(body)) {
    return { items: body, total: null };
  }
  if (isJsonObject(body)) {
    const items = body[key];
    const count = body[`${key}_count`];
    if (Array.isArray(items)) {
      return { items, total: typeof count === 'number' && Number.isSafeInteger(count) && count >= 0 ? count : null };
    }
  }
  throw new ZammadApiError(null, `Unexpected response for ${key} search: expected a list`);
}

function expectList(body: unknown, what: string): readonly unknown[] {
  if (!Array.isArray(body)) {
    throw new ZammadApiError(null, `Unexpected response for ${what}: expected a list`);
  }
  return body;
}

function parseErrorBody(text: string): ErrorResponse {
  try {
    const parsed: unknown = JSON.parse(text);
    if (isJsonObject(parsed)) {
      return {
        error: typeof parsed.error === 'string' ? parsed.error : undefined,
        error_human: typeof parsed.error_human === 'string' ? parsed.error_human : undefined
      };
    }
    return {};
  } catch {
    // Plain-text or HTML error page
    const trimmed = text.trim();
    return trimmed === '' || trimmed.startsWith('<') ? {} : { error: trimmed.slice(0, MAX_ERROR_DETAIL_LENGTH) };
  }
}

/**
 * Map a failed response onto the error taxonomy
 */
export function classifyHttpError(statusCode: number, text: string, method: string, path: string): ZammadApiError {
  const parsed = parseErrorBody(text);
  const detail = parsed.error_human ?? parsed.error;
  const suffix = detail ? `: ${detail}` : '';
  const request = `${method} ${path}`;

  if (statusCode === 401) {
    return new RemoteAuthError(`Authentication failed (401) for ${request}`);
  }
  if (statusCode === 403) {
    return new RemotePermissionError(`Permission denied (403) for ${request}${suffix}`);
  }
  if (statusCode === 404 || (detail !== undefined && /couldn't find|not found/i.test(detail))) {
    return new RemoteNotFoundError(`Not found (${statusCode}) for ${request}${suffix}`, statusCode, path);
  }
  if (statusCode === 408 || statusCode === 504) {
    return new RemoteTimeoutError(`Remote timeout (${statusCode}) for ${request}`, null, statusCode);
  }
  if (statusCode === 502 || statusCode === 503) {
    return new RemoteUnavailableError(`Zammad unavailable (${statusCode}) for ${request}`, statusCode);
  }
  return new ZammadApiError(statusCode, `Zammad API error (${statusCode}) for ${request}${suffix}`);
}
