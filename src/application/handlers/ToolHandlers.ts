import {
  DOWNLOAD_CHUNK_BYTES,
  MAX_TICKETS_PER_STATE_IN_QUEUE,
  QUEUE_TICKETS_PER_PAGE,
  RESOURCE_ARTICLE_LIMIT
} from '../../constants.js';
import {
  AddArticleInputSchema,
  ClearCachesInputSchema,
  CreateTicketInputSchema,
  DeleteAttachmentInputSchema,
  DownloadAttachmentInputSchema,
  FormatOnlyInputSchema,
  GetArticleAttachmentsInputSchema,
  GetOrganizationInputSchema,
  GetTicketInputSchema,
  GetTicketStatsInputSchema,
  GetTicketTagsInputSchema,
  GetUserInputSchema,
  ResponseFormat,
  SearchOrganizationsInputSchema,
  SearchTicketsInputSchema,
  SearchUsersInputSchema,
  TicketTagInputSchema,
  UpdateTicketInputSchema
} from '../../schemas/index.js';
import type { IZammadClient, SearchResult } from '../../core/repositories/IZammadClient.js';
import type { ReferenceDataService } from '../../core/services/ReferenceDataService.js';
import type { TicketStatsService } from '../../core/services/TicketStatsService.js';
import { nested, validate, validateList, type ValidatedKind, type ValidatedMap, type ValidateOptions } from '../../core/validation/EntityValidator.js';
import { parseFields } from '../../core/validation/fieldErrors.js';
import { displayName } from '../../core/normalization/FieldNormalizer.js';
import { completeList, paginate } from '../../core/pagination/Paginator.js';
import { entity, type Entity, type EntityKind } from '../../core/entities/Entity.js';
import { isJsonObject } from '../../core/entities/Json.js';
import type { Ticket } from '../../core/entities/Ticket.js';
import { ValidationError } from '../../infrastructure/errors/ValidationError.js';
import { AttachmentDownloadError } from '../../infrastructure/errors/AttachmentDownloadError.js';
import type { Log } from '../../infrastructure/logging/Logger.js';
import { formatRecord, formatResponse, type ResponsePayload } from '../formatters/ResponseFormatter.js';
import { truncateResponse } from '../formatters/Truncator.js';
import { formatToolError } from './ErrorFormatter.js';

/** Outcome of one operation: the rendered text and whether it reports a failure */
export interface ToolResult {
  readonly text: string;
  readonly isError: boolean;
}

type RemoteKind = Exclude<ValidatedKind, 'ticket_create' | 'ticket_update' | 'article_create' | 'attachment_upload'>;

/**
 * MCP Tool Handlers
 * Validate arguments, make one Zammad call, shape the result.
 *
 * Every handler resolves; failures come back as `isError` results.
 */
export class ToolHandlers {
  private readonly logger: Log;

  constructor(
    private readonly client: IZammadClient,
    private readonly referenceData: ReferenceDataService,
    private readonly stats: TicketStatsService,
    logger: Log
  ) {
    this.logger = logger.child('Tools');
  }

  // ==========================================================================
  // Tickets
  // ==========================================================================

  searchTickets(args: unknown): Promise<ToolResult> {
    return this.run('Failed to search tickets', args, async () => {
      const input = parseFields(SearchTicketsInputSchema, args);
      const result = await this.client.searchTickets({
        query: input.query,
        state: input.state,
        priority: input.priority,
        group: input.group,
        owner: input.owner,
        customer: input.customer,
        page: input.page,
        perPage: input.per_page
      });
      return this.renderPage('Ticket Search Results', 'ticket', result, input.page, input.per_page, input.response_format);
    });
  }

  getTicket(args: unknown): Promise<ToolResult> {
    return this.run('Failed to get ticket', args, async () => {
      const input = parseFields(GetTicketInputSchema, args);
      let ticket = this.remote('ticket', await this.client.getTicket(input.ticket_id));

      if (input.include_articles) {
        const articles = await this.client.getTicketArticles(input.ticket_id);
        const end = input.article_limit === -1 ? undefined : input.article_offset + input.article_limit;
        ticket = { ...ticket, articles: this.remoteArticles(articles.slice(input.article_offset, end), input.article_offset) };
      }

      return formatResponse({ type: 'entity', entity: entity('ticket', ticket) }, input.response_format);
    });
  }

  createTicket(args: unknown): Promise<ToolResult> {
    return this.run('Failed to create ticket', args, async () => {
      const { response_format, ...fields } = parseFields(CreateTicketInputSchema, args);
      const create = validate('ticket_create', fields);

      const ticket = this.remote('ticket', await this.client.createTicket(create));
      this.logger.info(`Created ticket #${ticket.number} (ID: ${ticket.id})`);

      return formatResponse({ type: 'entity', entity: entity('ticket', ticket) }, response_format);
    });
  }

  updateTicket(args: unknown): Promise<ToolResult> {
    return this.run('Failed to update ticket', args, async () => {
      const { response_format, ...fields } = parseFields(UpdateTicketInputSchema, args);
      const update = validate('ticket_update', fields);

      const ticket = this.remote('ticket', await this.client.updateTicket(update));
      this.logger.info(`Updated ticket #${ticket.number} (ID: ${ticket.id})`);

      return formatResponse({ type: 'entity', entity: entity('ticket', ticket) }, response_format);
    });
  }

  // ==========================================================================
  // Articles & Attachments
  // ==========================================================================

  addArticle(args: unknown): Promise<ToolResult> {
    return this.run('Failed to add article', args, async () => {
      const { response_format, ...fields } = parseFields(AddArticleInputSchema, args);
      const create = validate('article_create', fields);

      const article = this.remote('article', await this.client.addArticle(create));
      this.logger.info(
        `Added ${create.type} article ${article.id} to ticket ${create.ticket_id} with ${create.attachments.length} attachment(s)`
      );

      return formatResponse({ type: 'entity', entity: entity('article', article) }, response_format);
    });
  }

  getArticleAttachments(args: unknown): Promise<ToolResult> {
    return this.run('Failed to get article attachments', args, async () => {
      const input = parseFields(GetArticleAttachmentsInputSchema, args);
      const article = this.remote('article', await this.client.getArticle(input.article_id));

      if (article.ticket_id !== input.ticket_id) {
        throw ValidationError.forField(
          'article_id',
          `article ${input.article_id} belongs to ticket ${article.ticket_id}, not ${input.ticket_id}`
        );
      }

      const attachments = (article.attachments ?? []).map(attachment => entity('attachment', attachment));
      return formatResponse(
        { type: 'page', title: `Attachments of Article ${article.id}`, kind: 'attachment', envelope: completeList(attachments) },
        input.response_format
      );
    });
  }

  downloadAttachment(args: unknown): Promise<ToolResult> {
    return this.run('Failed to download attachment', args, async () => {
      const input = parseFields(DownloadAttachmentInputSchema, args);
      const { ticket_id, article_id, attachment_id } = input;

      const content = await this.client.downloadAttachment(ticket_id, article_id, attachment_id);
      if (content.length > input.max_bytes) {
        throw new AttachmentDownloadError(
          ticket_id,
          article_id,
          attachment_id,
          `attachment is ${content.length} bytes, larger than max_bytes (${input.max_bytes})`
        );
      }
      if (input.chunk_offset > 0 && input.chunk_offset >= content.length) {
        throw ValidationError.forField('chunk_offset', `must be < ${content.length}, got ${input.chunk_offset}`);
      }

      const chunk = content.subarray(input.chunk_offset, input.chunk_offset + DOWNLOAD_CHUNK_BYTES);
      const nextOffset = input.chunk_offset + chunk.length;
      const hasMore = nextOffset < content.length;

      return formatRecord('Attachment Download', {
        ticket_id,
        article_id,
        attachment_id,
        size_bytes: content.length,
        chunk_offset: input.chunk_offset,
        chunk_bytes: chunk.length,
        has_more: hasMore,
        next_chunk_offset: hasMore ? nextOffset : null,
        encoding: 'base64',
        data: chunk.toString('base64')
      }, ResponseFormat.JSON);
    });
  }

  deleteAttachment(args: unknown): Promise<ToolResult> {
    return this.run('Failed to delete attachment', args, async () => {
      const { ticket_id, article_id, attachment_id } = parseFields(DeleteAttachmentInputSchema, args);

      await this.client.deleteAttachment(ticket_id, article_id, attachment_id);
      this.logger.info(`Deleted attachment ${attachment_id} of article ${article_id} (ticket ${ticket_id})`);

      return formatRecord(
        'Attachment Deleted',
        { ticket_id, article_id, attachment_id, deleted: true },
        ResponseFormat.MARKDOWN
      );
    });
  }

  // ==========================================================================
  // Tags
  // ==========================================================================

  addTicketTag(args: unknown): Promise<ToolResult> {
    return this.run('Failed to add tag', args, async () => {
      const input = parseFields(TicketTagInputSchema, args);
      await this.client.addTicketTag(input.ticket_id, input.tag);
      return formatRecord('Tag Added', { ticket_id: input.ticket_id, tag: input.tag, added: true }, input.response_format);
    });
  }

  removeTicketTag(args: unknown): Promise<ToolResult> {
    return this.run('Failed to remove tag', args, async () => {
      const input = parseFields(TicketTagInputSchema, args);
      await this.client.removeTicketTag(input.ticket_id, input.tag);
      return formatRecord('Tag Removed', { ticket_id: input.ticket_id, tag: input.tag, removed: true }, input.response_format);
    });
  }

  getTicketTags(args: unknown): Promise<ToolResult> {
    return this.run('Failed to get ticket tags', args, async () => {
      const input = parseFields(GetTicketTagsInputSchema, args);
      const tags = await this.client.getTicketTags(input.ticket_id);
      return formatRecord(
        `Tags of Ticket ID ${input.ticket_id}`,
        { ticket_id: input.ticket_id, count: tags.length, tags },
        input.response_format
      );
    });
  }

  // ==========================================================================
  // Users & Organizations
  // ==========================================================================

  getUser(args: unknown): Promise<ToolResult> {
    return this.run('Failed to get user', args, async () => {
      const input = parseFields(GetUserInputSchema, args);
      const user = this.remote('user', await this.client.getUser(input.user_id));
      return formatResponse({ type: 'entity', entity: entity('user', user) }, input.response_format);
    });
  }

  searchUsers(args: unknown): Promise<ToolResult> {
    return this.run('Failed to search users', args, async () => {
      const input = parseFields(SearchUsersInputSchema, args);
      const result = await this.client.searchUsers({ query: input.query, page: input.page, perPage: input.per_page });
      return this.renderPage('User Search Results', 'user', result, input.page, input.per_page, input.response_format);
    });
  }

  getCurrentUser(args: unknown): Promise<ToolResult> {
    return this.run('Failed to get current user', args, async () => {
      const input = parseFields(FormatOnlyInputSchema, args);
      const user = this.remote('user', await this.client.getCurrentUser());
      return formatResponse({ type: 'entity', entity: entity('user', user) }, input.response_format);
    });
  }

  getOrganization(args: unknown): Promise<ToolResult> {
    return this.run('Failed to get organization', args, async () => {
      const input = parseFields(GetOrganizationInputSchema, args);
      const organization = this.remote('organization', await this.client.getOrganization(input.org_id));
      return formatResponse({ type: 'entity', entity: entity('organization', organization) }, input.response_format);
    });
  }

  searchOrganizations(args: unknown): Promise<ToolResult> {
    return this.run('Failed to search organizations', args, async () => {
      const input = parseFields(SearchOrganizationsInputSchema, args);
      const result = await this.client.searchOrganizations({ query: input.query, page: input.page, perPage: input.per_page });
      return this.renderPage('Organization Search Results', 'organization', result, input.page, input.per_page, input.response_format);
    });
  }

  // ==========================================================================
  // Reference Data
  // ==========================================================================

  listGroups(args: unknown): Promise<ToolResult> {
    return this.run('Failed to list groups', args, async () => {
      const input = parseFields(FormatOnlyInputSchema, args);
      const groups = await this.referenceData.getGroups();
      return this.renderCatalog('Groups', 'group', groups.map(group => entity('group', group)), input.response_format);
    });
  }

  listTicketStates(args: unknown): Promise<ToolResult> {
    return this.run('Failed to list ticket states', args, async () => {
      const input = parseFields(FormatOnlyInputSchema, args);
      const states = await this.referenceData.getTicketStates();
      return this.renderCatalog('Ticket States', 'state', states.map(state => entity('state', state)), input.response_format);
    });
  }

  listTicketPriorities(args: unknown): Promise<ToolResult> {
    return this.run('Failed to list ticket priorities', args, async () => {
      const input = parseFields(FormatOnlyInputSchema, args);
      const priorities = await this.referenceData.getTicketPriorities();
      return this.renderCatalog(
        'Ticket Priorities',
        'priority',
        priorities.map(priority => entity('priority', priority)),
        input.response_format
      );
    });
  }

  // ==========================================================================
  // Statistics & Maintenance
  // ==========================================================================

  getTicketStats(args: unknown): Promise<ToolResult> {
    return this.run('Failed to get ticket statistics', args, async () => {
      const input = parseFields(GetTicketStatsInputSchema, args);
      const result = await this.stats.collect(input.group);

      const title = input.group ? `Ticket Statistics: ${input.group}` : 'Ticket Statistics';
      return formatRecord(title, {
        group: input.group ?? null,
        ...result.stats,
        pages_scanned: result.pages,
        skipped_tickets: result.skipped,
        complete: !result.capped
      }, input.response_format);
    });
  }

  clearCaches(args: unknown): Promise<ToolResult> {
    return this.run('Failed to clear caches', args, async () => {
      parseFields(ClearCachesInputSchema, args);
      this.referenceData.clearCaches();
      return formatRecord(
        'Caches Cleared',
        { cleared: ['groups', 'ticket_states', 'ticket_priorities'] },
        ResponseFormat.MARKDOWN
      );
    });
  }

  // ==========================================================================
  // Resources
  // ==========================================================================

  /**
   * zammad://ticket/{ticket_id}: the ticket with its first articles
   */
  readTicketResource(ticketId: string): Promise<ToolResult> {
    return this.run('Failed to read ticket resource', { ticket_id: parseResourceId(ticketId) }, async () => {
      const id = requireResourceId('ticket_id', ticketId);
      const ticket = this.remote('ticket', await this.client.getTicket(id));
      const articles = await this.client.getTicketArticles(id);
      const withArticles: Ticket = {
        ...ticket,
        articles: this.remoteArticles(articles.slice(0, RESOURCE_ARTICLE_LIMIT), 0)
      };
      return formatResponse({ type: 'entity', entity: entity('ticket', withArticles) }, ResponseFormat.MARKDOWN);
    });
  }

  readUserResource(userId: string): Promise<ToolResult> {
    return this.run('Failed to read user resource', undefined, async () => {
      const user = this.remote('user', await this.client.getUser(requireResourceId('user_id', userId)));
      return formatResponse({ type: 'entity', entity: entity('user', user) }, ResponseFormat.MARKDOWN);
    });
  }

  readOrganizationResource(orgId: string): Promise<ToolResult> {
    return this.run('Failed to read organization resource', undefined, async () => {
      const organization = this.remote('organization', await this.client.getOrganization(requireResourceId('org_id', orgId)));
      return formatResponse({ type: 'entity', entity: entity('organization', organization) }, ResponseFormat.MARKDOWN);
    });
  }

  /**
   * zammad://queue/{group}: open work of one group, grouped by state
   */
  readQueueResource(group: string): Promise<ToolResult> {
    return this.run('Failed to read queue resource', undefined, async () => {
      const name = decodeURIComponent(group).trim();
      if (name === '') {
        throw ValidationError.forField('group', 'must not be empty');
      }

      const result = await this.client.searchTickets({ group: name, page: 1, perPage: QUEUE_TICKETS_PER_PAGE });
      const tickets = this.remoteList('ticket', result.items);
      return renderQueue(name, tickets);
    });
  }

  // ==========================================================================
  // Plumbing
  // ==========================================================================

  private async run(context: string, args: unknown, operation: () => Promise<string>): Promise<ToolResult> {
    try {
      return { text: truncateResponse(await operation()), isError: false };
    } catch (error) {
      const ticketId = ticketIdOf(args);
      this.logger.debug(`${context}: ${error instanceof Error ? error.message : String(error)}`);
      return {
        text: formatToolError(error, context, this.logger, ticketId === undefined ? {} : { ticketId }),
        isError: true
      };
    }
  }

  private renderPage(
    title: string,
    kind: 'ticket' | 'user' | 'organization',
    result: SearchResult,
    page: number,
    perPage: number,
    format: ResponseFormat
  ): string {
    const items: Entity[] = kind === 'ticket'
      ? this.remoteList('ticket', result.items).map(ticket => entity('ticket', ticket))
      : kind === 'user'
        ? this.remoteList('user', result.items).map(user => entity('user', user))
        : this.remoteList('organization', result.items).map(org => entity('organization', org));

    const payload: ResponsePayload = { type: 'page', title, kind, envelope: paginate(items, page, perPage, result.total) };
    return formatResponse(payload, format);
  }

  private renderCatalog(title: string, kind: EntityKind, items: Entity[], format: ResponseFormat): string {
    return formatResponse({ type: 'page', title, kind, envelope: completeList(items) }, format);
  }

  private remoteOptions(kind: RemoteKind, dropped: Set<string>): ValidateOptions {
    return {
      unknownKeys: 'strip',
      onWarning: message => this.logger.warn(`${kind}: ${message}`),
      onDroppedKeys: (_kind, keys) => keys.forEach(key => dropped.add(key))
    };
  }

  private logDropped(kind: RemoteKind, dropped: ReadonlySet<string>): void {
    if (dropped.size > 0) {
      this.logger.debug(`Ignored ${kind} attributes: ${[...dropped].sort().join(', ')}`);
    }
  }

  /** Validate a remote record, dropping attributes the model does not name */
  private remote<K extends RemoteKind>(kind: K, raw: unknown): ValidatedMap[K] {
    const dropped = new Set<string>();
    const value = validate(kind, raw, this.remoteOptions(kind, dropped));
    this.logDropped(kind, dropped);
    return value;
  }

  /** Articles of a ticket; issues are scoped to `articles[i]` by position in the full list */
  private remoteArticles(raw: readonly unknown[], offset: number): ValidatedMap['article'][] {
    const dropped = new Set<string>();
    const options = this.remoteOptions('article', dropped);
    const articles = raw.map((item, index) => nested(`articles[${offset + index}]`, () => validate('article', item, options)));
    this.logDropped('article', dropped);
    return articles;
  }

  private remoteList<K extends RemoteKind>(kind: K, raw: readonly unknown[]): ValidatedMap[K][] {
    const dropped = new Set<string>();
    const values = validateList(kind, raw, this.remoteOptions(kind, dropped));
    this.logDropped(kind, dropped);
    return values;
  }
}

// ============================================================================
// Helpers
// ============================================================================

function ticketIdOf(args: unknown): number | undefined {
  if (!isJsonObject(args)) {
    return undefined;
  }
  const ticketId = args.ticket_id;
  return typeof ticketId === 'number' && Number.isInteger(ticketId) && ticketId > 0 ? ticketId : undefined;
}

function parseResourceId(value: string): number | null {
  return /^\d+$/.test(value) && Number(value) > 0 ? Number(value) : null;
}

function requireResourceId(field: string, value: string): number {
  const id = parseResourceId(value);
  if (id === null) {
    throw ValidationError.forField(field, `must be a positive integer, got ${JSON.stringify(value)}`);
  }
  return id;
}

function queueLine(ticket: Ticket): string {
  return `- #${ticket.number} (ID: ${ticket.id}): ${ticket.title} | Priority: ${displayName(ticket.priority)} | ` +
    `Customer: ${displayName(ticket.customer)} | Updated: ${ticket.updated_at}`;
}

export function renderQueue(group: string, tickets: readonly Ticket[]): string {
  const lines = [`# Queue: ${group}`, ''];
  if (tickets.length === 0) {
    lines.push('No tickets in this queue.');
    return lines.join('\n');
  }

  lines.push(`Showing ${tickets.length} tickets (first ${QUEUE_TICKETS_PER_PAGE})`);

  const byState = new Map<string, Ticket[]>();
  for (const ticket of tickets) {
    const state = displayName(ticket.state);
    byState.set(state, [...(byState.get(state) ?? []), ticket]);
  }

  for (const [state, stateTickets] of byState) {
    lines.push('', `## ${state} (${stateTickets.length})`);
    lines.push(...stateTickets.slice(0, MAX_TICKETS_PER_STATE_IN_QUEUE).map(queueLine));
    const hidden = stateTickets.length - MAX_TICKETS_PER_STATE_IN_QUEUE;
    if (hidden > 0) {
      lines.push(`... and ${hidden} more`);
    }
  }
  return lines.join('\n');
}
