import { ARTICLE_EXCERPT_LENGTH } from '../../constants.js';
import { ResponseFormat } from '../../schemas/index.js';
import { displayName, fieldToJson } from '../../core/normalization/FieldNormalizer.js';
import { isJsonObject, toJsonValue, type JsonObject, type JsonValue } from '../../core/entities/Json.js';
import type { NormalizedField } from '../../core/entities/NormalizedField.js';
import type { Entity, EntityKind } from '../../core/entities/Entity.js';
import type { Article, Attachment, Ticket } from '../../core/entities/Ticket.js';
import type { Organization, User } from '../../core/entities/User.js';
import type { PaginationEnvelope } from '../../core/pagination/Paginator.js';

/**
 * What an operation hands to the formatter: one entity or one page of them.
 */
export type ResponsePayload =
  | { readonly type: 'entity'; readonly entity: Entity }
  | { readonly type: 'page'; readonly title: string; readonly kind: EntityKind; readonly envelope: PaginationEnvelope<Entity> };

const PLURALS: Readonly<Record<EntityKind, string>> = {
  ticket: 'tickets',
  article: 'articles',
  user: 'users',
  organization: 'organizations',
  group: 'groups',
  state: 'ticket states',
  priority: 'ticket priorities',
  attachment: 'attachments'
};

// ============================================================================
// Structured rendering
// ============================================================================

function plainObject(value: object): JsonObject {
  const converted = toJsonValue(value);
  return isJsonObject(converted) ? converted : {};
}

function attachmentToJson(attachment: Attachment): JsonObject {
  return plainObject(attachment);
}

function articleToJson(article: Article): JsonObject {
  const { created_by, updated_by, attachments, ...rest } = article;
  return {
    ...plainObject(rest),
    created_by: fieldToJson(created_by),
    updated_by: fieldToJson(updated_by),
    ...(attachments ? { attachments: attachments.map(attachmentToJson) } : {})
  };
}

function ticketToJson(ticket: Ticket): JsonObject {
  const { group, state, priority, customer, owner, organization, created_by, updated_by, articles, ...rest } = ticket;
  return {
    ...plainObject(rest),
    group: fieldToJson(group),
    state: fieldToJson(state),
    priority: fieldToJson(priority),
    customer: fieldToJson(customer),
    owner: fieldToJson(owner),
    organization: fieldToJson(organization),
    created_by: fieldToJson(created_by),
    updated_by: fieldToJson(updated_by),
    ...(articles ? { articles: articles.map(articleToJson) } : {})
  };
}

function userToJson(user: User): JsonObject {
  const { organization, created_by, updated_by, ...rest } = user;
  return {
    ...plainObject(rest),
    organization: fieldToJson(organization),
    created_by: fieldToJson(created_by),
    updated_by: fieldToJson(updated_by)
  };
}

function organizationToJson(org: Organization): JsonObject {
  const { created_by, updated_by, members, ...rest } = org;
  return {
    ...plainObject(rest),
    created_by: fieldToJson(created_by),
    updated_by: fieldToJson(updated_by),
    ...(members ? { members: members.map(fieldToJson) } : {})
  };
}

/**
 * Full field set of an entity; relation fields keep the variant that arrived.
 */
export function entityToJson(entity: Entity): JsonObject {
  switch (entity.kind) {
    case 'ticket':
      return ticketToJson(entity.value);
    case 'article':
      return articleToJson(entity.value);
    case 'user':
      return userToJson(entity.value);
    case 'organization':
      return organizationToJson(entity.value);
    case 'attachment':
      return attachmentToJson(entity.value);
    case 'group':
    case 'state':
    case 'priority':
      return plainObject(entity.value);
  }
}

/**
 * Build the structured form without serializing it, so the truncator
 * can work on data rather than text.
 */
export function buildStructured(payload: ResponsePayload): JsonObject {
  if (payload.type === 'entity') {
    return entityToJson(payload.entity);
  }
  const { envelope } = payload;
  return {
    items: envelope.items.map(entityToJson),
    total: envelope.total,
    count: envelope.count,
    page: envelope.page,
    per_page: envelope.per_page,
    offset: envelope.offset,
    has_more: envelope.has_more,
    next_page: envelope.next_page,
    next_offset: envelope.next_offset
  };
}

// ============================================================================
// Readable rendering
// ============================================================================

function isNormalizedField(value: unknown): value is NormalizedField {
  if (!isJsonObject(value)) {
    return false;
  }
  const kind = value.kind;
  return kind === 'id' || kind === 'label' || kind === 'brief' || kind === 'absent';
}

function displayValue(value: unknown): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (isNormalizedField(value)) {
    return value.kind === 'absent' ? null : displayName(value);
  }
  if (Array.isArray(value)) {
    const parts = value.map(displayValue).filter((part): part is string => part !== null);
    return parts.length > 0 ? parts.join(', ') : null;
  }
  if (typeof value === 'object') {
    return JSON.stringify(toJsonValue(value));
  }
  return String(value);
}

/**
 * `key: value` for every populated field not already shown
 */
function remainingLines(value: object, shown: ReadonlySet<string>): string[] {
  const entries: Array<[string, unknown]> = Object.entries(value);
  const lines: string[] = [];
  for (const [key, entry] of entries) {
    if (shown.has(key)) {
      continue;
    }
    const rendered = displayValue(entry);
    if (rendered !== null && rendered !== '') {
      lines.push(`${key}: ${rendered}`);
    }
  }
  return lines;
}

export function articleExcerpt(body: string): string {
  if (body.length <= ARTICLE_EXCERPT_LENGTH) {
    return body;
  }
  return `${body.slice(0, ARTICLE_EXCERPT_LENGTH)} (truncated)`;
}

function attachmentSummary(attachment: Attachment): string {
  const size = attachment.size !== undefined && attachment.size !== null ? `, ${attachment.size} bytes` : '';
  return `${attachment.filename} (ID ${attachment.id}${size})`;
}

const ARTICLE_SHOWN = new Set([
  'id', 'ticket_id', 'sender', 'type', 'created_at', 'from', 'created_by', 'internal', 'attachments', 'subject', 'body'
]);

function renderArticle(article: Article, heading: string, detailed: boolean): string[] {
  const lines = [
    `${heading} Article ${article.id}`,
    `Sender: ${article.sender ?? 'N/A'}`,
    `Type: ${article.type ?? 'N/A'}`,
    `Created: ${article.created_at}`,
    `Author: ${article.from ?? displayName(article.created_by)}`
  ];
  if (article.internal) {
    lines.push('Internal: yes');
  }
  if (article.subject) {
    lines.push(`Subject: ${article.subject}`);
  }
  if (article.attachments && article.attachments.length > 0) {
    lines.push(`Attachments: ${article.attachments.map(attachmentSummary).join(', ')}`);
  }
  if (detailed) {
    lines.push(...remainingLines(article, ARTICLE_SHOWN));
  }
  lines.push('', articleExcerpt(article.body));
  return lines;
}

const TICKET_SHOWN = new Set([
  'id', 'number', 'title', 'state', 'priority', 'group', 'owner', 'customer', 'organization',
  'created_at', 'updated_at', 'articles'
]);

function renderTicket(ticket: Ticket, heading: string): string[] {
  const lines = [
    `${heading} Ticket #${ticket.number} (ID: ${ticket.id}): ${ticket.title}`,
    '',
    `State: ${displayName(ticket.state)}`,
    `Priority: ${displayName(ticket.priority)}`,
    `Group: ${displayName(ticket.group)}`,
    `Owner: ${displayName(ticket.owner)}`,
    `Customer: ${displayName(ticket.customer)}`,
    `Organization: ${displayName(ticket.organization)}`,
    `Created: ${ticket.created_at}`,
    `Updated: ${ticket.updated_at}`,
    ...remainingLines(ticket, TICKET_SHOWN)
  ];

  if (ticket.articles && ticket.articles.length > 0) {
    lines.push('', `${heading}# Articles (${ticket.articles.length})`);
    for (const article of ticket.articles) {
      lines.push('', ...renderArticle(article, `${heading}##`, false));
    }
  }
  return lines;
}

function userName(user: User): string {
  const fullName = [user.firstname, user.lastname].filter(part => part).join(' ');
  return fullName || user.login || user.email || `User ${user.id}`;
}

const USER_SHOWN = new Set(['id', 'firstname', 'lastname', 'email', 'login', 'organization', 'created_at', 'updated_at']);

function renderUser(user: User, heading: string): string[] {
  return [
    `${heading} User: ${userName(user)} (ID: ${user.id})`,
    '',
    `Email: ${user.email || 'N/A'}`,
    `Login: ${user.login || 'N/A'}`,
    `Organization: ${displayName(user.organization)}`,
    `Created: ${user.created_at}`,
    `Updated: ${user.updated_at}`,
    ...remainingLines(user, USER_SHOWN)
  ];
}

const NAMED_SHOWN = new Set(['id', 'name', 'created_at', 'updated_at']);

function renderNamed(label: string, record: { id: number; name: string; created_at: string; updated_at: string }, heading: string): string[] {
  return [
    `${heading} ${label}: ${record.name} (ID: ${record.id})`,
    '',
    `Created: ${record.created_at}`,
    `Updated: ${record.updated_at}`,
    ...remainingLines(record, NAMED_SHOWN)
  ];
}

function renderAttachment(attachment: Attachment, heading: string): string[] {
  return [
    `${heading} Attachment: ${attachment.filename} (ID: ${attachment.id})`,
    '',
    ...remainingLines(attachment, new Set(['id', 'filename']))
  ];
}

function renderEntity(entity: Entity, heading: string): string[] {
  switch (entity.kind) {
    case 'ticket':
      return renderTicket(entity.value, heading);
    case 'article':
      return renderArticle(entity.value, heading, true);
    case 'user':
      return renderUser(entity.value, heading);
    case 'organization':
      return renderNamed('Organization', entity.value, heading);
    case 'group':
      return renderNamed('Group', entity.value, heading);
    case 'state':
      return renderNamed('Ticket State', entity.value, heading);
    case 'priority':
      return renderNamed('Ticket Priority', entity.value, heading);
    case 'attachment':
      return renderAttachment(entity.value, heading);
  }
}

function countLine(envelope: PaginationEnvelope<Entity>, noun: string): string {
  if (envelope.total === null) {
    return `Showing ${envelope.count} ${noun} (page ${envelope.page}, total unknown)`;
  }
  return `Showing ${envelope.count} of ${envelope.total} ${noun} (page ${envelope.page})`;
}

function paginationLine(envelope: PaginationEnvelope<Entity>): string {
  if (envelope.has_more && envelope.next_page !== null) {
    return `More results available: request page=${envelope.next_page} (offset ${envelope.next_offset ?? envelope.offset + envelope.per_page}).`;
  }
  return 'No more results.';
}

function renderPage(title: string, kind: EntityKind, envelope: PaginationEnvelope<Entity>): string[] {
  const noun = PLURALS[kind];
  const lines = [`# ${title}`, '', countLine(envelope, noun), paginationLine(envelope)];
  if (envelope.items.length === 0) {
    lines.push('', `No ${noun} found.`);
  }
  for (const item of envelope.items) {
    lines.push('', ...renderEntity(item, '##'));
  }
  return lines;
}

// ============================================================================
// Entry points
// ============================================================================

/**
 * Render an entity or page in the requested format
 */
export function formatResponse(payload: ResponsePayload, format: ResponseFormat): string {
  if (format === ResponseFormat.JSON) {
    return JSON.stringify(buildStructured(payload), null, 2);
  }
  const lines = payload.type === 'entity'
    ? renderEntity(payload.entity, '#')
    : renderPage(payload.title, payload.kind, payload.envelope);
  return lines.join('\n');
}

/**
 * Render a result that is not an entity (tag lists, statistics, downloads)
 */
export function formatRecord(title: string, record: JsonObject, format: ResponseFormat): string {
  if (format === ResponseFormat.JSON) {
    return JSON.stringify(record, null, 2);
  }
  const lines = [`# ${title}`, ''];
  for (const [key, value] of Object.entries(record)) {
    lines.push(`${key}: ${recordValue(value)}`);
  }
  return lines.join('\n');
}

function recordValue(value: JsonValue): string {
  if (value === null) {
    return 'N/A';
  }
  if (Array.isArray(value)) {
    return value.length === 0 ? '(none)' : value.map(recordValue).join(', ');
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}
