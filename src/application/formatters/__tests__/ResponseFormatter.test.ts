import { describe, it, expect } from 'vitest';
import { buildStructured, entityToJson, formatRecord, formatResponse } from '../ResponseFormatter.js';
import { ResponseFormat } from '../../../schemas/index.js';
import { validate, validateList } from '../../../core/validation/EntityValidator.js';
import { entity } from '../../../core/entities/Entity.js';
import { completeList, paginate } from '../../../core/pagination/Paginator.js';
import { RAW_GROUPS, rawArticle, rawTicket, rawUser } from '../../../__tests__/helpers/FakeZammadClient.js';

const ticket = validate('ticket', rawTicket(3, {
  number: '65003',
  title: 'Printer jam & smoke',
  priority: { id: 2, name: '2 normal' },
  customer: 5,
  owner: null,
  pending_time: null
}), { unknownKeys: 'strip' });

describe('formatResponse: ticket', () => {
  it('shows the display number and internal id side by side', () => {
    const text = formatResponse({ type: 'entity', entity: entity('ticket', ticket) }, ResponseFormat.MARKDOWN);

    expect(text.split('\n')[0]).toBe('# Ticket #65003 (ID: 3): Printer jam &amp; smoke');
  });

  it('renders relation fields by display name', () => {
    const lines = formatResponse({ type: 'entity', entity: entity('ticket', ticket) }, ResponseFormat.MARKDOWN).split('\n');

    expect(lines.slice(2, 10)).toEqual([
      'State: open',
      'Priority: 2 normal',
      'Group: Users',
      'Owner: N/A',
      'Customer: ID 5',
      'Organization: N/A',
      'Created: 2024-01-15T10:30:00Z',
      'Updated: 2024-01-15T10:30:00Z'
    ]);
    expect(lines).toContain('group_id: 1');
    expect(lines.some(line => line.startsWith('pending_time'))).toBe(false);
  });

  it('keeps the variant that arrived in structured output', () => {
    const json = JSON.parse(formatResponse({ type: 'entity', entity: entity('ticket', ticket) }, ResponseFormat.JSON));

    expect(json.state).toBe('open');
    expect(json.priority).toEqual({ id: 2, name: '2 normal' });
    expect(json.customer).toBe(5);
    expect(json.owner).toBeNull();
    expect(json.id).toBe(3);
    expect(json.number).toBe('65003');
  });

  it('caps article excerpts at 500 characters', () => {
    const withArticle = {
      ...ticket,
      articles: validateList('article', [rawArticle(10, 3, { body: 'x'.repeat(600) })])
    };

    const lines = formatResponse({ type: 'entity', entity: entity('ticket', withArticle) }, ResponseFormat.MARKDOWN).split('\n');

    expect(lines).toContain('## Articles (1)');
    expect(lines).toContain('### Article 10');
    expect(lines).toContain('Author: agent@example.com');
    expect(lines).toContain(`${'x'.repeat(500)} (truncated)`);
    expect(lines).not.toContain('x'.repeat(600));
  });

  it('leaves short article bodies whole', () => {
    const withArticle = { ...ticket, articles: validateList('article', [rawArticle(11, 3, { body: 'Short' })]) };

    const lines = formatResponse({ type: 'entity', entity: entity('ticket', withArticle) }, ResponseFormat.MARKDOWN).split('\n');

    expect(lines[lines.length - 1]).toBe('Short');
  });
});

describe('formatResponse: pages', () => {
  it('renders an empty first page', () => {
    const envelope = paginate([], 1, 25, 0);

    expect(formatResponse({ type: 'page', title: 'Ticket Search Results', kind: 'ticket', envelope }, ResponseFormat.MARKDOWN)).toBe([
      '# Ticket Search Results',
      '',
      'Showing 0 of 0 tickets (page 1)',
      'No more results.',
      '',
      'No tickets found.'
    ].join('\n'));

    expect(JSON.parse(formatResponse({ type: 'page', title: 'Ticket Search Results', kind: 'ticket', envelope }, ResponseFormat.JSON))).toEqual({
      items: [],
      total: 0,
      count: 0,
      page: 1,
      per_page: 25,
      offset: 0,
      has_more: false,
      next_page: null,
      next_offset: null
    });
  });

  it('points to the next page when the total is unknown and the page is full', () => {
    const users = validateList('user', [rawUser(1), rawUser(2)]).map(user => entity('user', user));
    const envelope = paginate(users, 2, 2, null);

    const lines = formatResponse({ type: 'page', title: 'Users', kind: 'user', envelope }, ResponseFormat.MARKDOWN).split('\n');

    expect(lines[2]).toBe('Showing 2 users (page 2, total unknown)');
    expect(lines[3]).toBe('More results available: request page=3 (offset 4).');
    expect(lines).toContain('## User: Nicole Braun (ID: 1)');
  });

  it('emits exactly the envelope keys', () => {
    const groups = validateList('group', RAW_GROUPS).map(group => entity('group', group));
    const structured = buildStructured({ type: 'page', title: 'Groups', kind: 'group', envelope: completeList(groups) });

    expect(Object.keys(structured)).toEqual([
      'items', 'total', 'count', 'page', 'per_page', 'offset', 'has_more', 'next_page', 'next_offset'
    ]);
    expect(structured.total).toBe(1);
  });
});

describe('entityToJson', () => {
  it('re-validates to the same ticket', () => {
    const withArticle = { ...ticket, articles: validateList('article', [rawArticle(10, 3, { body: '<b>hi</b>' })]) };

    const again = validate('ticket', entityToJson(entity('ticket', withArticle)));

    expect(again).toEqual(withArticle);
  });

  it('re-validates to the same user', () => {
    const user = validate('user', rawUser(7, { organization: { id: 2, name: 'Acme' }, note: 'VIP & friend' }));

    expect(validate('user', entityToJson(entity('user', user)))).toEqual(user);
  });
});

describe('formatRecord', () => {
  it('renders key lines with placeholders for empty values', () => {
    expect(formatRecord('Tags', { ticket_id: 3, tags: [], note: null }, ResponseFormat.MARKDOWN)).toBe(
      '# Tags\n\nticket_id: 3\ntags: (none)\nnote: N/A'
    );
  });

  it('serializes the record as JSON', () => {
    expect(JSON.parse(formatRecord('Tags', { ticket_id: 3, tags: ['vip'] }, ResponseFormat.JSON))).toEqual({
      ticket_id: 3,
      tags: ['vip']
    });
  });
});
