import { describe, it, expect, vi } from 'vitest';
import { safeValidate, validate, validateList } from '../EntityValidator.js';
import { ValidationError } from '../../../infrastructure/errors/ValidationError.js';

const rawTicket = {
  id: 3,
  number: '65003',
  title: 'Printer <broken> & "stuck"',
  group_id: 1,
  state_id: 2,
  priority_id: 2,
  customer_id: 5,
  owner_id: 4,
  organization_id: null,
  created_at: '2024-01-15T10:30:00Z',
  updated_at: '2024-01-16T08:00:00+02:00',
  group: 'Users',
  state: 'open',
  priority: { id: 2, name: '2 normal' },
  customer: 5,
  owner: null,
  organization: null,
  created_by: null,
  updated_by: null
};

const rawGroup = {
  id: 1,
  name: 'Users',
  active: true,
  created_at: '2024-01-01T00:00:00Z',
  updated_at: '2024-01-01T00:00:00Z'
};

function issuesOf(kind: Parameters<typeof safeValidate>[0], raw: unknown) {
  const result = safeValidate(kind, raw);
  if (result.ok) {
    throw new Error('expected validation to fail');
  }
  return result.error.issues;
}

describe('validate: ticket', () => {
  it('normalizes relation fields and escapes the title', () => {
    const ticket = validate('ticket', rawTicket);

    expect(ticket.id).toBe(3);
    expect(ticket.number).toBe('65003');
    expect(ticket.title).toBe('Printer &lt;broken&gt; &amp; &quot;stuck&quot;');
    expect(ticket.group).toEqual({ kind: 'label', label: 'Users' });
    expect(ticket.state).toEqual({ kind: 'label', label: 'open' });
    expect(ticket.priority).toEqual({
      kind: 'brief',
      id: 2,
      name: '2 normal',
      fields: { id: 2, name: '2 normal' }
    });
    expect(ticket.customer).toEqual({ kind: 'id', id: 5 });
    expect(ticket.owner).toEqual({ kind: 'absent' });
  });

  it('accepts an integer ticket number as its string form', () => {
    expect(validate('ticket', { ...rawTicket, number: 65003 }).number).toBe('65003');
  });

  it('keeps escaped text unchanged on re-validation', () => {
    const first = validate('ticket', rawTicket);
    const second = validate('ticket', { ...rawTicket, title: first.title });
    expect(second.title).toBe(first.title);
  });

  it('validates with every relation field null', () => {
    const ticket = validate('ticket', rawTicket);
    const allNull = validate('ticket', {
      ...rawTicket,
      group: null,
      state: null,
      priority: null,
      customer: null
    });

    expect(ticket.id).toBe(allNull.id);
    for (const field of [allNull.group, allNull.state, allNull.priority, allNull.customer, allNull.owner]) {
      expect(field).toEqual({ kind: 'absent' });
    }
  });

  it('rejects unknown fields by default', () => {
    expect(() => validate('ticket', { ...rawTicket, custom_field: 'x' })).toThrow('custom_field: unexpected field');
  });

  it('drops and reports unknown fields under the strip policy', () => {
    const onDroppedKeys = vi.fn();
    const ticket = validate('ticket', { ...rawTicket, custom_field: 'x' }, { unknownKeys: 'strip', onDroppedKeys });

    expect(ticket.id).toBe(3);
    expect(onDroppedKeys).toHaveBeenCalledWith('ticket', ['custom_field']);
  });

  it('forwards normalization warnings with the field name', () => {
    const onWarning = vi.fn();
    const ticket = validate('ticket', { ...rawTicket, state: [1] }, { onWarning });

    expect(ticket.state).toEqual({ kind: 'absent' });
    expect(onWarning).toHaveBeenCalledWith('state: unrecognized field shape: list of 1');
  });

  it('names missing required fields', () => {
    const { title: _title, ...withoutTitle } = rawTicket;
    expect(issuesOf('ticket', withoutTitle)).toEqual([{ field: 'title', reason: 'is required' }]);
  });

  it('rejects non-positive ids', () => {
    expect(issuesOf('ticket', { ...rawTicket, id: -1 })).toEqual([{ field: 'id', reason: 'must be > 0, got -1' }]);
  });

  it('requires timestamps with an offset', () => {
    const [issue] = issuesOf('ticket', { ...rawTicket, created_at: '2024-01-15T10:30:00' });
    expect(issue).toEqual({
      field: 'created_at',
      reason: 'must be an ISO-8601 timestamp with offset (e.g. 2024-01-15T10:30:00Z), got "2024-01-15T10:30:00"'
    });
  });

  it('scopes issues of embedded articles', () => {
    const article = { id: 9, ticket_id: 3, created_at: '2024-01-15T10:30:00Z' };
    expect(issuesOf('ticket', { ...rawTicket, articles: [article] })).toEqual([
      { field: 'articles[0].body', reason: 'is required' }
    ]);
  });
});

describe('validate: caller inputs', () => {
  it('fills ticket_create defaults', () => {
    const input = validate('ticket_create', {
      title: 'Login fails',
      group: 'Users',
      customer: 'customer@example.com',
      article_body: 'Cannot log in since Monday.'
    });

    expect(input).toEqual({
      title: 'Login fails',
      group: 'Users',
      customer: 'customer@example.com',
      article_body: 'Cannot log in since Monday.',
      state: 'new',
      priority: '2 normal',
      article_type: 'note',
      article_internal: false
    });
  });

  it('bounds the ticket title', () => {
    expect(
      issuesOf('ticket_create', {
        title: 'x'.repeat(201),
        group: 'Users',
        customer: 'customer@example.com',
        article_body: 'body'
      })
    ).toEqual([{ field: 'title', reason: 'must be at most 200 characters, got 201' }]);
  });

  it('requires at least one change on ticket_update', () => {
    expect(issuesOf('ticket_update', { ticket_id: 3 })).toEqual([
      { field: 'input', reason: 'at least one of title, state, priority, owner, group, pending_time is required' }
    ]);
  });

  it('rejects unknown enum values with the allowed options', () => {
    expect(issuesOf('article_create', { ticket_id: 3, body: 'hi', type: 'sms' })).toEqual([
      { field: 'type', reason: 'must be one of note, email, phone, got "sms"' }
    ]);
  });
});

describe('validate: attachments', () => {
  it('sanitizes the filename to its base name', () => {
    expect(validate('attachment_upload', { filename: '../../etc/passwd', data: 'aGVsbG8=' })).toEqual({
      filename: 'passwd',
      data: 'aGVsbG8=',
      mime_type: 'application/octet-stream'
    });
  });

  it('guesses the mime type from the extension', () => {
    expect(validate('attachment_upload', { filename: 'log.txt', data: 'aGVsbG8=' }).mime_type).toBe('text/plain');
  });

  it('names the data field for invalid base64', () => {
    const error = safeValidate('attachment_upload', { filename: 'a.txt', data: 'not-base64!!!' });

    expect(error.ok).toBe(false);
    if (!error.ok) {
      expect(error.error).toBeInstanceOf(ValidationError);
      expect(error.error.field).toBe('data');
      expect(error.error.message).toBe('data: invalid base64 encoding');
    }
  });

  it('rejects an eleventh attachment', () => {
    const attachments = Array.from({ length: 11 }, (_, i) => ({ filename: `f${i}.txt`, data: 'aGVsbG8=' }));
    expect(() => validate('article_create', { ticket_id: 3, body: 'see files', attachments })).toThrow(
      'attachments: too many attachments (11), maximum is 10'
    );
  });

  it('accepts ten attachments', () => {
    const attachments = Array.from({ length: 10 }, (_, i) => ({ filename: `f${i}.txt`, data: 'aGVsbG8=' }));
    expect(validate('article_create', { ticket_id: 3, body: 'see files', attachments }).attachments).toHaveLength(10);
  });

  it('scopes unknown keys inside attachments', () => {
    const attachments = [{ filename: 'a.txt', data: 'aGVsbG8=', extra: 1 }];
    expect(issuesOf('article_create', { ticket_id: 3, body: 'x', attachments })).toEqual([
      { field: 'attachments[0].extra', reason: 'unexpected field' }
    ]);
  });
});

describe('validateList', () => {
  it('prefixes issues with the element index', () => {
    expect(() => validateList('group', [rawGroup, { ...rawGroup, id: 0 }])).toThrow('[1].id: must be > 0, got 0');
  });
});
