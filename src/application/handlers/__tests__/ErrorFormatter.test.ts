import { describe, it, expect } from 'vitest';
import { formatToolError } from '../ErrorFormatter.js';
import { ValidationError } from '../../../infrastructure/errors/ValidationError.js';
import { AttachmentDownloadError } from '../../../infrastructure/errors/AttachmentDownloadError.js';
import {
  RemoteAuthError,
  RemoteNotFoundError,
  RemotePermissionError,
  RemoteTimeoutError,
  RemoteUnavailableError,
  ZammadApiError
} from '../../../infrastructure/errors/ZammadApiError.js';
import { memoryLogger } from '../../../__tests__/helpers/FakeZammadClient.js';

describe('formatToolError', () => {
  const { logger, lines } = memoryLogger();

  it('explains the id/number distinction for ticket lookups', () => {
    const error = new RemoteNotFoundError('Not found (404) for GET /tickets/65003', 404, '/tickets/65003');
    const text = formatToolError(error, 'Failed to get ticket', logger, { ticketId: 65003 });

    expect(text).toBe(
      'Error: Failed to get ticket - Ticket ID 65003 was not found. ' +
        'Tools expect the internal ticket ID, which search results return in the "id" field, ' +
        'separate from the display "number" (Ticket #65003 may have ID 3). ' +
        'Run zammad_search_tickets to find the correct ID.'
    );
  });

  it('names the article when the article lookup fails', () => {
    const error = new RemoteNotFoundError('Not found (404) for GET /ticket_articles/999', 404, '/ticket_articles/999');

    expect(formatToolError(error, 'Failed to get article attachments', logger, { ticketId: 3 })).toBe(
      'Error: Failed to get article attachments - Article ID 999 was not found. ' +
        'Run zammad_get_ticket with include_articles=true to list the article IDs of the ticket.'
    );
  });

  it('names the attachment when the attachment lookup fails', () => {
    const error = new RemoteNotFoundError('Not found (404) for GET /ticket_attachment/3/10/77', 404, '/ticket_attachment/3/10/77');

    expect(formatToolError(error, 'Failed to download attachment', logger, { ticketId: 3 })).toBe(
      'Error: Failed to download attachment - Attachment ID 77 of article 10 was not found. ' +
        'Run zammad_get_article_attachments (ticket_id=3, article_id=10) to list its attachment IDs.'
    );
  });

  it('gives ticket guidance for the ticket articles and tag endpoints', () => {
    const articles = new RemoteNotFoundError('Not found (404) for GET /ticket_articles/by_ticket/8', 404, '/ticket_articles/by_ticket/8');
    const tags = new RemoteNotFoundError('Not found (404) for GET /tags', 404, '/tags');

    expect(formatToolError(articles, 'Failed', logger)).toContain('Ticket ID 8 was not found.');
    expect(formatToolError(tags, 'Failed', logger, { ticketId: 5 })).toContain('Ticket ID 5 was not found.');
  });

  it('does not blame the ticket when the failed request is unknown', () => {
    const error = new RemoteNotFoundError('Not found (404)');

    expect(formatToolError(error, 'Failed', logger, { ticketId: 3 })).toBe(
      'Error: Failed - Resource not found. Verify the ID is correct and exists in Zammad.'
    );
  });

  it('gives a generic not-found message without a ticket id', () => {
    expect(formatToolError(new RemoteNotFoundError('Not found (404) for GET /users/9'), 'Failed to get user', logger)).toBe(
      'Error: Failed to get user - Resource not found. Verify the ID is correct and exists in Zammad.'
    );
  });

  it('lists field issues of validation errors', () => {
    const error = new ValidationError([
      { field: 'per_page', reason: 'must be ≤ 100, got 101' },
      { field: 'page', reason: 'must be ≥ 1, got 0' }
    ]);

    expect(formatToolError(error, 'Failed to search tickets', logger)).toBe(
      'Error: Failed to search tickets - Invalid input: per_page: must be ≤ 100, got 101; page: must be ≥ 1, got 0'
    );
  });

  it.each([
    [new RemoteAuthError('Authentication failed (401) for GET /users/me'), 'Authentication failed. Check that the configured Zammad credentials are valid and active.'],
    [new RemotePermissionError('Permission denied (403) for GET /groups'), 'Permission denied. The Zammad user behind the credentials lacks the permission this operation needs.'],
    [new RemoteTimeoutError('Request timed out after 50 ms (GET /groups)', 50), 'Request timed out. Try again or check the Zammad server status.'],
    [new RemoteUnavailableError('Request failed: connect ECONNREFUSED'), 'Zammad is unavailable. Try again later or check the Zammad server status.']
  ])('maps %s to an actionable message', (error, suggestion) => {
    expect(formatToolError(error, 'Failed', logger)).toBe(`Error: Failed - ${suggestion}`);
  });

  it('includes the remote detail for rejected requests', () => {
    const error = new ZammadApiError(422, 'Zammad API error (422) for POST /tickets: No such group');

    expect(formatToolError(error, 'Failed to create ticket', logger)).toBe(
      'Error: Failed to create ticket - Zammad rejected the request. Zammad API error (422) for POST /tickets: No such group'
    );
  });

  it('reports attachment download failures with their ids', () => {
    const error = new AttachmentDownloadError(3, 10, 900, 'attachment is 20 bytes, larger than max_bytes (10)');

    expect(formatToolError(error, 'Failed to download attachment', logger)).toBe(
      'Error: Failed to download attachment - Failed to download attachment 900 for ticket 3 article 10: ' +
        'attachment is 20 bytes, larger than max_bytes (10)'
    );
  });

  it('hides unexpected errors behind a generic message and logs them', () => {
    const text = formatToolError(new TypeError('Cannot read properties of undefined'), 'Failed to get ticket', logger);

    expect(text).toBe('Error: Failed to get ticket - An unexpected error occurred. Check the server log for details.');
    expect(text).not.toContain('TypeError');
    expect(lines.some(line => line.includes('Failed to get ticket: unexpected failure Cannot read properties of undefined'))).toBe(true);
  });
});
