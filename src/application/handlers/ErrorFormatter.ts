import type { Log } from '../../infrastructure/logging/Logger.js';
import { ValidationError } from '../../infrastructure/errors/ValidationError.js';
import { AttachmentDownloadError } from '../../infrastructure/errors/AttachmentDownloadError.js';
import {
  RemoteAuthError,
  RemoteNotFoundError,
  RemotePermissionError,
  RemoteTimeoutError,
  RemoteUnavailableError,
  ZammadApiError
} from '../../infrastructure/errors/ZammadApiError.js';

export interface ErrorContext {
  /** Ticket id of the operation; used where the path does not carry it (tags) */
  readonly ticketId?: number;
}

export function ticketIdGuidance(ticketId: number): string {
  return `Ticket ID ${ticketId} was not found. ` +
    'Tools expect the internal ticket ID, which search results return in the "id" field, ' +
    'separate from the display "number" (Ticket #65003 may have ID 3). ' +
    'Run zammad_search_tickets to find the correct ID.';
}

/**
 * Name the identifier the failed request addressed. Ticket guidance is only
 * given when the ticket itself was the missing resource.
 */
function notFoundGuidance(path: string | null, options: ErrorContext): string {
  const attachment = path?.match(/^\/ticket_attachment\/(\d+)\/(\d+)\/(\d+)$/);
  if (attachment) {
    const [, ticketId, articleId, attachmentId] = attachment;
    return `Attachment ID ${attachmentId} of article ${articleId} was not found. ` +
      `Run zammad_get_article_attachments (ticket_id=${ticketId}, article_id=${articleId}) to list its attachment IDs.`;
  }

  const article = path?.match(/^\/ticket_articles\/(\d+)$/);
  if (article) {
    return `Article ID ${article[1]} was not found. ` +
      'Run zammad_get_ticket with include_articles=true to list the article IDs of the ticket.';
  }

  const ticket = path?.match(/^\/(?:tickets|ticket_articles\/by_ticket)\/(\d+)$/);
  if (ticket) {
    return ticketIdGuidance(Number(ticket[1]));
  }
  if (path?.startsWith('/tags') && options.ticketId !== undefined) {
    return ticketIdGuidance(options.ticketId);
  }

  return 'Resource not found. Verify the ID is correct and exists in Zammad.';
}

/**
 * Format an error caught at the tool boundary with an actionable suggestion.
 * Unexpected errors are logged with detail and reported generically.
 */
export function formatToolError(error: unknown, context: string, logger: Log, options: ErrorContext = {}): string {
  if (error instanceof ValidationError) {
    return `Error: ${context} - Invalid input: ${error.message}`;
  }
  if (error instanceof RemoteNotFoundError) {
    return `Error: ${context} - ${notFoundGuidance(error.path, options)}`;
  }
  if (error instanceof RemoteAuthError) {
    return `Error: ${context} - Authentication failed. Check that the configured Zammad credentials are valid and active.`;
  }
  if (error instanceof RemotePermissionError) {
    return `Error: ${context} - Permission denied. The Zammad user behind the credentials lacks the permission this operation needs.`;
  }
  if (error instanceof RemoteTimeoutError) {
    return `Error: ${context} - Request timed out. Try again or check the Zammad server status.`;
  }
  if (error instanceof RemoteUnavailableError) {
    return `Error: ${context} - Zammad is unavailable. Try again later or check the Zammad server status.`;
  }
  if (error instanceof ZammadApiError) {
    return `Error: ${context} - Zammad rejected the request. ${error.message}`;
  }
  if (error instanceof AttachmentDownloadError) {
    return `Error: ${context} - ${error.message}`;
  }

  logger.error(`${context}: unexpected failure`, error);
  return `Error: ${context} - An unexpected error occurred. Check the server log for details.`;
}
