/**
 * Zod schemas for the Zammad MCP tool arguments
 *
 * Every tool schema is strict: an argument the tool does not declare is a
 * validation failure. Record-level rules (escaping, base64, filename
 * sanitization, "at least one field to update") live in the EntityValidator
 * input kinds the handlers feed these arguments into.
 */

import { z } from 'zod';

import {
  DEFAULT_ARTICLE_LIMIT,
  DEFAULT_MAX_ATTACHMENT_BYTES,
  DEFAULT_PER_PAGE,
  MAX_ARTICLE_BODY_LENGTH,
  MAX_ATTACHMENTS,
  MAX_FILENAME_LENGTH,
  MAX_PER_PAGE
} from '../constants.js';
import {
  ARTICLE_CONTENT_TYPES,
  ARTICLE_SENDERS,
  ARTICLE_TYPES,
  MAX_CUSTOMER_LENGTH,
  MAX_GROUP_LENGTH,
  MAX_REFERENCE_LENGTH,
  MAX_TITLE_LENGTH
} from '../core/validation/entitySchemas.js';

// ============================================================================
// Enums
// ============================================================================

export enum ResponseFormat {
  MARKDOWN = 'markdown',
  JSON = 'json'
}

// ============================================================================
// Common Schemas
// ============================================================================

export const ResponseFormatSchema = z.nativeEnum(ResponseFormat)
  .default(ResponseFormat.MARKDOWN)
  .describe('Output format: "markdown" for human-readable text or "json" for structured data (default: markdown)');

export const TicketIdSchema = z.number()
  .int()
  .positive()
  .describe('Internal ticket ID (the "id" field of search results, NOT the display "number")');

const positiveId = (description: string) => z.number().int().positive().describe(description);

export const PaginationSchema = z.object({
  page: z.number()
    .int()
    .min(1)
    .default(1)
    .describe('Page number, starting at 1 (default: 1)'),
  per_page: z.number()
    .int()
    .min(1)
    .max(MAX_PER_PAGE)
    .default(DEFAULT_PER_PAGE)
    .describe(`Results per page (default: ${DEFAULT_PER_PAGE}, max: ${MAX_PER_PAGE})`)
});

const reference = (description: string, max: number = MAX_REFERENCE_LENGTH) =>
  z.string().min(1).max(max).describe(description);

// ============================================================================
// Ticket Tools
// ============================================================================

/**
 * zammad_search_tickets
 */
export const SearchTicketsInputSchema = z.object({
  query: z.string()
    .min(1)
    .max(500)
    .optional()
    .describe('Free-text search (Zammad search syntax, e.g. "printer" or "title:VPN")'),
  state: reference('Filter by state name (e.g. "open", "closed")').optional(),
  priority: reference('Filter by priority name (e.g. "3 high")').optional(),
  group: reference('Filter by group name', MAX_GROUP_LENGTH).optional(),
  owner: reference('Filter by owner login').optional(),
  customer: reference('Filter by customer email', MAX_CUSTOMER_LENGTH).optional(),
  page: PaginationSchema.shape.page,
  per_page: PaginationSchema.shape.per_page,
  response_format: ResponseFormatSchema
}).strict();

export type SearchTicketsInput = z.infer<typeof SearchTicketsInputSchema>;

/**
 * zammad_get_ticket
 */
export const GetTicketInputSchema = z.object({
  ticket_id: TicketIdSchema,
  include_articles: z.boolean()
    .default(true)
    .describe('Include the ticket articles (default: true)'),
  article_limit: z.number()
    .int()
    .min(-1)
    .default(DEFAULT_ARTICLE_LIMIT)
    .describe(`Maximum articles to include, -1 for all (default: ${DEFAULT_ARTICLE_LIMIT})`),
  article_offset: z.number()
    .int()
    .min(0)
    .default(0)
    .describe('Articles to skip, for paging through long conversations (default: 0)'),
  response_format: ResponseFormatSchema
}).strict();

export type GetTicketInput = z.infer<typeof GetTicketInputSchema>;

/**
 * zammad_create_ticket
 */
export const CreateTicketInputSchema = z.object({
  title: z.string().min(1).max(MAX_TITLE_LENGTH).describe('Ticket title'),
  group: reference('Group name the ticket is assigned to (e.g. "Users")', MAX_GROUP_LENGTH),
  customer: reference('Customer email or login', MAX_CUSTOMER_LENGTH),
  article_body: z.string()
    .min(1)
    .max(MAX_ARTICLE_BODY_LENGTH)
    .describe('Body of the first article'),
  state: reference('Initial state name (default: "new")').optional(),
  priority: reference('Priority name (default: "2 normal")').optional(),
  article_type: z.enum(ARTICLE_TYPES).optional().describe('First article type (default: note)'),
  article_internal: z.boolean().optional().describe('Hide the first article from the customer (default: false)'),
  response_format: ResponseFormatSchema
}).strict();

export type CreateTicketInput = z.infer<typeof CreateTicketInputSchema>;

/**
 * zammad_update_ticket
 */
export const UpdateTicketInputSchema = z.object({
  ticket_id: TicketIdSchema,
  title: z.string().min(1).max(MAX_TITLE_LENGTH).optional().describe('New title'),
  state: reference('New state name').optional(),
  priority: reference('New priority name').optional(),
  owner: reference('New owner login or email').optional(),
  group: reference('New group name', MAX_GROUP_LENGTH).optional(),
  pending_time: z.string()
    .optional()
    .describe('Pending-until timestamp, ISO-8601 with offset (required by pending states)'),
  response_format: ResponseFormatSchema
}).strict();

export type UpdateTicketInput = z.infer<typeof UpdateTicketInputSchema>;

// ============================================================================
// Article & Attachment Tools
// ============================================================================

export const AttachmentUploadSchema = z.object({
  filename: z.string().min(1).max(MAX_FILENAME_LENGTH).describe('File name; directory parts are stripped'),
  data: z.string().min(1).describe('File content, base64-encoded'),
  mime_type: z.string().optional().describe('MIME type (guessed from the file extension when omitted)')
}).strict();

/**
 * zammad_add_article
 */
export const AddArticleInputSchema = z.object({
  ticket_id: TicketIdSchema,
  body: z.string().min(1).max(MAX_ARTICLE_BODY_LENGTH).describe('Article body'),
  type: z.enum(ARTICLE_TYPES).optional().describe('Article type (default: note)'),
  internal: z.boolean().optional().describe('Internal note, hidden from the customer (default: false)'),
  sender: z.enum(ARTICLE_SENDERS).optional().describe('Sender role (default: Agent)'),
  content_type: z.enum(ARTICLE_CONTENT_TYPES).optional().describe('Body content type (default: text/plain)'),
  attachments: z.array(AttachmentUploadSchema)
    .max(MAX_ATTACHMENTS)
    .optional()
    .describe(`Files to attach (max: ${MAX_ATTACHMENTS})`),
  response_format: ResponseFormatSchema
}).strict();

export type AddArticleInput = z.infer<typeof AddArticleInputSchema>;

/**
 * zammad_get_article_attachments
 */
export const GetArticleAttachmentsInputSchema = z.object({
  ticket_id: TicketIdSchema,
  article_id: positiveId('Article ID'),
  response_format: ResponseFormatSchema
}).strict();

export type GetArticleAttachmentsInput = z.infer<typeof GetArticleAttachmentsInputSchema>;

const attachmentAddress = {
  ticket_id: TicketIdSchema,
  article_id: positiveId('Article ID'),
  attachment_id: positiveId('Attachment ID (from zammad_get_article_attachments)')
};

/**
 * zammad_download_attachment (always JSON)
 */
export const DownloadAttachmentInputSchema = z.object({
  ...attachmentAddress,
  max_bytes: z.number()
    .int()
    .positive()
    .default(DEFAULT_MAX_ATTACHMENT_BYTES)
    .describe(`Refuse attachments larger than this many bytes (default: ${DEFAULT_MAX_ATTACHMENT_BYTES})`),
  chunk_offset: z.number()
    .int()
    .min(0)
    .default(0)
    .describe('Byte offset of the chunk to return (use next_chunk_offset from the previous call)')
}).strict();

export type DownloadAttachmentInput = z.infer<typeof DownloadAttachmentInputSchema>;

/**
 * zammad_delete_attachment
 */
export const DeleteAttachmentInputSchema = z.object(attachmentAddress).strict();

export type DeleteAttachmentInput = z.infer<typeof DeleteAttachmentInputSchema>;

// ============================================================================
// Tag Tools
// ============================================================================

/**
 * zammad_add_ticket_tag / zammad_remove_ticket_tag
 */
export const TicketTagInputSchema = z.object({
  ticket_id: TicketIdSchema,
  tag: z.string().min(1).max(100).describe('Tag name'),
  response_format: ResponseFormatSchema
}).strict();

export type TicketTagInput = z.infer<typeof TicketTagInputSchema>;

/**
 * zammad_get_ticket_tags
 */
export const GetTicketTagsInputSchema = z.object({
  ticket_id: TicketIdSchema,
  response_format: ResponseFormatSchema
}).strict();

export type GetTicketTagsInput = z.infer<typeof GetTicketTagsInputSchema>;

// ============================================================================
// User & Organization Tools
// ============================================================================

export const GetUserInputSchema = z.object({
  user_id: positiveId('User ID'),
  response_format: ResponseFormatSchema
}).strict();

export type GetUserInput = z.infer<typeof GetUserInputSchema>;

export const SearchUsersInputSchema = z.object({
  query: z.string().min(1).max(500).describe('Search text (name, email, login)'),
  page: PaginationSchema.shape.page,
  per_page: PaginationSchema.shape.per_page,
  response_format: ResponseFormatSchema
}).strict();

export type SearchUsersInput = z.infer<typeof SearchUsersInputSchema>;

export const GetOrganizationInputSchema = z.object({
  org_id: positiveId('Organization ID'),
  response_format: ResponseFormatSchema
}).strict();

export type GetOrganizationInput = z.infer<typeof GetOrganizationInputSchema>;

export const SearchOrganizationsInputSchema = z.object({
  query: z.string().min(1).max(500).describe('Search text (name, domain)'),
  page: PaginationSchema.shape.page,
  per_page: PaginationSchema.shape.per_page,
  response_format: ResponseFormatSchema
}).strict();

export type SearchOrganizationsInput = z.infer<typeof SearchOrganizationsInputSchema>;

// ============================================================================
// Reference Data, Statistics & Maintenance
// ============================================================================

/**
 * zammad_get_current_user, zammad_list_groups, zammad_list_ticket_states,
 * zammad_list_ticket_priorities
 */
export const FormatOnlyInputSchema = z.object({
  response_format: ResponseFormatSchema
}).strict();

export type FormatOnlyInput = z.infer<typeof FormatOnlyInputSchema>;

export const GetTicketStatsInputSchema = z.object({
  group: reference('Only count tickets of this group', MAX_GROUP_LENGTH).optional(),
  response_format: ResponseFormatSchema
}).strict();

export type GetTicketStatsInput = z.infer<typeof GetTicketStatsInputSchema>;

/**
 * zammad_clear_caches - No input required
 */
export const ClearCachesInputSchema = z.object({}).strict();

export type ClearCachesInput = z.infer<typeof ClearCachesInputSchema>;
