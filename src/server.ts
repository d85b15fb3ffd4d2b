/**
 * MCP registration layer
 *
 * Declares the Zammad tools, resources and prompts on an McpServer and routes
 * each call to the shared ToolHandlers. Building a server is cheap, so the
 * HTTP transport creates one per request.
 */

import { McpServer, ResourceTemplate } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult, ReadResourceResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import { SERVER_NAME, SERVER_VERSION } from './constants.js';
import type { ToolHandlers, ToolResult } from './application/handlers/ToolHandlers.js';
import {
  analyzeTicketPrompt,
  DEFAULT_TONE,
  draftResponsePrompt,
  escalationSummaryPrompt
} from './application/prompts/PromptTemplates.js';
import { fieldErrorMap } from './core/validation/fieldErrors.js';
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
  SearchOrganizationsInputSchema,
  SearchTicketsInputSchema,
  SearchUsersInputSchema,
  TicketTagInputSchema,
  UpdateTicketInputSchema
} from './schemas/index.js';

const READ_ONLY = {
  readOnlyHint: true,
  destructiveHint: false,
  idempotentHint: true,
  openWorldHint: true
};

const WRITE = {
  readOnlyHint: false,
  destructiveHint: false,
  idempotentHint: false,
  openWorldHint: true
};

const IDEMPOTENT_WRITE = {
  readOnlyHint: false,
  destructiveHint: false,
  idempotentHint: true,
  openWorldHint: true
};

function toCallToolResult(result: ToolResult): CallToolResult {
  return {
    content: [{ type: 'text', text: result.text }],
    isError: result.isError
  };
}

function toResourceResult(uri: URL, result: ToolResult): ReadResourceResult {
  return {
    contents: [{ uri: uri.href, mimeType: 'text/markdown', text: result.text }]
  };
}

function variable(value: string | string[] | undefined): string {
  if (Array.isArray(value)) {
    return value[0] ?? '';
  }
  return value ?? '';
}

function userPrompt(text: string) {
  return {
    messages: [{ role: 'user' as const, content: { type: 'text' as const, text } }]
  };
}

/**
 * Create a fully registered MCP server backed by `handlers`
 */
export function createMcpServer(handlers: ToolHandlers): McpServer {
  // Argument errors reported by the SDK read like the handlers' own
  z.setErrorMap(fieldErrorMap);

  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION
  });

  registerTicketTools(server, handlers);
  registerArticleTools(server, handlers);
  registerTagTools(server, handlers);
  registerUserTools(server, handlers);
  registerReferenceTools(server, handlers);
  registerResources(server, handlers);
  registerPrompts(server);

  return server;
}

// ============================================================================
// Tickets
// ============================================================================

function registerTicketTools(server: McpServer, handlers: ToolHandlers): void {
  // -------------------------------------------------------------------------
  // zammad_search_tickets
  // -------------------------------------------------------------------------
  server.registerTool(
    'zammad_search_tickets',
    {
      title: 'Search Zammad Tickets',
      description: `Search Zammad tickets by free text and field filters, one page at a time.

Filters are combined with AND. Without any filter the most recent tickets are listed.

Args:
  - query (string, optional): Free-text search in Zammad search syntax
  - state (string, optional): State name, e.g. "open"
  - priority (string, optional): Priority name, e.g. "3 high"
  - group (string, optional): Group name
  - owner (string, optional): Owner login
  - customer (string, optional): Customer email
  - page (number): Page number (default: 1)
  - per_page (number): Results per page (default: 25, max: 100)
  - response_format ('markdown' | 'json'): Output format (default: markdown)

Returns:
  JSON: { "items": [...], "total", "count", "page", "per_page", "offset", "has_more", "next_page", "next_offset" }
  Each ticket carries both "id" (internal, used by every other tool) and "number" (display label).

Examples:
  - Open tickets of a group: { "state": "open", "group": "Users" }
  - Free text: { "query": "printer", "per_page": 10 }`,
      inputSchema: SearchTicketsInputSchema.shape,
      annotations: READ_ONLY
    },
    async args => toCallToolResult(await handlers.searchTickets(args))
  );

  // -------------------------------------------------------------------------
  // zammad_get_ticket
  // -------------------------------------------------------------------------
  server.registerTool(
    'zammad_get_ticket',
    {
      title: 'Get Zammad Ticket',
      description: `Get one Zammad ticket by its internal ID, optionally with its articles.

Args:
  - ticket_id (number): Internal ticket ID (the "id" of search results, NOT the display "number")
  - include_articles (boolean): Include articles (default: true)
  - article_limit (number): Maximum articles, -1 for all (default: 10)
  - article_offset (number): Articles to skip (default: 0)
  - response_format ('markdown' | 'json'): Output format (default: markdown)

Returns:
  The ticket with state, priority, group, owner, customer, organization and timestamps.
  Markdown shows at most 500 characters of each article body.

Examples:
  - { "ticket_id": 3 }
  - Later articles: { "ticket_id": 3, "article_offset": 10, "article_limit": 10 }

Error Handling:
  - A not-found explains the ID/number distinction; search first when only the number is known`,
      inputSchema: GetTicketInputSchema.shape,
      annotations: READ_ONLY
    },
    async args => toCallToolResult(await handlers.getTicket(args))
  );

  // -------------------------------------------------------------------------
  // zammad_create_ticket
  // -------------------------------------------------------------------------
  server.registerTool(
    'zammad_create_ticket',
    {
      title: 'Create Zammad Ticket',
      description: `Create a Zammad ticket with its first article.

Args:
  - title (string): Ticket title (max 200 characters)
  - group (string): Group name, see zammad_list_groups
  - customer (string): Customer email or login
  - article_body (string): Body of the first article
  - state (string, optional): Initial state (default: "new")
  - priority (string, optional): Priority (default: "2 normal")
  - article_type ('note' | 'email' | 'phone', optional): First article type (default: note)
  - article_internal (boolean, optional): Hide the first article from the customer (default: false)
  - response_format ('markdown' | 'json'): Output format (default: markdown)

Returns:
  The created ticket including its internal "id" and display "number".`,
      inputSchema: CreateTicketInputSchema.shape,
      annotations: WRITE
    },
    async args => toCallToolResult(await handlers.createTicket(args))
  );

  // -------------------------------------------------------------------------
  // zammad_update_ticket
  // -------------------------------------------------------------------------
  server.registerTool(
    'zammad_update_ticket',
    {
      title: 'Update Zammad Ticket',
      description: `Update fields of an existing Zammad ticket. At least one field besides ticket_id is required.

Args:
  - ticket_id (number): Internal ticket ID
  - title (string, optional): New title
  - state (string, optional): New state name, see zammad_list_ticket_states
  - priority (string, optional): New priority name
  - owner (string, optional): New owner login or email
  - group (string, optional): New group name
  - pending_time (string, optional): ISO-8601 timestamp with offset, required by pending states
  - response_format ('markdown' | 'json'): Output format (default: markdown)

Examples:
  - Close: { "ticket_id": 3, "state": "closed" }
  - Snooze: { "ticket_id": 3, "state": "pending reminder", "pending_time": "2024-02-01T09:00:00Z" }`,
      inputSchema: UpdateTicketInputSchema.shape,
      annotations: WRITE
    },
    async args => toCallToolResult(await handlers.updateTicket(args))
  );

  // -------------------------------------------------------------------------
  // zammad_get_ticket_stats
  // -------------------------------------------------------------------------
  server.registerTool(
    'zammad_get_ticket_stats',
    {
      title: 'Get Zammad Ticket Statistics',
      description: `Count tickets by state category (open, closed, pending) and escalation, optionally for one group.

Walks the ticket search page by page, so large installations take a while.

Args:
  - group (string, optional): Only count tickets of this group
  - response_format ('markdown' | 'json'): Output format (default: markdown)

Returns:
  total_count, open_count, closed_count, pending_count, escalated_count,
  avg_first_response_time and avg_resolution_time (minutes, null when unknown),
  pages_scanned, skipped_tickets and whether the scan completed.`,
      inputSchema: GetTicketStatsInputSchema.shape,
      annotations: READ_ONLY
    },
    async args => toCallToolResult(await handlers.getTicketStats(args))
  );
}

// ============================================================================
// Articles & Attachments
// ============================================================================

function registerArticleTools(server: McpServer, handlers: ToolHandlers): void {
  server.registerTool(
    'zammad_add_article',
    {
      title: 'Add Article to Zammad Ticket',
      description: `Add an article (note, email or phone log) to a ticket, with up to 10 attachments.

Args:
  - ticket_id (number): Internal ticket ID
  - body (string): Article body (max 100,000 characters)
  - type ('note' | 'email' | 'phone', optional): default note
  - internal (boolean, optional): default false
  - sender ('Agent' | 'Customer' | 'System', optional): default Agent
  - content_type ('text/plain' | 'text/html', optional): default text/plain
  - attachments (array, optional): [{ "filename", "data" (base64), "mime_type" (optional) }]
  - response_format ('markdown' | 'json'): Output format (default: markdown)

Examples:
  - Internal note: { "ticket_id": 3, "body": "Called the customer", "internal": true }
  - With a file: { "ticket_id": 3, "body": "Log attached", "attachments": [{ "filename": "error.log", "data": "aGVsbG8=" }] }`,
      inputSchema: AddArticleInputSchema.shape,
      annotations: WRITE
    },
    async args => toCallToolResult(await handlers.addArticle(args))
  );

  server.registerTool(
    'zammad_get_article_attachments',
    {
      title: 'List Zammad Article Attachments',
      description: `List the attachments of one article.

Args:
  - ticket_id (number): Internal ticket ID the article belongs to
  - article_id (number): Article ID
  - response_format ('markdown' | 'json'): Output format (default: markdown)

Returns:
  Attachment id, filename, size and content type; use the id with zammad_download_attachment.`,
      inputSchema: GetArticleAttachmentsInputSchema.shape,
      annotations: READ_ONLY
    },
    async args => toCallToolResult(await handlers.getArticleAttachments(args))
  );

  server.registerTool(
    'zammad_download_attachment',
    {
      title: 'Download Zammad Attachment',
      description: `Download an attachment as base64, in chunks of 15,000 bytes.

Args:
  - ticket_id (number), article_id (number), attachment_id (number)
  - max_bytes (number): Refuse larger attachments (default: 10,000,000)
  - chunk_offset (number): Byte offset of the chunk (default: 0)

Returns (always JSON):
  { "ticket_id", "article_id", "attachment_id", "size_bytes", "chunk_offset", "chunk_bytes",
    "has_more", "next_chunk_offset", "encoding": "base64", "data" }
  Call again with chunk_offset = next_chunk_offset until has_more is false.`,
      inputSchema: DownloadAttachmentInputSchema.shape,
      annotations: READ_ONLY
    },
    async args => toCallToolResult(await handlers.downloadAttachment(args))
  );

  server.registerTool(
    'zammad_delete_attachment',
    {
      title: 'Delete Zammad Attachment',
      description: `Permanently delete an attachment from an article.

Args:
  - ticket_id (number), article_id (number), attachment_id (number)

This cannot be undone.`,
      inputSchema: DeleteAttachmentInputSchema.shape,
      annotations: {
        readOnlyHint: false,
        destructiveHint: true,
        idempotentHint: true,
        openWorldHint: true
      }
    },
    async args => toCallToolResult(await handlers.deleteAttachment(args))
  );
}

// ============================================================================
// Tags
// ============================================================================

function registerTagTools(server: McpServer, handlers: ToolHandlers): void {
  server.registerTool(
    'zammad_add_ticket_tag',
    {
      title: 'Add Tag to Zammad Ticket',
      description: `Add a tag to a ticket. Adding a tag the ticket already has changes nothing.

Args:
  - ticket_id (number): Internal ticket ID
  - tag (string): Tag name (max 100 characters)
  - response_format ('markdown' | 'json'): Output format (default: markdown)`,
      inputSchema: TicketTagInputSchema.shape,
      annotations: IDEMPOTENT_WRITE
    },
    async args => toCallToolResult(await handlers.addTicketTag(args))
  );

  server.registerTool(
    'zammad_remove_ticket_tag',
    {
      title: 'Remove Tag from Zammad Ticket',
      description: `Remove a tag from a ticket.

Args:
  - ticket_id (number): Internal ticket ID
  - tag (string): Tag name
  - response_format ('markdown' | 'json'): Output format (default: markdown)`,
      inputSchema: TicketTagInputSchema.shape,
      annotations: IDEMPOTENT_WRITE
    },
    async args => toCallToolResult(await handlers.removeTicketTag(args))
  );

  server.registerTool(
    'zammad_get_ticket_tags',
    {
      title: 'Get Zammad Ticket Tags',
      description: `List the tags of a ticket.

Args:
  - ticket_id (number): Internal ticket ID
  - response_format ('markdown' | 'json'): Output format (default: markdown)`,
      inputSchema: GetTicketTagsInputSchema.shape,
      annotations: READ_ONLY
    },
    async args => toCallToolResult(await handlers.getTicketTags(args))
  );
}

// ============================================================================
// Users & Organizations
// ============================================================================

function registerUserTools(server: McpServer, handlers: ToolHandlers): void {
  server.registerTool(
    'zammad_get_user',
    {
      title: 'Get Zammad User',
      description: `Get a Zammad user (agent or customer) by ID.

Args:
  - user_id (number): User ID
  - response_format ('markdown' | 'json'): Output format (default: markdown)`,
      inputSchema: GetUserInputSchema.shape,
      annotations: READ_ONLY
    },
    async args => toCallToolResult(await handlers.getUser(args))
  );

  server.registerTool(
    'zammad_search_users',
    {
      title: 'Search Zammad Users',
      description: `Search users by name, email or login.

Args:
  - query (string): Search text
  - page (number): Page number (default: 1)
  - per_page (number): Results per page (default: 25, max: 100)
  - response_format ('markdown' | 'json'): Output format (default: markdown)`,
      inputSchema: SearchUsersInputSchema.shape,
      annotations: READ_ONLY
    },
    async args => toCallToolResult(await handlers.searchUsers(args))
  );

  server.registerTool(
    'zammad_get_current_user',
    {
      title: 'Get Current Zammad User',
      description: `Get the user the server authenticates as.

Args:
  - response_format ('markdown' | 'json'): Output format (default: markdown)`,
      inputSchema: FormatOnlyInputSchema.shape,
      annotations: READ_ONLY
    },
    async args => toCallToolResult(await handlers.getCurrentUser(args))
  );

  server.registerTool(
    'zammad_get_organization',
    {
      title: 'Get Zammad Organization',
      description: `Get an organization by ID, including its members.

Args:
  - org_id (number): Organization ID
  - response_format ('markdown' | 'json'): Output format (default: markdown)`,
      inputSchema: GetOrganizationInputSchema.shape,
      annotations: READ_ONLY
    },
    async args => toCallToolResult(await handlers.getOrganization(args))
  );

  server.registerTool(
    'zammad_search_organizations',
    {
      title: 'Search Zammad Organizations',
      description: `Search organizations by name or domain.

Args:
  - query (string): Search text
  - page (number): Page number (default: 1)
  - per_page (number): Results per page (default: 25, max: 100)
  - response_format ('markdown' | 'json'): Output format (default: markdown)`,
      inputSchema: SearchOrganizationsInputSchema.shape,
      annotations: READ_ONLY
    },
    async args => toCallToolResult(await handlers.searchOrganizations(args))
  );
}

// ============================================================================
// Reference Data & Maintenance
// ============================================================================

function registerReferenceTools(server: McpServer, handlers: ToolHandlers): void {
  server.registerTool(
    'zammad_list_groups',
    {
      title: 'List Zammad Groups',
      description: `List all groups. Loaded once and kept until zammad_clear_caches.

Args:
  - response_format ('markdown' | 'json'): Output format (default: markdown)`,
      inputSchema: FormatOnlyInputSchema.shape,
      annotations: READ_ONLY
    },
    async args => toCallToolResult(await handlers.listGroups(args))
  );

  server.registerTool(
    'zammad_list_ticket_states',
    {
      title: 'List Zammad Ticket States',
      description: `List all ticket states with their state type. Cached until zammad_clear_caches.

Args:
  - response_format ('markdown' | 'json'): Output format (default: markdown)`,
      inputSchema: FormatOnlyInputSchema.shape,
      annotations: READ_ONLY
    },
    async args => toCallToolResult(await handlers.listTicketStates(args))
  );

  server.registerTool(
    'zammad_list_ticket_priorities',
    {
      title: 'List Zammad Ticket Priorities',
      description: `List all ticket priorities. Cached until zammad_clear_caches.

Args:
  - response_format ('markdown' | 'json'): Output format (default: markdown)`,
      inputSchema: FormatOnlyInputSchema.shape,
      annotations: READ_ONLY
    },
    async args => toCallToolResult(await handlers.listTicketPriorities(args))
  );

  server.registerTool(
    'zammad_clear_caches',
    {
      title: 'Clear Zammad Caches',
      description: `Drop the cached groups, ticket states and ticket priorities so the next call reloads them.

Use after changing these catalogs in the Zammad admin interface.`,
      inputSchema: ClearCachesInputSchema.shape,
      annotations: {
        readOnlyHint: false,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: false
      }
    },
    async args => toCallToolResult(await handlers.clearCaches(args))
  );
}

// ============================================================================
// Resources
// ============================================================================

function registerResources(server: McpServer, handlers: ToolHandlers): void {
  server.registerResource(
    'ticket',
    new ResourceTemplate('zammad://ticket/{ticket_id}', { list: undefined }),
    { description: 'Zammad ticket with its first 20 articles', mimeType: 'text/markdown' },
    async (uri, variables) => toResourceResult(uri, await handlers.readTicketResource(variable(variables.ticket_id)))
  );

  server.registerResource(
    'user',
    new ResourceTemplate('zammad://user/{user_id}', { list: undefined }),
    { description: 'Zammad user profile', mimeType: 'text/markdown' },
    async (uri, variables) => toResourceResult(uri, await handlers.readUserResource(variable(variables.user_id)))
  );

  server.registerResource(
    'organization',
    new ResourceTemplate('zammad://organization/{org_id}', { list: undefined }),
    { description: 'Zammad organization with its members', mimeType: 'text/markdown' },
    async (uri, variables) => toResourceResult(uri, await handlers.readOrganizationResource(variable(variables.org_id)))
  );

  server.registerResource(
    'queue',
    new ResourceTemplate('zammad://queue/{group}', { list: undefined }),
    { description: 'Latest 50 tickets of a group, grouped by state', mimeType: 'text/markdown' },
    async (uri, variables) => toResourceResult(uri, await handlers.readQueueResource(variable(variables.group)))
  );
}

// ============================================================================
// Prompts
// ============================================================================

function registerPrompts(server: McpServer): void {
  server.registerPrompt(
    'analyze_ticket',
    {
      title: 'Analyze Ticket',
      description: 'Summarize a ticket, its history and the next step',
      argsSchema: {
        ticket_id: z.string().describe('Internal ticket ID')
      }
    },
    ({ ticket_id }) => userPrompt(analyzeTicketPrompt(ticket_id))
  );

  server.registerPrompt(
    'draft_response',
    {
      title: 'Draft Response',
      description: 'Draft a customer reply for a ticket',
      argsSchema: {
        ticket_id: z.string().describe('Internal ticket ID'),
        tone: z.string().optional().describe(`Tone of the reply (default: ${DEFAULT_TONE})`)
      }
    },
    ({ ticket_id, tone }) => userPrompt(draftResponsePrompt(ticket_id, tone))
  );

  server.registerPrompt(
    'escalation_summary',
    {
      title: 'Escalation Summary',
      description: 'Summarize escalated and at-risk tickets',
      argsSchema: {
        group: z.string().optional().describe('Limit the summary to one group')
      }
    },
    ({ group }) => userPrompt(escalationSummaryPrompt(group))
  );
}
