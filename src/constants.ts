/**
 * Shared constants for the Zammad MCP Server
 */

// Response size limits
export const CHARACTER_LIMIT = 25000; // Maximum response size in characters
export const ARTICLE_EXCERPT_LENGTH = 500; // Per-article body excerpt in markdown output

// Pagination defaults
export const DEFAULT_PER_PAGE = 25;
export const MAX_PER_PAGE = 100;

// Ticket articles
export const DEFAULT_ARTICLE_LIMIT = 10;
export const RESOURCE_ARTICLE_LIMIT = 20;
export const MAX_ARTICLE_BODY_LENGTH = 100000;

// Attachments
export const MAX_ATTACHMENTS = 10;
export const MAX_FILENAME_LENGTH = 255;
export const DEFAULT_MAX_ATTACHMENT_BYTES = 10_000_000;
export const DOWNLOAD_CHUNK_BYTES = 15_000; // base64 of one chunk stays well under CHARACTER_LIMIT

// Statistics and queue views
export const MAX_PAGES_FOR_TICKET_SCAN = 1000;
export const QUEUE_TICKETS_PER_PAGE = 50;
export const MAX_TICKETS_PER_STATE_IN_QUEUE = 10;

// API timeouts
export const API_TIMEOUT_MS = 30000;

// Server info
export const SERVER_NAME = 'zammad-mcp-server';
export const SERVER_VERSION = '1.0.0';
