import type { ArticleCreate, TicketCreate, TicketUpdate } from '../entities/Inputs.js';

/**
 * One page of search hits as returned by the API, before validation.
 * `total` is null when the endpoint did not report a count.
 */
export interface SearchResult {
  readonly items: readonly unknown[];
  readonly total: number | null;
}

export interface TicketSearchQuery {
  readonly query?: string;
  readonly state?: string;
  readonly priority?: string;
  readonly group?: string;
  readonly owner?: string;
  readonly customer?: string;
  readonly page: number;
  readonly perPage: number;
}

export interface UserSearchQuery {
  readonly query: string;
  readonly page: number;
  readonly perPage: number;
}

/**
 * Zammad REST API surface used by the tool handlers.
 * Methods return raw JSON; validation happens in the caller.
 */
export interface IZammadClient {
  searchTickets(query: TicketSearchQuery): Promise<SearchResult>;
  getTicket(ticketId: number): Promise<unknown>;
  getTicketArticles(ticketId: number): Promise<readonly unknown[]>;
  createTicket(input: TicketCreate): Promise<unknown>;
  updateTicket(update: TicketUpdate): Promise<unknown>;

  addArticle(input: ArticleCreate): Promise<unknown>;
  getArticle(articleId: number): Promise<unknown>;
  downloadAttachment(ticketId: number, articleId: number, attachmentId: number): Promise<Buffer>;
  deleteAttachment(ticketId: number, articleId: number, attachmentId: number): Promise<void>;

  getTicketTags(ticketId: number): Promise<string[]>;
  addTicketTag(ticketId: number, tag: string): Promise<void>;
  removeTicketTag(ticketId: number, tag: string): Promise<void>;

  getUser(userId: number): Promise<unknown>;
  searchUsers(query: UserSearchQuery): Promise<SearchResult>;
  getCurrentUser(): Promise<unknown>;
  getOrganization(organizationId: number): Promise<unknown>;
  searchOrganizations(query: UserSearchQuery): Promise<SearchResult>;

  getGroups(): Promise<readonly unknown[]>;
  getTicketStates(): Promise<readonly unknown[]>;
  getTicketPriorities(): Promise<readonly unknown[]>;

  /** Release pooled connections */
  destroy(): void;
}
