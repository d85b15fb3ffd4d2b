import type { ArticleContentType, ArticleSender, ArticleType } from './Ticket.js';

/**
 * Caller-supplied records, validated before any remote call.
 */
export interface TicketCreate {
  readonly title: string;
  readonly group: string;
  readonly customer: string;
  readonly article_body: string;
  readonly state: string;
  readonly priority: string;
  readonly article_type: ArticleType;
  readonly article_internal: boolean;
}

export interface TicketUpdate {
  readonly ticket_id: number;
  readonly title?: string;
  readonly state?: string;
  readonly priority?: string;
  readonly owner?: string;
  readonly group?: string;
  readonly pending_time?: string;
}

/**
 * Transient upload record; exists only for the duration of an add-article call.
 * `filename` is already reduced to its base name.
 */
export interface AttachmentUpload {
  readonly filename: string;
  readonly data: string;
  readonly mime_type: string;
}

export interface ArticleCreate {
  readonly ticket_id: number;
  readonly body: string;
  readonly type: ArticleType;
  readonly internal: boolean;
  readonly sender: ArticleSender;
  readonly content_type: ArticleContentType;
  readonly attachments: readonly AttachmentUpload[];
}
