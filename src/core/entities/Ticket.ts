import type { NormalizedField } from './NormalizedField.js';
import type { JsonObject } from './Json.js';

/**
 * Ticket Entity - Domain Model
 *
 * `id` is the internal database id every API call expects;
 * `number` is the display label shown to humans ("Ticket #65003").
 */
export interface Ticket {
  readonly id: number;
  readonly number: string;
  readonly title: string;
  readonly group_id: number;
  readonly state_id: number;
  readonly priority_id: number;
  readonly customer_id: number;
  readonly owner_id?: number | null;
  readonly organization_id?: number | null;
  readonly created_by_id?: number | null;
  readonly updated_by_id?: number | null;
  readonly created_at: string;
  readonly updated_at: string;
  readonly pending_time?: string | null;
  readonly first_response_at?: string | null;
  readonly first_response_escalation_at?: string | null;
  readonly close_at?: string | null;
  readonly close_escalation_at?: string | null;
  readonly update_escalation_at?: string | null;
  readonly escalation_at?: string | null;
  readonly last_contact_at?: string | null;
  readonly last_contact_agent_at?: string | null;
  readonly last_contact_customer_at?: string | null;
  readonly article_count?: number | null;

  // Expanded relations
  readonly group: NormalizedField;
  readonly state: NormalizedField;
  readonly priority: NormalizedField;
  readonly customer: NormalizedField;
  readonly owner: NormalizedField;
  readonly organization: NormalizedField;
  readonly created_by: NormalizedField;
  readonly updated_by: NormalizedField;

  readonly articles?: readonly Article[];
}

/**
 * Ticket article (message, note, phone log)
 */
export interface Article {
  readonly id: number;
  readonly ticket_id: number;
  readonly type?: string | null;
  readonly sender?: string | null;
  readonly from?: string | null;
  readonly to?: string | null;
  readonly cc?: string | null;
  readonly subject?: string | null;
  readonly body: string;
  readonly content_type?: string | null;
  readonly internal?: boolean;
  readonly created_by_id?: number | null;
  readonly updated_by_id?: number | null;
  readonly created_at: string;
  readonly updated_at?: string | null;
  readonly created_by: NormalizedField;
  readonly updated_by: NormalizedField;
  readonly attachments?: readonly Attachment[];
}

/**
 * Attachment metadata as listed on an article
 */
export interface Attachment {
  readonly id: number;
  readonly filename: string;
  readonly size?: number | null;
  readonly content_type?: string | null;
  readonly preferences?: Readonly<JsonObject>;
  readonly created_at?: string | null;
}

export type ArticleType = 'note' | 'email' | 'phone';
export type ArticleSender = 'Agent' | 'Customer' | 'System';
export type ArticleContentType = 'text/plain' | 'text/html';

/**
 * Ticket statistics aggregated from a paged search scan
 */
export interface TicketStatistics {
  readonly total_count: number;
  readonly open_count: number;
  readonly closed_count: number;
  readonly pending_count: number;
  readonly escalated_count: number;
  readonly avg_first_response_time: number | null;
  readonly avg_resolution_time: number | null;
}
