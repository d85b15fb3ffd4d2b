/**
 * Request and response shapes of the Zammad REST API (v1) that the client
 * builds or unwraps itself. Entity payloads stay `unknown` until validated.
 */

/** Credentials, in order of precedence */
export type ZammadAuth =
  | { readonly type: 'token'; readonly token: string }
  | { readonly type: 'oauth2'; readonly token: string }
  | { readonly type: 'basic'; readonly username: string; readonly password: string };

/** POST /tickets */
export interface CreateTicketRequest {
  title: string;
  group: string;
  customer: string;
  state: string;
  priority: string;
  article: {
    subject: string;
    body: string;
    type: string;
    internal: boolean;
  };
}

/** PUT /tickets/{id} */
export type UpdateTicketRequest = Partial<Record<'title' | 'state' | 'priority' | 'owner' | 'group' | 'pending_time', string>>;

/** POST /ticket_articles */
export interface CreateArticleRequest {
  ticket_id: number;
  body: string;
  type: string;
  internal: boolean;
  sender: string;
  content_type: string;
  attachments?: Array<{ filename: string; data: string; 'mime-type': string }>;
}

/** POST /tags/add, DELETE /tags/remove */
export interface TagRequest {
  object: 'Ticket';
  o_id: number;
  item: string;
}

/** Error body, e.g. {"error": "Couldn't find Ticket with 'id'=65003"} */
export interface ErrorResponse {
  error?: string;
  error_human?: string;
}
