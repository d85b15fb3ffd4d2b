/**
 * Closed catalogs Zammad exposes as complete lists:
 * groups, ticket states and ticket priorities.
 */
export interface Group {
  readonly id: number;
  readonly name: string;
  readonly assignment_timeout?: number | null;
  readonly follow_up_possible?: string | null;
  readonly follow_up_assignment?: boolean;
  readonly email_address_id?: number | null;
  readonly signature_id?: number | null;
  readonly note?: string | null;
  readonly active?: boolean;
  readonly created_by_id?: number | null;
  readonly updated_by_id?: number | null;
  readonly created_at: string;
  readonly updated_at: string;
}

export interface TicketState {
  readonly id: number;
  readonly name: string;
  readonly state_type_id: number;
  readonly next_state_id?: number | null;
  readonly ignore_escalation?: boolean;
  readonly default_create?: boolean;
  readonly default_follow_up?: boolean;
  readonly note?: string | null;
  readonly active?: boolean;
  readonly created_by_id?: number | null;
  readonly updated_by_id?: number | null;
  readonly created_at: string;
  readonly updated_at: string;
}

export interface TicketPriority {
  readonly id: number;
  readonly name: string;
  readonly default_create?: boolean;
  readonly ui_icon?: string | null;
  readonly ui_color?: string | null;
  readonly note?: string | null;
  readonly active?: boolean;
  readonly created_by_id?: number | null;
  readonly updated_by_id?: number | null;
  readonly created_at: string;
  readonly updated_at: string;
}

/** Zammad state type ids */
export enum StateType {
  NEW = 1,
  OPEN = 2,
  CLOSED = 3,
  PENDING_REMINDER = 4,
  PENDING_CLOSE = 5
}
