import type { Article, Attachment, Ticket } from './Ticket.js';
import type { Organization, User } from './User.js';
import type { Group, TicketPriority, TicketState } from './ReferenceData.js';

/** Entity kinds read from the remote API */
export interface EntityMap {
  ticket: Ticket;
  article: Article;
  user: User;
  organization: Organization;
  group: Group;
  state: TicketState;
  priority: TicketPriority;
  attachment: Attachment;
}

export type EntityKind = keyof EntityMap;

/** A validated record tagged with its kind */
export type Entity = { [K in EntityKind]: { readonly kind: K; readonly value: EntityMap[K] } }[EntityKind];

export function entity<K extends EntityKind>(kind: K, value: EntityMap[K]): Extract<Entity, { kind: K }>;
export function entity(kind: EntityKind, value: EntityMap[EntityKind]): { kind: EntityKind; value: EntityMap[EntityKind] } {
  return { kind, value };
}
