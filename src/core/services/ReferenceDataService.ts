import { MemoSlot } from '../../infrastructure/cache/MemoSlot.js';
import type { Log } from '../../infrastructure/logging/Logger.js';
import type { IZammadClient } from '../repositories/IZammadClient.js';
import { validateList, type ValidatedKind } from '../validation/EntityValidator.js';
import { displayName } from '../normalization/FieldNormalizer.js';
import { StateType, type Group, type TicketPriority, type TicketState } from '../entities/ReferenceData.js';
import type { Ticket } from '../entities/Ticket.js';

export type StateCategory = 'open' | 'closed' | 'pending' | 'other';

/**
 * Reference Data Service
 * Groups, ticket states and ticket priorities, memoized until cleared.
 */
export class ReferenceDataService {
  private readonly groups: MemoSlot<Group[]>;
  private readonly states: MemoSlot<TicketState[]>;
  private readonly priorities: MemoSlot<TicketPriority[]>;

  constructor(
    private readonly client: IZammadClient,
    private readonly logger: Log
  ) {
    this.groups = new MemoSlot(async () => this.validated('group', await this.client.getGroups()));
    this.states = new MemoSlot(async () => this.validated('state', await this.client.getTicketStates()));
    this.priorities = new MemoSlot(async () => this.validated('priority', await this.client.getTicketPriorities()));
  }

  getGroups(): Promise<Group[]> {
    return this.groups.get();
  }

  getTicketStates(): Promise<TicketState[]> {
    return this.states.get();
  }

  getTicketPriorities(): Promise<TicketPriority[]> {
    return this.priorities.get();
  }

  /**
   * Drop every memoized list; the next read loads fresh data
   */
  clearCaches(): void {
    this.groups.clear();
    this.states.clear();
    this.priorities.clear();
    this.logger.info('Reference data caches cleared');
  }

  /**
   * Categorize a ticket by its state type (new/open, closed, pending).
   * Looks the state up by id, then by name.
   */
  async stateCategorizer(): Promise<(ticket: Ticket) => StateCategory> {
    const states = await this.getTicketStates();
    const byId = new Map(states.map(state => [state.id, state.state_type_id]));
    const byName = new Map(states.map(state => [state.name.toLowerCase(), state.state_type_id]));

    return (ticket: Ticket) => {
      const typeId = byId.get(ticket.state_id) ?? byName.get(displayName(ticket.state).toLowerCase());
      return categorize(typeId);
    };
  }

  private validated<K extends 'group' | 'state' | 'priority'>(kind: K, raw: readonly unknown[]) {
    const dropped = new Set<string>();
    const items = validateList(kind, raw, {
      unknownKeys: 'strip',
      onWarning: message => this.logger.warn(`${kind}: ${message}`),
      onDroppedKeys: (_kind: ValidatedKind, keys: string[]) => keys.forEach(key => dropped.add(key))
    });
    if (dropped.size > 0) {
      this.logger.debug(`Ignored ${kind} attributes: ${[...dropped].sort().join(', ')}`);
    }
    this.logger.debug(`Loaded ${items.length} ${kind} records`);
    return items;
  }
}

function categorize(stateTypeId: number | undefined): StateCategory {
  switch (stateTypeId) {
    case StateType.NEW:
    case StateType.OPEN:
      return 'open';
    case StateType.CLOSED:
      return 'closed';
    case StateType.PENDING_REMINDER:
    case StateType.PENDING_CLOSE:
      return 'pending';
    default:
      return 'other';
  }
}
