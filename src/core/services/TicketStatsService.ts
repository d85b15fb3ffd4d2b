import { MAX_PAGES_FOR_TICKET_SCAN, MAX_PER_PAGE } from '../../constants.js';
import type { Log } from '../../infrastructure/logging/Logger.js';
import type { IZammadClient } from '../repositories/IZammadClient.js';
import { safeValidate } from '../validation/EntityValidator.js';
import type { Ticket, TicketStatistics } from '../entities/Ticket.js';
import type { ReferenceDataService } from './ReferenceDataService.js';

export interface TicketStatsResult {
  readonly stats: TicketStatistics;
  readonly pages: number;
  readonly skipped: number;
  /** True when the scan stopped at the page cap before running out of tickets */
  readonly capped: boolean;
}

const MS_PER_MINUTE = 60_000;

/**
 * Ticket Statistics Service
 * Aggregates counts by walking the ticket search page by page.
 */
export class TicketStatsService {
  constructor(
    private readonly client: IZammadClient,
    private readonly referenceData: ReferenceDataService,
    private readonly logger: Log,
    private readonly maxPages: number = MAX_PAGES_FOR_TICKET_SCAN
  ) {}

  async collect(group?: string): Promise<TicketStatsResult> {
    const started = Date.now();
    const categorize = await this.referenceData.stateCategorizer();

    let total = 0;
    let open = 0;
    let closed = 0;
    let pending = 0;
    let escalated = 0;
    let skipped = 0;
    const firstResponseMinutes: number[] = [];
    const resolutionMinutes: number[] = [];

    let page = 1;
    let capped = false;
    for (;;) {
      const batch = await this.client.searchTickets({ group, page, perPage: MAX_PER_PAGE });

      for (const raw of batch.items) {
        const result = safeValidate('ticket', raw, { unknownKeys: 'strip' });
        if (!result.ok) {
          skipped++;
          this.logger.warn(`Skipping ticket in statistics: ${result.error.message}`);
          continue;
        }
        const ticket = result.value;

        total++;
        switch (categorize(ticket)) {
          case 'open':
            open++;
            break;
          case 'closed':
            closed++;
            break;
          case 'pending':
            pending++;
            break;
          case 'other':
            break;
        }
        if (isEscalated(ticket)) {
          escalated++;
        }
        pushDuration(firstResponseMinutes, ticket.created_at, ticket.first_response_at);
        pushDuration(resolutionMinutes, ticket.created_at, ticket.close_at);
      }

      if (batch.items.length < MAX_PER_PAGE) {
        break;
      }
      if (page >= this.maxPages) {
        capped = true;
        this.logger.warn(
          `Reached maximum page limit (${this.maxPages} pages) after ${total} tickets; statistics are incomplete`
        );
        break;
      }
      page++;
    }

    this.logger.info(
      `Ticket statistics complete: ${total} tickets across ${page} pages in ${Date.now() - started} ms ` +
        `(open=${open}, closed=${closed}, pending=${pending}, escalated=${escalated})`
    );

    return {
      stats: {
        total_count: total,
        open_count: open,
        closed_count: closed,
        pending_count: pending,
        escalated_count: escalated,
        avg_first_response_time: average(firstResponseMinutes),
        avg_resolution_time: average(resolutionMinutes)
      },
      pages: page,
      skipped,
      capped
    };
  }
}

function isEscalated(ticket: Ticket): boolean {
  return Boolean(
    ticket.first_response_escalation_at || ticket.close_escalation_at || ticket.update_escalation_at
  );
}

function pushDuration(target: number[], from: string, to: string | null | undefined): void {
  if (!to) {
    return;
  }
  const minutes = (Date.parse(to) - Date.parse(from)) / MS_PER_MINUTE;
  if (Number.isFinite(minutes) && minutes >= 0) {
    target.push(minutes);
  }
}

/** Mean in minutes, rounded to one decimal */
function average(values: readonly number[]): number | null {
  if (values.length === 0) {
    return null;
  }
  const sum = values.reduce((acc, value) => acc + value, 0);
  return Math.round((sum / values.length) * 10) / 10;
}
