import type { Configuration } from '../config/Configuration.js';
import type { IZammadClient } from '../core/repositories/IZammadClient.js';
import { ReferenceDataService } from '../core/services/ReferenceDataService.js';
import { TicketStatsService } from '../core/services/TicketStatsService.js';
import { validate } from '../core/validation/EntityValidator.js';
import { ZammadApiClient } from '../infrastructure/http/ZammadApiClient.js';
import type { Log } from '../infrastructure/logging/Logger.js';
import { ToolHandlers } from './handlers/ToolHandlers.js';

/**
 * Owns the long-lived pieces of one server process: the API client,
 * the reference-data caches and the handlers built on them.
 */
export class ServerRuntime {
  readonly referenceData: ReferenceDataService;
  readonly stats: TicketStatsService;
  readonly handlers: ToolHandlers;
  private readonly logger: Log;

  constructor(
    private readonly client: IZammadClient,
    logger: Log
  ) {
    this.logger = logger.child('Runtime');
    this.referenceData = new ReferenceDataService(client, logger.child('ReferenceData'));
    this.stats = new TicketStatsService(client, this.referenceData, logger.child('Stats'));
    this.handlers = new ToolHandlers(client, this.referenceData, this.stats, logger);
  }

  static fromConfiguration(config: Configuration, logger: Log): ServerRuntime {
    const client = new ZammadApiClient({
      baseUrl: config.zammadUrl,
      auth: config.auth,
      timeoutMs: config.timeoutMs,
      rejectUnauthorized: config.rejectUnauthorized,
      logger: logger.child('ZammadApi')
    });
    return new ServerRuntime(client, logger);
  }

  /**
   * Verify URL and credentials by fetching the authenticated user
   */
  async init(): Promise<void> {
    const user = validate('user', await this.client.getCurrentUser(), { unknownKeys: 'strip' });
    this.logger.info(`Connected to Zammad as ${user.login ?? user.email ?? `user ${user.id}`}`);
  }

  shutdown(): void {
    this.referenceData.clearCaches();
    this.client.destroy();
    this.logger.info('Runtime shut down');
  }
}
