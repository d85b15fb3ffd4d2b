#!/usr/bin/env node

/**
 * Zammad MCP Server
 *
 * Exposes the Zammad REST API as MCP tools, resources and prompts over
 * stdio (default) or stateless Streamable HTTP.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Server } from 'http';

// Configuration
import { Configuration } from './config/Configuration.js';

// Infrastructure
import { Logger } from './infrastructure/logging/Logger.js';
import { ConfigurationError } from './infrastructure/errors/ConfigurationError.js';
import { closeHttpServer, startHttpTransport } from './infrastructure/transport/httpTransport.js';

// Application
import { ServerRuntime } from './application/ServerRuntime.js';
import { createMcpServer } from './server.js';

// Constants
import { SERVER_NAME, SERVER_VERSION } from './constants.js';

// ============================================================================
// Server Startup
// ============================================================================

async function main(): Promise<void> {
  let config: Configuration;
  try {
    config = new Configuration();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      new Logger('error').error(`Configuration error: ${error.message}`);
      process.exit(1);
    }
    throw error;
  }

  const logger = new Logger(config.logLevel, config.logFile ?? undefined);
  logger.info(`Starting ${SERVER_NAME} v${SERVER_VERSION}...`);
  config.logSummary(logger);

  const runtime = ServerRuntime.fromConfiguration(config, logger);
  await runtime.init();

  let httpServer: Server | null = null;
  if (config.transport === 'http' && config.port !== null) {
    httpServer = await startHttpTransport({
      host: config.host,
      port: config.port,
      logger: logger.child('HTTP'),
      createServer: () => createMcpServer(runtime.handlers)
    });
  } else {
    const server = createMcpServer(runtime.handlers);
    await server.connect(new StdioServerTransport());
  }

  logger.info('Server running and ready');

  // Handle graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`Received ${signal}, shutting down...`);
    runtime.shutdown();
    if (httpServer) {
      await closeHttpServer(httpServer);
    }
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch(error => {
        logger.error('Shutdown failed', error);
        process.exit(1);
      });
    });
  }
}

// Start server
main().catch(error => {
  new Logger('error').error('Failed to start server:', error);
  process.exit(1);
});
