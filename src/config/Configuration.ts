import * as dotenv from 'dotenv';
import { existsSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';

import { API_TIMEOUT_MS } from '../constants.js';
import { ConfigurationError } from '../infrastructure/errors/ConfigurationError.js';
import type { ZammadAuth } from '../infrastructure/http/types/ApiResponseTypes.js';
import { isLogLevel, type Log, type LogLevel } from '../infrastructure/logging/Logger.js';

export type TransportMode = 'stdio' | 'http';

export type Environment = Readonly<Record<string, string | undefined>>;

export const DEFAULT_HTTP_HOST = '127.0.0.1';

/**
 * Load `.env` from the deployment directory, falling back to the working
 * directory, and return the merged process environment.
 */
export function loadEnvironment(): Environment {
  const envPath = join(homedir(), '.config', 'zammad-mcp', '.env');
  if (existsSync(envPath)) {
    dotenv.config({ path: envPath });
  } else {
    dotenv.config();
  }
  return process.env;
}

/**
 * Application Configuration
 * Reads and validates the environment once at startup.
 */
export class Configuration {
  // Zammad API (REQUIRED)
  public readonly zammadUrl: string;
  public readonly auth: ZammadAuth;
  public readonly timeoutMs: number;
  public readonly rejectUnauthorized: boolean;

  // MCP transport
  public readonly transport: TransportMode;
  public readonly host: string;
  public readonly port: number | null;

  // Logging
  public readonly logLevel: LogLevel;
  public readonly logFile: string | null;

  constructor(private readonly env: Environment = loadEnvironment()) {
    this.zammadUrl = this.parseUrl(this.getRequired('ZAMMAD_URL'));
    this.auth = this.resolveAuth();
    this.timeoutMs = this.parsePositiveInt('ZAMMAD_TIMEOUT_MS', API_TIMEOUT_MS);
    this.rejectUnauthorized = this.parseBoolean('ZAMMAD_REJECT_UNAUTHORIZED', true);

    this.transport = this.parseTransport();
    this.host = this.get('MCP_HOST', DEFAULT_HTTP_HOST);
    this.port = this.parsePort();

    this.logLevel = this.parseLogLevel();
    this.logFile = this.get('LOG_FILE', '') || null;
  }

  /**
   * Get environment variable with default (blank counts as unset)
   */
  private get(key: string, defaultValue: string): string {
    const value = this.env[key]?.trim();
    return value ? value : defaultValue;
  }

  /**
   * Get required environment variable
   */
  private getRequired(key: string): string {
    const value = this.get(key, '');
    if (!value) {
      throw new ConfigurationError(`Missing required environment variable: ${key}`, key);
    }
    return value;
  }

  private parseUrl(raw: string): string {
    let url: URL;
    try {
      url = new URL(raw);
    } catch {
      throw new ConfigurationError(`Invalid ZAMMAD_URL: ${raw}`, 'ZAMMAD_URL');
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      throw new ConfigurationError(`ZAMMAD_URL must use http or https, got ${url.protocol}`, 'ZAMMAD_URL');
    }
    return raw.replace(/\/+$/, '');
  }

  /**
   * HTTP token, then OAuth2 token, then username and password
   */
  private resolveAuth(): ZammadAuth {
    const token = this.get('ZAMMAD_HTTP_TOKEN', '');
    if (token) {
      return { type: 'token', token };
    }

    const oauth2Token = this.get('ZAMMAD_OAUTH2_TOKEN', '');
    if (oauth2Token) {
      return { type: 'oauth2', token: oauth2Token };
    }

    const username = this.get('ZAMMAD_USERNAME', '');
    const password = this.get('ZAMMAD_PASSWORD', '');
    if (username && password) {
      return { type: 'basic', username, password };
    }
    if (username || password) {
      const missing = username ? 'ZAMMAD_PASSWORD' : 'ZAMMAD_USERNAME';
      throw new ConfigurationError(`Basic authentication requires both ZAMMAD_USERNAME and ZAMMAD_PASSWORD; ${missing} is not set`, missing);
    }

    let message = 'No Zammad credentials configured. Set ZAMMAD_HTTP_TOKEN, ZAMMAD_OAUTH2_TOKEN, ' +
      'or ZAMMAD_USERNAME and ZAMMAD_PASSWORD';
    if (this.get('ZAMMAD_TOKEN', '')) {
      message += '. Found ZAMMAD_TOKEN: rename it to ZAMMAD_HTTP_TOKEN';
    }
    throw new ConfigurationError(message, 'ZAMMAD_HTTP_TOKEN');
  }

  private parsePositiveInt(key: string, defaultValue: number): number {
    const raw = this.get(key, '');
    if (!raw) {
      return defaultValue;
    }
    if (!/^\d+$/.test(raw) || Number(raw) <= 0) {
      throw new ConfigurationError(`${key} must be a positive integer, got "${raw}"`, key);
    }
    return Number(raw);
  }

  private parseBoolean(key: string, defaultValue: boolean): boolean {
    const raw = this.get(key, '').toLowerCase();
    if (!raw) {
      return defaultValue;
    }
    if (['true', '1', 'yes'].includes(raw)) {
      return true;
    }
    if (['false', '0', 'no'].includes(raw)) {
      return false;
    }
    throw new ConfigurationError(`${key} must be true or false, got "${raw}"`, key);
  }

  private parseTransport(): TransportMode {
    const raw = this.get('MCP_TRANSPORT', 'stdio').toLowerCase();
    if (raw === 'stdio' || raw === 'http') {
      return raw;
    }
    throw new ConfigurationError(`Invalid transport type: ${raw}. Must be one of: stdio, http`, 'MCP_TRANSPORT');
  }

  private parsePort(): number | null {
    const raw = this.get('MCP_PORT', '');
    if (!raw) {
      if (this.transport === 'http') {
        throw new ConfigurationError('HTTP transport requires MCP_PORT environment variable', 'MCP_PORT');
      }
      return null;
    }
    const port = Number(raw);
    if (!/^\d+$/.test(raw) || port < 1 || port > 65535) {
      throw new ConfigurationError(`MCP_PORT must be an integer between 1 and 65535, got "${raw}"`, 'MCP_PORT');
    }
    return port;
  }

  private parseLogLevel(): LogLevel {
    const raw = this.get('LOG_LEVEL', 'info').toLowerCase();
    if (!isLogLevel(raw)) {
      throw new ConfigurationError(`Invalid LOG_LEVEL: ${raw}. Must be one of: debug, info, warn, error`, 'LOG_LEVEL');
    }
    return raw;
  }

  /**
   * Log configuration (without sensitive data)
   */
  public logSummary(logger: Log): void {
    logger.info('Loaded configuration:');
    logger.info(`  Zammad URL: ${this.zammadUrl}`);
    logger.info(`  Authentication: ${this.auth.type}`);
    logger.info(`  Timeout: ${this.timeoutMs} ms`);
    logger.info(`  Reject Unauthorized SSL: ${this.rejectUnauthorized}`);
    logger.info(`  Transport: ${this.transport === 'http' ? `http on ${this.host}:${this.port ?? ''}` : 'stdio'}`);
    logger.info(`  Log Level: ${this.logLevel}${this.logFile ? ` (file: ${this.logFile})` : ''}`);
  }
}
