import { appendFileSync, existsSync, mkdirSync, readdirSync, renameSync, statSync, unlinkSync, writeFileSync } from 'fs';
import { basename, dirname, join } from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/** Logging surface shared by Logger and its children */
export interface Log {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
  child(prefix: string): Log;
}

/** Where log lines go besides the optional file */
export interface LogSink {
  write(chunk: string): boolean;
}

/**
 * Logger for MCP Server
 * Writes to stderr (stdout carries the stdio JSON-RPC stream) and an optional log file
 */
export class Logger implements Log {
  private logFilePath: string | null = null;
  private readonly logLevel: LogLevel;
  private readonly sink: LogSink;
  private readonly maxLogSizeBytes: number = 10 * 1024 * 1024; // 10MB
  private readonly maxRotatedLogs: number = 5;

  constructor(logLevel: LogLevel = 'info', logFilePath?: string, sink: LogSink = process.stderr) {
    this.logLevel = logLevel;
    this.sink = sink;

    if (logFilePath) {
      this.initializeLogFile(logFilePath);
    }
  }

  /**
   * Initialize log file with rotation
   */
  private initializeLogFile(logFilePath: string): void {
    try {
      const logDir = dirname(logFilePath);
      if (!existsSync(logDir)) {
        mkdirSync(logDir, { recursive: true });
      }

      this.logFilePath = logFilePath;
      this.rotateLogIfNeeded();
      this.cleanupOldRotatedLogs();

      const header = `\n${'='.repeat(80)}\nZammad MCP Server Log - ${new Date().toISOString()}\n${'='.repeat(80)}\n`;
      writeFileSync(logFilePath, header, { flag: 'a' });

      this.info(`Logging initialized: ${logFilePath}`);
    } catch (error) {
      this.logFilePath = null;
      this.error(`Failed to initialize log file: ${describe(error)}`);
    }
  }

  /**
   * Rotate log file if it exceeds max size
   */
  private rotateLogIfNeeded(): void {
    if (!this.logFilePath || !existsSync(this.logFilePath)) {
      return;
    }

    try {
      if (statSync(this.logFilePath).size > this.maxLogSizeBytes) {
        const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
        renameSync(this.logFilePath, `${this.logFilePath}.${timestamp}`);
      }
    } catch (error) {
      this.writeToSink(this.formatMessage(new Date().toISOString(), 'WARN', `Log rotation failed: ${describe(error)}`));
    }
  }

  /**
   * Keep only the most recent rotated logs
   */
  private cleanupOldRotatedLogs(): void {
    if (!this.logFilePath) {
      return;
    }

    const logDir = dirname(this.logFilePath);
    const logFileName = basename(this.logFilePath);

    try {
      const rotatedLogs = readdirSync(logDir)
        .filter(f => f.startsWith(`${logFileName}.`))
        .map(f => ({ path: join(logDir, f), mtime: statSync(join(logDir, f)).mtime.getTime() }))
        .sort((a, b) => b.mtime - a.mtime);

      for (const log of rotatedLogs.slice(this.maxRotatedLogs)) {
        unlinkSync(log.path);
      }
    } catch (error) {
      this.writeToSink(this.formatMessage(new Date().toISOString(), 'WARN', `Log cleanup failed: ${describe(error)}`));
    }
  }

  debug(message: string, meta?: unknown): void {
    if (!this.shouldLog('debug')) return;
    this.log('DEBUG', message, meta);
  }

  info(message: string, meta?: unknown): void {
    if (!this.shouldLog('info')) return;
    this.log('INFO', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    if (!this.shouldLog('warn')) return;
    this.log('WARN', message, meta);
  }

  error(message: string, meta?: unknown): void {
    if (!this.shouldLog('error')) return;
    this.log('ERROR', message, meta);
  }

  /**
   * Core logging function
   */
  private log(level: string, message: string, meta?: unknown): void {
    const formattedMessage = this.formatMessage(new Date().toISOString(), level, message, meta);

    this.writeToSink(formattedMessage);

    if (this.logFilePath) {
      try {
        appendFileSync(this.logFilePath, formattedMessage + '\n');
      } catch (error) {
        // Stop writing to a file that cannot be written
        this.logFilePath = null;
        this.writeToSink(this.formatMessage(new Date().toISOString(), 'WARN', `Log file disabled: ${describe(error)}`));
      }
    }
  }

  private writeToSink(line: string): void {
    try {
      this.sink.write(line + '\n');
    } catch (error) {
      // EPIPE: the client closed the pipe, nobody is listening
      if (!isBrokenPipe(error)) {
        throw error;
      }
    }
  }

  private formatMessage(timestamp: string, level: string, message: string, meta?: unknown): string {
    let formatted = `[${timestamp}] [${level.padEnd(5)}] ${message}`;

    if (meta !== undefined) {
      if (meta instanceof Error) {
        formatted += ` ${meta.message}`;
        if (this.logLevel === 'debug' && meta.stack) {
          formatted += `\n${meta.stack}`;
        }
      } else if (typeof meta === 'object' && meta !== null) {
        formatted += '\n' + JSON.stringify(meta, null, 2);
      } else {
        formatted += ` ${String(meta)}`;
      }
    }

    return formatted;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.logLevel);
  }

  /**
   * Create a child logger with prefix
   */
  child(prefix: string): Log {
    return new ChildLogger(this, prefix);
  }
}

/**
 * Child logger with prefix
 */
class ChildLogger implements Log {
  constructor(
    private readonly parent: Log,
    private readonly prefix: string
  ) {}

  debug(message: string, meta?: unknown): void {
    this.parent.debug(`[${this.prefix}] ${message}`, meta);
  }

  info(message: string, meta?: unknown): void {
    this.parent.info(`[${this.prefix}] ${message}`, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.parent.warn(`[${this.prefix}] ${message}`, meta);
  }

  error(message: string, meta?: unknown): void {
    this.parent.error(`[${this.prefix}] ${message}`, meta);
  }

  child(prefix: string): Log {
    return new ChildLogger(this, prefix);
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isBrokenPipe(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EPIPE';
}
