/**
 * @file Centralized logging for lint-miner.
 *       One line per entry: timestamp, level, context path, message and a JSON suffix
 *       holding the bound fields (repository, commit) merged with the call's metadata.
 */

import * as fs from 'fs';
import * as path from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogMetadata = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: string;
  metadata?: LogMetadata;
}

export interface LoggerOptions {
  level: LogLevel;
  enableConsole: boolean;
  enableFile: boolean;
  logFilePath?: string;
  context?: string;
  /** Attached to every entry written by this logger and its children. */
  fields?: LogMetadata;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const CONSOLE_SINKS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

function stringifyMetadata(metadata: LogMetadata): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(metadata, (_key, value: unknown) => {
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular Reference]';
      }
      seen.add(value);
    }
    return value;
  });
}

export class Logger {
  private readonly options: LoggerOptions;

  constructor(options: LoggerOptions) {
    this.options = options;

    if (options.enableFile && options.logFilePath) {
      fs.mkdirSync(path.dirname(options.logFilePath), { recursive: true });
    }
  }

  /**
   * Logger for a nested component, e.g. `Miner:MiningPipeline`.
   */
  child(context: string): Logger {
    const parent = this.options.context;
    return new Logger({ ...this.options, context: parent ? `${parent}:${context}` : context });
  }

  /**
   * Same context, with extra fields bound to every entry.
   */
  withFields(fields: LogMetadata): Logger {
    return new Logger({ ...this.options, fields: { ...this.options.fields, ...fields } });
  }

  formatLogEntry(entry: LogEntry): string {
    const contextStr = entry.context ? `[${entry.context}] ` : '';
    const hasMetadata = entry.metadata !== undefined && Object.keys(entry.metadata).length > 0;
    const metadataStr = hasMetadata && entry.metadata ? ` ${stringifyMetadata(entry.metadata)}` : '';
    return `${entry.timestamp} [${entry.level.toUpperCase()}] ${contextStr}${entry.message}${metadataStr}`;
  }

  private write(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.options.level]) {
      return;
    }

    const merged = this.options.fields || metadata ? { ...this.options.fields, ...metadata } : undefined;
    const line = this.formatLogEntry({
      timestamp: new Date().toISOString(),
      level,
      message,
      context: this.options.context,
      metadata: merged,
    });

    if (this.options.enableConsole) {
      CONSOLE_SINKS[level](line);
    }

    if (this.options.enableFile && this.options.logFilePath) {
      try {
        fs.appendFileSync(this.options.logFilePath, line + '\n');
      } catch (error) {
        console.error('Failed to write to log file:', error);
      }
    }
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.write('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.write('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.write('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.write('error', message, metadata);
  }

  /**
   * Logs the start of an operation. The returned callback logs its completion with the
   * elapsed time plus any outcome fields, and returns the elapsed milliseconds.
   */
  operation(operationName: string): (outcome?: LogMetadata) => number {
    const startTime = Date.now();
    this.debug(`Starting: ${operationName}`);

    return (outcome) => {
      const duration = Date.now() - startTime;
      this.info(`Finished: ${operationName}`, { ...outcome, duration: `${duration}ms` });
      return duration;
    };
  }
}

let rootLogger: Logger | null = null;

export function initializeLogger(options: Omit<LoggerOptions, 'context' | 'fields'>): Logger {
  rootLogger = new Logger(options);
  return rootLogger;
}

export function getLogger(context?: string): Logger {
  if (!rootLogger) {
    // Console-only until the CLI initializes it from configuration
    rootLogger = new Logger({ level: 'info', enableConsole: true, enableFile: false });
  }
  return context ? rootLogger.child(context) : rootLogger;
}
