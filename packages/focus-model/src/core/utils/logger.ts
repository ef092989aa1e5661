/**
 * Structured logging utility for the focus model client
 *
 * Console-based, with levels, timestamps and contextual metadata. Every
 * level goes to stderr; stdout carries command output only.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

interface LoggerConfig {
  readonly level: LogLevel;
  readonly service: string;
  readonly pretty: boolean;
}

export class Logger {
  private readonly config: LoggerConfig;
  private readonly levels: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
  };

  constructor(config: LoggerConfig) {
    this.config = config;
  }

  private shouldLog(level: LogLevel): boolean {
    return this.levels[level] >= this.levels[this.config.level];
  }

  private formatMessage(level: LogLevel, message: string, metadata?: LogMetadata): string {
    const timestamp = new Date().toISOString();
    const hasMetadata = metadata !== undefined && Object.keys(metadata).length > 0;

    if (this.config.pretty) {
      const metaStr = hasMetadata ? ` ${JSON.stringify(metadata)}` : '';
      return `[${timestamp}] ${level.toUpperCase()} ${this.config.service}: ${message}${metaStr}`;
    }

    return JSON.stringify({
      timestamp,
      level,
      service: this.config.service,
      message,
      ...(hasMetadata ? metadata : {}),
    });
  }

  debug(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('debug')) return;
    console.error(this.formatMessage('debug', message, metadata));
  }

  info(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('info')) return;
    console.error(this.formatMessage('info', message, metadata));
  }

  warn(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('warn')) return;
    console.error(this.formatMessage('warn', message, metadata));
  }

  error(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('error')) return;
    console.error(this.formatMessage('error', message, metadata));
  }
}

const getLogLevel = (): LogLevel => {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
    return level;
  }
  return 'info';
};

/**
 * Create a logger tagged with a module name
 */
export function createLogger(module: string): Logger {
  return new Logger({
    level: getLogLevel(),
    service: `focus-model:${module}`,
    pretty: process.env.NODE_ENV !== 'production',
  });
}
