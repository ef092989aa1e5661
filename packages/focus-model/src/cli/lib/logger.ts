/**
 * Focus Model CLI Structured Logging
 *
 * JSON lines for machine consumption and coloured lines for interactive use,
 * with timestamp, command context and duration tracking. Every line goes to
 * stderr; stdout carries only command output (tables, JSON results).
 *
 * @module cli/lib/logger
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Log levels in order of severity
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log entry metadata
 */
export interface LogMetadata {
  readonly [key: string]: unknown;
}

/**
 * Structured log entry for JSON output
 */
export interface StructuredLogEntry {
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly message: string;
  readonly command?: string;
  readonly [key: string]: unknown;
}

/**
 * Logger configuration
 */
export interface CLILoggerConfig {
  /** Minimum log level to output */
  readonly level: LogLevel;
  /** Output as JSON */
  readonly json: boolean;
  /** Service name */
  readonly service?: string;
}

// ============================================================================
// Constants
// ============================================================================

/**
 * Log level numeric values for comparison
 */
const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * ANSI color codes for terminal output
 */
const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

/**
 * Level-specific colors
 */
const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.gray,
  info: COLORS.blue,
  warn: COLORS.yellow,
  error: COLORS.red,
};

/**
 * Level display names, padded to a common width
 */
const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO ',
  warn: 'WARN ',
  error: 'ERROR',
};

// ============================================================================
// CLI Logger Class
// ============================================================================

/**
 * CLI Logger with structured JSON and human-readable output
 */
export class CLILogger {
  private readonly config: CLILoggerConfig;
  private startTime: number;
  private commandContext: string | null = null;

  constructor(config: CLILoggerConfig) {
    this.config = {
      service: 'focus-model',
      ...config,
    };
    this.startTime = Date.now();
  }

  /**
   * Check if a log level should be output
   */
  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  /**
   * Get current timestamp in ISO format
   */
  private getTimestamp(): string {
    return new Date().toISOString();
  }

  /**
   * Get elapsed time since the current command started
   */
  private getElapsedMs(): number {
    return Date.now() - this.startTime;
  }

  /**
   * Format message for JSON output
   */
  formatJson(level: LogLevel, message: string, metadata?: LogMetadata): string {
    const entry: StructuredLogEntry = {
      timestamp: this.getTimestamp(),
      level,
      message,
      ...(this.config.service && { service: this.config.service }),
      ...(this.commandContext && { command: this.commandContext }),
      ...(metadata && Object.keys(metadata).length > 0 ? metadata : {}),
    };
    return JSON.stringify(entry);
  }

  /**
   * Format message for human-readable output
   */
  formatHuman(level: LogLevel, message: string, metadata?: LogMetadata): string {
    let line = `${COLORS.dim}${this.getTimestamp()}${COLORS.reset} `;
    line += `${LEVEL_COLORS[level]}${LEVEL_LABELS[level]}${COLORS.reset} `;
    line += message;

    // Metadata as key=value pairs
    if (metadata && Object.keys(metadata).length > 0) {
      const metaStr = Object.entries(metadata)
        .map(([key, value]) => {
          const valueStr = typeof value === 'object' ? JSON.stringify(value) : String(value);
          return `${COLORS.cyan}${key}${COLORS.reset}=${valueStr}`;
        })
        .join(' ');
      line += ` ${COLORS.dim}(${metaStr})${COLORS.reset}`;
    }

    return line;
  }

  /**
   * Output a log entry (stderr)
   */
  private log(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog(level)) return;

    const formatted = this.config.json
      ? this.formatJson(level, message, metadata)
      : this.formatHuman(level, message, metadata);

    console.error(formatted);
  }

  /**
   * Log a debug message
   */
  debug(message: string, metadata?: LogMetadata): void {
    this.log('debug', message, metadata);
  }

  /**
   * Log an info message
   */
  info(message: string, metadata?: LogMetadata): void {
    this.log('info', message, metadata);
  }

  /**
   * Log a warning message
   */
  warn(message: string, metadata?: LogMetadata): void {
    this.log('warn', message, metadata);
  }

  /**
   * Log an error message
   */
  error(message: string, metadata?: LogMetadata): void {
    this.log('error', message, metadata);
  }

  /**
   * Log command start and set the command context for later entries
   */
  commandStart(command: string, options?: LogMetadata): void {
    this.commandContext = command;
    this.startTime = Date.now();
    this.debug(`Starting ${command}`, options);
  }

  /**
   * Log command completion with duration
   */
  commandEnd(success: boolean, metadata?: LogMetadata): void {
    const baseMetadata = { duration: formatDuration(this.getElapsedMs()), ...metadata };

    if (success) {
      this.debug('Command completed', baseMetadata);
    } else {
      this.error('Command failed', baseMetadata);
    }
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Create a CLI logger with the given configuration
 */
export function createCLILogger(config: Partial<CLILoggerConfig> = {}): CLILogger {
  return new CLILogger({
    level: config.level ?? 'info',
    json: config.json ?? false,
    service: config.service ?? 'focus-model',
  });
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format a duration in milliseconds for display
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  } else if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(1);
  return `${minutes}m ${seconds}s`;
}

/**
 * Format a byte count for display
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  } else if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(2)} KB`;
  }
  return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}
