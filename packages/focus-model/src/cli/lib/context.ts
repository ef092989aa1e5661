/**
 * Per-run CLI state shared by all commands
 *
 * @module cli/lib/context
 */

import {
  EmptyTableError,
  InvalidParameterError,
  MetadataWriteError,
  NetworkError,
  ParseError,
} from '../../core/errors.js';
import { loadConfig, type CLIConfig } from './config.js';
import { createCLILogger, type CLILogger } from './logger.js';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  ERRORS: 2,
  INVALID_INPUT: 3,
  NETWORK_ERROR: 4,
  DATA_ERROR: 5,
  METADATA_WRITE_ERROR: 6,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Map a failure to the process exit code
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof InvalidParameterError) return EXIT_CODES.INVALID_INPUT;
  if (error instanceof NetworkError) return EXIT_CODES.NETWORK_ERROR;
  if (error instanceof ParseError || error instanceof EmptyTableError) return EXIT_CODES.DATA_ERROR;
  if (error instanceof MetadataWriteError) return EXIT_CODES.METADATA_WRITE_ERROR;
  return EXIT_CODES.ERRORS;
}

/**
 * Human-readable message for a failure
 */
export function describeError(error: unknown): string {
  if (error instanceof InvalidParameterError) return error.getSummary();
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Global Context
// ============================================================================

/**
 * Runs a command body, mapping failures to output and exit code
 */
export type ActionRunner = (action: () => Promise<void>) => Promise<void>;

export interface GlobalContext {
  readonly config: CLIConfig;
  readonly logger: CLILogger;
}

let globalContext: GlobalContext | null = null;

export function getGlobalContext(): GlobalContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

export function initializeContext(options: {
  verbose?: boolean;
  json?: boolean;
  timeout?: number;
}): GlobalContext {
  const config = loadConfig({
    overrides: {
      verbose: options.verbose,
      json: options.json,
      timeout: options.timeout,
    },
  });

  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'info',
    json: config.json,
  });

  globalContext = { config, logger };
  return globalContext;
}

/**
 * Default runner: report the failure through the logger and set the exit code
 *
 * Errors are not rethrown; commander would otherwise print them a second time.
 */
export const runAction: ActionRunner = async (action) => {
  try {
    await action();
  } catch (error) {
    const code = exitCodeFor(error);
    const logger = globalContext?.logger;

    if (logger) {
      logger.error(describeError(error), { exitCode: code });
      logger.commandEnd(false);
    } else {
      console.error(describeError(error));
    }

    process.exitCode = code;
  }
};
