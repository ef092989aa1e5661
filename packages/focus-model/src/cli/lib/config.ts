/**
 * Focus Model CLI Configuration
 *
 * Command-line flags merged onto the library defaults. There is no config
 * file and no tool-specific environment variable; LOG_LEVEL only affects the
 * library logger.
 *
 * @module cli/lib/config
 */

import { DEFAULT_CONFIG, type FocusModelConfig } from '../../core/config.js';

export interface CLIConfig {
  /** Debug-level logging */
  readonly verbose: boolean;
  /** Machine-readable output */
  readonly json: boolean;
  /** Per-request timeout in milliseconds */
  readonly timeout: number;
}

export interface LoadConfigOptions {
  readonly overrides?: {
    readonly verbose?: boolean;
    readonly json?: boolean;
    readonly timeout?: number;
  };
}

/**
 * Merge flags onto defaults and validate
 *
 * @throws Error if a value is out of range
 */
export function loadConfig(options: LoadConfigOptions = {}): CLIConfig {
  const config: CLIConfig = {
    verbose: options.overrides?.verbose ?? false,
    json: options.overrides?.json ?? false,
    timeout: options.overrides?.timeout ?? DEFAULT_CONFIG.timeoutMs,
  };

  validateConfig(config);
  return config;
}

export function validateConfig(config: CLIConfig): void {
  if (!Number.isInteger(config.timeout) || config.timeout <= 0) {
    throw new Error('Timeout must be a positive integer number of milliseconds');
  }
}

/**
 * Client configuration for a CLI run
 */
export function toClientConfig(config: CLIConfig): Partial<FocusModelConfig> {
  return { timeoutMs: config.timeout };
}
