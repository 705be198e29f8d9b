/**
 * Environment Configuration
 *
 * Builds the pipeline configuration value object from environment variables.
 * The object is passed to each component at construction; nothing reads
 * process.env after start-up.
 */

import { ConfigurationError } from '../models/errors';

export interface PipelineConfig {
  // Upstream API
  apiBaseUrl: string;
  userAgent: string;
  requestTimeoutMs: number;

  // Pause between per-player history requests
  requestDelayMs: number;

  // Rebuild gameweek stats from match history when no previous snapshot exists
  historyFallbackEnabled: boolean;

  // Root directory for CSV outputs and snapshot files
  outputDir: string;
}

export const DEFAULT_API_BASE_URL = 'https://fantasy.premierleague.com/api';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36';

const TRUE_FLAGS = ['true', '1', 'yes', 'on'];
const FALSE_FLAGS = ['false', '0', 'no', 'off'];

/**
 * Parse a boolean flag ("true"/"false", "1"/"0", "yes"/"no", "on"/"off")
 *
 * @throws ConfigurationError for any other value
 */
function parseFlag(name: string, value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (TRUE_FLAGS.includes(normalized)) {
    return true;
  }
  if (FALSE_FLAGS.includes(normalized)) {
    return false;
  }
  throw new ConfigurationError(`Invalid configuration: ${name} must be a boolean flag, received "${value}"`);
}

/**
 * Parse a whole-number setting; trailing junk ("30s") yields NaN
 */
function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  return Number(value.trim());
}

/**
 * Load configuration from environment variables
 *
 * @throws ConfigurationError if a flag variable holds an unrecognised value
 */
export function loadEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  return {
    apiBaseUrl: env.FPL_API_BASE_URL || DEFAULT_API_BASE_URL,
    userAgent: env.FPL_USER_AGENT || DEFAULT_USER_AGENT,
    requestTimeoutMs: parseNumber(env.FPL_REQUEST_TIMEOUT_MS, 30000),
    requestDelayMs: parseNumber(env.FPL_REQUEST_DELAY_MS, 1000),
    historyFallbackEnabled: parseFlag('FPL_HISTORY_FALLBACK', env.FPL_HISTORY_FALLBACK, true),
    outputDir: env.FPL_OUTPUT_DIR || './data',
  };
}

/**
 * Validate configuration values
 *
 * @throws ConfigurationError listing every invalid field
 */
export function validateEnvironmentConfig(config: PipelineConfig): void {
  const problems: string[] = [];

  if (!config.apiBaseUrl) {
    problems.push('apiBaseUrl must not be empty');
  }
  if (!config.outputDir) {
    problems.push('outputDir must not be empty');
  }
  if (!Number.isInteger(config.requestTimeoutMs) || config.requestTimeoutMs <= 0) {
    problems.push('requestTimeoutMs must be a positive integer');
  }
  if (!Number.isInteger(config.requestDelayMs) || config.requestDelayMs < 0) {
    problems.push('requestDelayMs must be a non-negative integer');
  }

  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid configuration: ${problems.join(', ')}`);
  }
}
