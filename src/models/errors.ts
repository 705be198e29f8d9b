/**
 * Application Error Models
 *
 * Error types raised by the pipeline. The CLI maps them to log entries and
 * exit codes through the error handler middleware.
 */

/**
 * Field-level validation messages keyed by JSON path
 */
export type ValidationDetails = Record<string, string>;

/**
 * Outbound request failed (transport error, timeout or non-2xx status)
 */
export class UpstreamRequestError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly statusCode?: number,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'UpstreamRequestError';
  }
}

/**
 * Payload returned by the API does not have the expected shape
 */
export class PayloadValidationError extends Error {
  constructor(message: string, public readonly details: ValidationDetails = {}) {
    super(message);
    this.name = 'PayloadValidationError';
  }
}

/**
 * Bulk fetch returned no players; nothing may be written
 */
export class EmptyDatasetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EmptyDatasetError';
  }
}

/**
 * Invalid configuration value
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
