/**
 * Error Handling Middleware
 *
 * Centralized handling for errors that end a pipeline run: each error type
 * is logged with its own context and mapped to a process exit code.
 */

import axios from 'axios';
import {
  ConfigurationError,
  EmptyDatasetError,
  PayloadValidationError,
  UpstreamRequestError,
} from '../models/errors';
import { log, LogLevel } from '../utils/logger';

/**
 * Process exit codes
 */
export enum ExitCode {
  SUCCESS = 0,
  FAILURE = 1,
  INVALID_CONFIGURATION = 2,
}

/**
 * Check if error is a request timeout
 *
 * Detects axios timeouts (ECONNABORTED, ETIMEDOUT) and timeout messages.
 */
export function isTimeoutError(error: unknown): boolean {
  if (axios.isAxiosError(error)) {
    return error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT';
  }
  if (error instanceof UpstreamRequestError) {
    return isTimeoutError(error.cause);
  }
  return error instanceof Error && error.message.toLowerCase().includes('timeout');
}

/**
 * Short human-readable reason for an error
 *
 * - HTTP error response → "HTTP 503"
 * - timeout → "timeout"
 * - other axios error → its code or message
 * - anything else → its message
 */
export function describeError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    if (error.response) {
      return `HTTP ${error.response.status}`;
    }
    if (isTimeoutError(error)) {
      return 'timeout';
    }
    return error.code ?? error.message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return 'Unknown error';
}

/**
 * Handle an error that aborted the run
 *
 * Logs the error with type-specific context and returns the exit code.
 *
 * @param error - Error thrown by the pipeline
 * @param runId - Run identifier, when the run got far enough to have one
 */
export function handlePipelineError(error: unknown, runId?: string): ExitCode {
  if (error instanceof ConfigurationError) {
    log(LogLevel.ERROR, 'Invalid configuration', {
      run_id: runId,
      error_type: error.name,
      error: error.message,
    });
    return ExitCode.INVALID_CONFIGURATION;
  }

  if (error instanceof UpstreamRequestError) {
    log(LogLevel.ERROR, 'Upstream request failed, nothing written', {
      run_id: runId,
      error_type: error.name,
      url: error.url,
      status_code: error.statusCode,
      timeout: isTimeoutError(error),
      error: error.message,
    });
    return ExitCode.FAILURE;
  }

  if (error instanceof PayloadValidationError) {
    log(LogLevel.ERROR, 'Malformed payload, nothing written', {
      run_id: runId,
      error_type: error.name,
      details: error.details,
      error: error.message,
    });
    return ExitCode.FAILURE;
  }

  if (error instanceof EmptyDatasetError) {
    log(LogLevel.ERROR, 'Empty dataset, nothing written', {
      run_id: runId,
      error_type: error.name,
      error: error.message,
    });
    return ExitCode.FAILURE;
  }

  log(LogLevel.ERROR, 'Unexpected error', {
    run_id: runId,
    error_type: error instanceof Error ? error.name : typeof error,
    error: describeError(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  return ExitCode.FAILURE;
}
