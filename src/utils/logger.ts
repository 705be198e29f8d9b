/**
 * Structured Logging Module
 *
 * Provides structured JSON logging functions for consistent logging across
 * the pipeline. All logs include timestamp, level and the run_id of the
 * pipeline run that produced them.
 */

/**
 * Log levels
 */
export enum LogLevel {
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

/**
 * Base log entry structure
 */
interface BaseLogEntry {
  timestamp: string;
  level: LogLevel;
  run_id?: string;
}

/**
 * Outbound HTTP request log entry
 */
interface HttpRequestLogEntry extends BaseLogEntry {
  log_type: 'HTTP_REQUEST';
  url: string;
  status_code?: number;
  latency_ms: number;
  success: boolean;
  error_message?: string;
}

/**
 * File write log entry
 */
interface FileWriteLogEntry extends BaseLogEntry {
  log_type: 'FILE_WRITE';
  path: string;
  row_count: number;
}

/**
 * Context values accepted by log()
 */
export type LogContext = Record<string, unknown>;

/**
 * Replace Error instances with their messages so entries serialize cleanly
 */
function normalizeContext(context: LogContext): LogContext {
  const normalized: LogContext = {};

  for (const [key, value] of Object.entries(context)) {
    if (value instanceof Error) {
      normalized[key] = value.message;
    } else {
      normalized[key] = value;
    }
  }

  return normalized;
}

/**
 * Write log entry to stdout (stderr for errors)
 */
function writeLog(entry: BaseLogEntry): void {
  const logMethod = entry.level === LogLevel.ERROR ? console.error : console.log;
  logMethod(JSON.stringify(entry));
}

/**
 * Log outbound HTTP request
 *
 * Failed requests are logged at WARN; the caller decides whether the
 * failure is fatal and logs that separately.
 *
 * @example
 * ```typescript
 * logHttpRequest({
 *   runId: 'run-123',
 *   url: 'https://fantasy.premierleague.com/api/bootstrap-static/',
 *   statusCode: 200,
 *   latencyMs: 412,
 *   success: true,
 * });
 * ```
 */
export function logHttpRequest(params: {
  runId?: string;
  url: string;
  statusCode?: number;
  latencyMs: number;
  success: boolean;
  errorMessage?: string;
}): void {
  const entry: HttpRequestLogEntry = {
    timestamp: new Date().toISOString(),
    level: params.success ? LogLevel.INFO : LogLevel.WARN,
    log_type: 'HTTP_REQUEST',
    run_id: params.runId,
    url: params.url,
    status_code: params.statusCode,
    latency_ms: params.latencyMs,
    success: params.success,
    error_message: params.errorMessage,
  };

  writeLog(entry);
}

/**
 * Log a completed file write
 */
export function logFileWrite(params: { runId?: string; path: string; rowCount: number }): void {
  const entry: FileWriteLogEntry = {
    timestamp: new Date().toISOString(),
    level: LogLevel.INFO,
    log_type: 'FILE_WRITE',
    run_id: params.runId,
    path: params.path,
    row_count: params.rowCount,
  };

  writeLog(entry);
}

/**
 * Log generic message with context
 *
 * @example
 * ```typescript
 * log(LogLevel.INFO, 'Gameweek reconciled', {
 *   run_id: 'run-123',
 *   gameweek: 12,
 *   mode: 'delta',
 * });
 * ```
 */
export function log(level: LogLevel, message: string, context?: LogContext): void {
  const normalizedContext = context ? normalizeContext(context) : {};

  const entry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...normalizedContext,
  };

  writeLog(entry);
}
