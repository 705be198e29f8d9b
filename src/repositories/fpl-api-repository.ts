/**
 * Fantasy API Repository
 *
 * Data access layer for the public fantasy football API. Every request
 * carries the configured User-Agent and timeout. Payloads are validated
 * before they are returned.
 */

import axios, { AxiosInstance } from 'axios';
import { PipelineConfig } from '../config/environment';
import { BootstrapPayload, PlayerSummaryPayload } from '../models/fpl-api';
import { UpstreamRequestError } from '../models/errors';
import { describeError } from '../middleware/error-handler';
import { logHttpRequest } from '../utils/logger';
import { validateBootstrapPayload, validatePlayerSummaryPayload } from '../utils/payload-validation';

export const BOOTSTRAP_PATH = '/bootstrap-static/';

export function playerSummaryPath(playerId: number): string {
  return `/element-summary/${playerId}/`;
}

/**
 * Read side of the fantasy API used by the pipeline
 */
export interface FplDataSource {
  fetchBootstrap(runId?: string): Promise<BootstrapPayload>;
  fetchPlayerSummary(playerId: number, runId?: string): Promise<PlayerSummaryPayload>;
}

/**
 * The part of an axios instance the repository uses
 */
export type HttpClient = Pick<AxiosInstance, 'get'>;

/**
 * Fantasy API Repository
 * Fetches bootstrap and per-player payloads over HTTP
 */
export class FplApiRepository implements FplDataSource {
  private readonly http: HttpClient;

  constructor(private readonly config: PipelineConfig, http?: HttpClient) {
    this.http =
      http ??
      axios.create({
        baseURL: config.apiBaseUrl,
        timeout: config.requestTimeoutMs,
        headers: { 'User-Agent': config.userAgent },
      });
  }

  /**
   * Fetch the bootstrap-static payload (roster, schedule, season totals)
   *
   * @throws UpstreamRequestError on transport error, timeout or non-2xx status
   * @throws PayloadValidationError if the payload has an unexpected shape
   */
  async fetchBootstrap(runId?: string): Promise<BootstrapPayload> {
    const data = await this.get(BOOTSTRAP_PATH, runId);
    return validateBootstrapPayload(data);
  }

  /**
   * Fetch one player's element-summary payload (per-match history)
   *
   * @throws UpstreamRequestError on transport error, timeout or non-2xx status
   * @throws PayloadValidationError if the payload has an unexpected shape
   */
  async fetchPlayerSummary(playerId: number, runId?: string): Promise<PlayerSummaryPayload> {
    const data = await this.get(playerSummaryPath(playerId), runId);
    return validatePlayerSummaryPayload(data);
  }

  private async get(requestPath: string, runId?: string): Promise<unknown> {
    const url = `${this.config.apiBaseUrl}${requestPath}`;
    const startTime = Date.now();

    try {
      const response = await this.http.get<unknown>(requestPath, {
        timeout: this.config.requestTimeoutMs,
      });

      logHttpRequest({
        runId,
        url,
        statusCode: response.status,
        latencyMs: Date.now() - startTime,
        success: true,
      });

      return response.data;
    } catch (error) {
      const statusCode = axios.isAxiosError(error) ? error.response?.status : undefined;
      const reason = describeError(error);

      logHttpRequest({
        runId,
        url,
        statusCode,
        latencyMs: Date.now() - startTime,
        success: false,
        errorMessage: reason,
      });

      throw new UpstreamRequestError(`Request to ${url} failed: ${reason}`, url, statusCode, error);
    }
  }
}
