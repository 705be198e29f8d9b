/**
 * Fantasy API Repository Tests
 *
 * The HTTP client is an in-process fake; no request leaves the test.
 */

import { AxiosError } from 'axios';
import {
  BOOTSTRAP_PATH,
  FplApiRepository,
  playerSummaryPath,
} from '../../src/repositories/fpl-api-repository';
import { PayloadValidationError, UpstreamRequestError } from '../../src/models/errors';
import { makeConfig } from '../helpers/fixtures';

describe('FplApiRepository', () => {
  let get: jest.Mock;
  let repository: FplApiRepository;
  let consoleLogSpy: jest.SpyInstance;

  const bootstrap = {
    events: [{ id: 1, finished: true, data_checked: true }],
    teams: [{ id: 1, name: 'Arsenal', short_name: 'ARS' }],
    elements: [{ id: 1, web_name: 'Raya', now_cost: 55 }],
  };

  beforeEach(() => {
    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation();
    get = jest.fn();
    repository = new FplApiRepository(makeConfig({ requestTimeoutMs: 1234 }), { get });
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
  });

  it('should build element-summary paths', () => {
    expect(playerSummaryPath(42)).toBe('/element-summary/42/');
  });

  describe('fetchBootstrap', () => {
    it('should request bootstrap-static with the configured timeout', async () => {
      get.mockResolvedValue({ status: 200, data: bootstrap });

      const payload = await repository.fetchBootstrap('run-1');

      expect(get).toHaveBeenCalledWith(BOOTSTRAP_PATH, { timeout: 1234 });
      expect(payload.elements).toHaveLength(1);
    });

    it('should log the request with its full url', async () => {
      get.mockResolvedValue({ status: 200, data: bootstrap });

      await repository.fetchBootstrap('run-1');

      const logEntry = JSON.parse(consoleLogSpy.mock.calls[0][0]);
      expect(logEntry.log_type).toBe('HTTP_REQUEST');
      expect(logEntry.url).toBe('https://fpl.test/api/bootstrap-static/');
      expect(logEntry.status_code).toBe(200);
      expect(logEntry.run_id).toBe('run-1');
    });

    it('should wrap transport failures in UpstreamRequestError', async () => {
      get.mockRejectedValue(new AxiosError('timeout of 1234ms exceeded', 'ECONNABORTED'));

      await expect(repository.fetchBootstrap()).rejects.toThrow(UpstreamRequestError);
      await expect(repository.fetchBootstrap()).rejects.toThrow(
        'Request to https://fpl.test/api/bootstrap-static/ failed: timeout'
      );
    });

    it('should reject malformed payloads', async () => {
      get.mockResolvedValue({ status: 200, data: '<html>maintenance</html>' });

      await expect(repository.fetchBootstrap()).rejects.toThrow(PayloadValidationError);
    });
  });

  describe('fetchPlayerSummary', () => {
    it('should request the player element-summary', async () => {
      get.mockResolvedValue({ status: 200, data: { history: [{ round: 3, minutes: 90 }] } });

      const payload = await repository.fetchPlayerSummary(7);

      expect(get).toHaveBeenCalledWith('/element-summary/7/', { timeout: 1234 });
      expect(payload.history).toEqual([{ round: 3, minutes: 90 }]);
    });

    it('should wrap failures in UpstreamRequestError with the url', async () => {
      get.mockRejectedValue(new Error('socket hang up'));

      await expect(repository.fetchPlayerSummary(7)).rejects.toMatchObject({
        name: 'UpstreamRequestError',
        url: 'https://fpl.test/api/element-summary/7/',
      });
    });
  });
});
