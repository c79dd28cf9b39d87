/**
 * FRED CLIENT
 *
 * Federal Reserve Economic Data, series/observations (JSON).
 * Get a free key at https://fred.stlouisfed.org/docs/api/api_key.html
 */

import type { AxiosInstance } from 'axios';
import { TransportFailure } from '../common/errors.js';
import { createSourceHttp, toTransportFailure, type SourceClientConfig } from './source.http.js';

export interface FredClientConfig extends SourceClientConfig {
  apiKey?: string;
  now: () => Date;
}

const DEFAULT_CONFIG: FredClientConfig = {
  baseUrl: 'https://api.stlouisfed.org/fred',
  timeout: 30_000,
  now: () => new Date(),
};

export class FredClient {
  private readonly http: AxiosInstance;
  private readonly config: FredClientConfig;

  constructor(config: Partial<FredClientConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.http = createSourceHttp(this.config);
  }

  /**
   * Observations from January 1st of the previous year, ascending.
   */
  async fetchObservations(seriesId: string): Promise<unknown> {
    if (!this.config.apiKey) {
      throw new TransportFailure('fred', `FRED_API_KEY not configured, skipping ${seriesId}`);
    }

    const observationStart = `${this.config.now().getUTCFullYear() - 1}-01-01`;

    try {
      const response = await this.http.get<unknown>('/series/observations', {
        params: {
          series_id: seriesId,
          api_key: this.config.apiKey,
          file_type: 'json',
          sort_order: 'asc',
          observation_start: observationStart,
        },
      });
      return response.data;
    } catch (error) {
      throw toTransportFailure('fred', error);
    }
  }
}
