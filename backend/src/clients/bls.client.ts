/**
 * BLS Public Data API client (v1, timeseries/data)
 *
 * Requests the current calendar year for one series. v1 needs no key; a
 * registration key is attached when configured.
 *
 * @example
 * const client = new BlsClient();
 * const body = await client.fetchSeries('CUUR0000SA0');
 */

import type { AxiosInstance } from 'axios';
import { TransportFailure } from '../common/errors.js';
import { createSourceHttp, readMessages, readStringField, toTransportFailure, type SourceClientConfig } from './source.http.js';

export const BLS_SUCCESS_STATUS = 'REQUEST_SUCCEEDED';

export interface BlsClientConfig extends SourceClientConfig {
  apiKey?: string;
  /** Year window source; defaults to the wall clock. */
  now: () => Date;
}

const DEFAULT_CONFIG: BlsClientConfig = {
  baseUrl: 'https://api.bls.gov/publicAPI/v1',
  timeout: 30_000,
  now: () => new Date(),
};

export class BlsClient {
  private readonly http: AxiosInstance;
  private readonly config: BlsClientConfig;

  constructor(config: Partial<BlsClientConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.http = createSourceHttp(this.config);
  }

  async fetchSeries(seriesId: string): Promise<unknown> {
    const year = String(this.config.now().getUTCFullYear());
    const body: Record<string, unknown> = {
      seriesid: [seriesId],
      startyear: year,
      endyear: year,
    };
    if (this.config.apiKey) {
      body.registrationkey = this.config.apiKey;
    }

    let data: unknown;
    try {
      const response = await this.http.post<unknown>('/timeseries/data/', body, {
        headers: { 'Content-Type': 'application/json' },
      });
      data = response.data;
    } catch (error) {
      throw toTransportFailure('bls', error);
    }

    const status = readStringField(data, 'status');
    if (status !== BLS_SUCCESS_STATUS) {
      throw new TransportFailure('bls', `request failed for ${seriesId}: ${readMessages(data)}`);
    }
    return data;
  }
}
