/**
 * metals.dev spot client (v1/metal/spot), USD quotes.
 */

import type { AxiosInstance } from 'axios';
import { TransportFailure } from '../common/errors.js';
import { createSourceHttp, readMessages, readStringField, toTransportFailure, type SourceClientConfig } from './source.http.js';

export interface MetalsClientConfig extends SourceClientConfig {
  apiKey?: string;
  currency: string;
}

const DEFAULT_CONFIG: MetalsClientConfig = {
  baseUrl: 'https://api.metals.dev/v1',
  timeout: 30_000,
  currency: 'USD',
};

export class MetalsClient {
  private readonly http: AxiosInstance;
  private readonly config: MetalsClientConfig;

  constructor(config: Partial<MetalsClientConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.http = createSourceHttp(this.config);
  }

  hasApiKey(): boolean {
    return Boolean(this.config.apiKey);
  }

  async fetchSpot(metal: string): Promise<unknown> {
    if (!this.config.apiKey) {
      throw new TransportFailure('metals', `METALS_API_KEY not configured, skipping ${metal}`);
    }

    let data: unknown;
    try {
      const response = await this.http.get<unknown>('/metal/spot', {
        params: { api_key: this.config.apiKey, metal, currency: this.config.currency },
      });
      data = response.data;
    } catch (error) {
      throw toTransportFailure('metals', error);
    }

    if (readStringField(data, 'status') !== 'success') {
      throw new TransportFailure('metals', `request failed for ${metal}: ${readMessages(data)}`);
    }
    return data;
  }
}
