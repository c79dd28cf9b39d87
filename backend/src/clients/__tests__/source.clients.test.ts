import { describe, it, expect } from 'vitest';
import { AxiosError, type AxiosAdapter, type InternalAxiosRequestConfig } from 'axios';
import { TransportFailure } from '../../common/errors.js';
import type { IngestConfig } from '../../config/ingest.config.js';
import { createSourceFetchers } from '../../modules/market-data/run/source.fetchers.js';
import { BlsClient } from '../bls.client.js';
import { FredClient } from '../fred.client.js';
import { MetalsClient } from '../metals.client.js';

interface Captured {
  requests: InternalAxiosRequestConfig[];
  adapter: AxiosAdapter;
}

function respondWith(data: unknown, status = 200): Captured {
  const requests: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async config => {
    requests.push(config);
    const response = { data, status, statusText: String(status), headers: {}, config };
    if (status >= 400) {
      throw new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, null, response);
    }
    return response;
  };
  return { requests, adapter };
}

const fixedNow = () => new Date('2024-07-15T08:00:00Z');

describe('BlsClient', () => {

  it('posts the current-year window for one series', async () => {
    const body = { status: 'REQUEST_SUCCEEDED', Results: { series: [{ seriesID: 'CUUR0000SA0', data: [] }] } };
    const http = respondWith(body);
    const client = new BlsClient({ adapter: http.adapter, now: fixedNow });

    const result = await client.fetchSeries('CUUR0000SA0');

    expect(result).toEqual(body);
    expect(http.requests).toHaveLength(1);
    expect(http.requests[0].method).toBe('post');
    expect(http.requests[0].url).toBe('/timeseries/data/');
    expect(JSON.parse(String(http.requests[0].data))).toEqual({
      seriesid: ['CUUR0000SA0'],
      startyear: '2024',
      endyear: '2024',
    });
  });

  it('attaches the registration key when configured', async () => {
    const http = respondWith({ status: 'REQUEST_SUCCEEDED', Results: { series: [] } });
    const client = new BlsClient({ adapter: http.adapter, now: fixedNow, apiKey: 'test-key' });

    await client.fetchSeries('CUUR0000SA0');

    expect(JSON.parse(String(http.requests[0].data)).registrationkey).toBe('test-key');
  });

  it('turns a non-success status into a TransportFailure with the BLS message', async () => {
    const http = respondWith({ status: 'REQUEST_NOT_PROCESSED', message: ['Daily threshold reached'] });
    const client = new BlsClient({ adapter: http.adapter, now: fixedNow });

    await expect(client.fetchSeries('CUUR0000SA0')).rejects.toThrow(
      '[bls] request failed for CUUR0000SA0: Daily threshold reached'
    );
  });

  it('turns an HTTP error into a TransportFailure', async () => {
    const http = respondWith({}, 503);
    const client = new BlsClient({ adapter: http.adapter, now: fixedNow });

    await expect(client.fetchSeries('CUUR0000SA0')).rejects.toBeInstanceOf(TransportFailure);
  });
});

describe('MetalsClient', () => {

  it('requests a USD spot quote for the metal', async () => {
    const body = { status: 'success', rate: { price: 2345.5 }, timestamp: '2024-06-01T12:00:00Z' };
    const http = respondWith(body);
    const client = new MetalsClient({ adapter: http.adapter, apiKey: 'test-key' });

    expect(await client.fetchSpot('gold')).toEqual(body);
    expect(http.requests[0].url).toBe('/metal/spot');
    expect(http.requests[0].params).toEqual({ api_key: 'test-key', metal: 'gold', currency: 'USD' });
  });

  it('skips without an API key and makes no request', async () => {
    const http = respondWith({});
    const client = new MetalsClient({ adapter: http.adapter });

    expect(client.hasApiKey()).toBe(false);
    await expect(client.fetchSpot('silver')).rejects.toThrow('[metals] METALS_API_KEY not configured, skipping silver');
    expect(http.requests).toHaveLength(0);
  });

  it('rejects a failure status from the API', async () => {
    const http = respondWith({ status: 'failure', error_message: 'Invalid API key' });
    const client = new MetalsClient({ adapter: http.adapter, apiKey: 'test-key' });

    await expect(client.fetchSpot('gold')).rejects.toThrow('[metals] request failed for gold: Unknown error');
  });
});

describe('FredClient', () => {

  it('asks for JSON observations since the start of the previous year', async () => {
    const body = { observations: [{ date: '2024-01-01', value: '5.33' }] };
    const http = respondWith(body);
    const client = new FredClient({ adapter: http.adapter, apiKey: 'test-key', now: fixedNow });

    expect(await client.fetchObservations('FEDFUNDS')).toEqual(body);
    expect(http.requests[0].url).toBe('/series/observations');
    expect(http.requests[0].params).toEqual({
      series_id: 'FEDFUNDS',
      api_key: 'test-key',
      file_type: 'json',
      sort_order: 'asc',
      observation_start: '2023-01-01',
    });
  });

  it('reports the HTTP status on failure', async () => {
    const http = respondWith({ error_message: 'Bad Request' }, 400);
    const client = new FredClient({ adapter: http.adapter, apiKey: 'test-key', now: fixedNow });

    await expect(client.fetchObservations('NOPE')).rejects.toThrow(
      '[fred] HTTP 400: Request failed with status code 400'
    );
  });
});

describe('createSourceFetchers', () => {

  it('routes each source to its client with the configured credentials', async () => {
    const http = respondWith({ observations: [] });
    const config: IngestConfig = {
      sources: {
        bls: { enabled: true },
        metals: { enabled: true },
        fred: { enabled: true, apiKey: 'test-key' },
      },
      store: { mongoUrl: 'mongodb://localhost:27017', dbName: 'test' },
      series: [],
      parallelSeries: false,
      httpTimeoutMs: 5000,
    };

    const fetchers = createSourceFetchers(config, { adapter: http.adapter });

    expect(await fetchers.fred('DGS10')).toEqual({ observations: [] });
    expect(http.requests[0].timeout).toBe(5000);
    expect(http.requests[0].params.series_id).toBe('DGS10');
    await expect(fetchers.metals('gold')).rejects.toBeInstanceOf(TransportFailure);
    expect(http.requests).toHaveLength(1);
  });
});
