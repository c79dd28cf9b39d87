/**
 * Shared plumbing for the market-data source clients.
 */

import axios, { AxiosError, type AxiosAdapter, type AxiosInstance } from 'axios';
import { TransportFailure } from '../common/errors.js';
import type { SourceName } from '../modules/market-data/contracts/market-data.contracts.js';

export interface SourceClientConfig {
  baseUrl: string;
  timeout: number;
  /** Swappable transport; tests pass an in-process adapter. */
  adapter?: AxiosAdapter;
}

export function createSourceHttp(config: SourceClientConfig): AxiosInstance {
  return axios.create({
    baseURL: config.baseUrl,
    timeout: config.timeout,
    headers: {
      Accept: 'application/json',
      'User-Agent': 'market-data-ingest/1.0',
    },
    ...(config.adapter ? { adapter: config.adapter } : {}),
  });
}

export function toTransportFailure(source: SourceName, error: unknown): TransportFailure {
  if (error instanceof TransportFailure) return error;
  if (error instanceof AxiosError) {
    const status = error.response?.status;
    const detail = status ? `HTTP ${status}` : error.code ?? 'network error';
    return new TransportFailure(source, `${detail}: ${error.message}`, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new TransportFailure(source, message, { cause: error });
}

/** Reads a top-level string field from an undecoded body. */
export function readStringField(body: unknown, field: string): string | undefined {
  if (typeof body !== 'object' || body === null) return undefined;
  const value: unknown = Reflect.get(body, field);
  return typeof value === 'string' ? value : undefined;
}

export function readMessages(body: unknown): string {
  if (typeof body !== 'object' || body === null) return 'Unknown error';
  const message: unknown = Reflect.get(body, 'message');
  if (Array.isArray(message) && message.length > 0) return message.map(String).join('; ');
  if (typeof message === 'string' && message.length > 0) return message;
  return 'Unknown error';
}
