/**
 * STORE GATEWAY
 *
 * The only contract the ingest core has with persistence: read one record
 * by key, insert, update a value by id. `listSeries` backs the read API and
 * is never called during reconciliation.
 */

import type {
  ExistingRecord,
  InsertRecord,
  RecordId,
  ValueUpdate,
} from '../contracts/market-data.contracts.js';

export interface SeriesQuery {
  from?: string;
  to?: string;
  limit?: number;
}

export interface StoreGateway {
  findByKey(seriesType: string, date: string): Promise<ExistingRecord | null>;
  insert(record: InsertRecord): Promise<RecordId>;
  updateValue(id: RecordId, update: ValueUpdate): Promise<void>;
  listSeries(seriesType: string, query?: SeriesQuery): Promise<ExistingRecord[]>;
}

export const DEFAULT_SERIES_LIMIT = 500;
