/**
 * In-memory store gateway, used by tests and `--dry-run`.
 * Enforces the same (seriesType, date) uniqueness as the Mongo index.
 */

import type {
  ExistingRecord,
  InsertRecord,
  RecordId,
  ValueUpdate,
} from '../contracts/market-data.contracts.js';
import { DEFAULT_SERIES_LIMIT, type SeriesQuery, type StoreGateway } from './store.gateway.js';

export class InMemoryStoreGateway implements StoreGateway {
  private readonly rows = new Map<RecordId, ExistingRecord>();
  private readonly index = new Map<string, RecordId>();
  private seq = 0;

  private static key(seriesType: string, date: string): string {
    return `${seriesType}\u0000${date}`;
  }

  async findByKey(seriesType: string, date: string): Promise<ExistingRecord | null> {
    const id = this.index.get(InMemoryStoreGateway.key(seriesType, date));
    return id === undefined ? null : this.rows.get(id) ?? null;
  }

  async insert(record: InsertRecord): Promise<RecordId> {
    const key = InMemoryStoreGateway.key(record.seriesType, record.date);
    if (this.index.has(key)) {
      throw new Error(`duplicate key ${record.seriesType}@${record.date}`);
    }
    const id = `mem_${++this.seq}`;
    this.rows.set(id, Object.freeze({ ...record, id }));
    this.index.set(key, id);
    return id;
  }

  async updateValue(id: RecordId, update: ValueUpdate): Promise<void> {
    const row = this.rows.get(id);
    if (!row) {
      throw new Error(`record ${id} not found`);
    }
    this.rows.set(id, Object.freeze({ ...row, ...update }));
  }

  async listSeries(seriesType: string, query: SeriesQuery = {}): Promise<ExistingRecord[]> {
    return [...this.rows.values()]
      .filter(r => r.seriesType === seriesType)
      .filter(r => (query.from ? r.date >= query.from : true))
      .filter(r => (query.to ? r.date <= query.to : true))
      .sort((a, b) => b.date.localeCompare(a.date))
      .slice(0, query.limit ?? DEFAULT_SERIES_LIMIT);
  }

  size(): number {
    return this.rows.size;
  }
}
