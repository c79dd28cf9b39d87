/**
 * Mongo store gateway
 *
 * Backed by MarketDataPointModel. The unique (seriesType, date) index turns
 * a racing insert from another writer into a duplicate-key error instead of
 * a second row.
 */

import { Types, type FilterQuery, type Model } from 'mongoose';
import type {
  ExistingRecord,
  InsertRecord,
  RecordId,
  ValueUpdate,
} from '../contracts/market-data.contracts.js';
import { MarketDataPointModel, type IMarketDataPoint, type LeanMarketDataPoint } from './market_data.model.js';
import { DEFAULT_SERIES_LIMIT, type SeriesQuery, type StoreGateway } from './store.gateway.js';

export function toExistingRecord(doc: LeanMarketDataPoint): ExistingRecord {
  return Object.freeze({
    id: doc._id.toHexString(),
    seriesType: doc.seriesType,
    date: doc.date,
    value: doc.value,
    high: doc.high,
    low: doc.low,
    rawPayload: doc.rawPayload ?? {},
  });
}

export function buildSeriesFilter(seriesType: string, query: SeriesQuery = {}): FilterQuery<IMarketDataPoint> {
  const filter: FilterQuery<IMarketDataPoint> = { seriesType };
  if (query.from || query.to) {
    filter.date = {
      ...(query.from ? { $gte: query.from } : {}),
      ...(query.to ? { $lte: query.to } : {}),
    };
  }
  return filter;
}

export class MongoStoreGateway implements StoreGateway {
  constructor(private readonly model: Model<IMarketDataPoint> = MarketDataPointModel) {}

  async findByKey(seriesType: string, date: string): Promise<ExistingRecord | null> {
    const doc = await this.model.findOne({ seriesType, date }).lean<LeanMarketDataPoint | null>();
    return doc ? toExistingRecord(doc) : null;
  }

  async insert(record: InsertRecord): Promise<RecordId> {
    const created = await this.model.create(record);
    return created._id.toHexString();
  }

  async updateValue(id: RecordId, update: ValueUpdate): Promise<void> {
    if (!Types.ObjectId.isValid(id)) {
      throw new Error(`invalid record id: ${id}`);
    }
    const result = await this.model.updateOne(
      { _id: new Types.ObjectId(id) },
      { $set: { value: update.value, high: update.high, low: update.low, rawPayload: update.rawPayload } }
    );
    if (result.matchedCount === 0) {
      throw new Error(`record ${id} not found`);
    }
  }

  async listSeries(seriesType: string, query: SeriesQuery = {}): Promise<ExistingRecord[]> {
    const docs = await this.model
      .find(buildSeriesFilter(seriesType, query))
      .sort({ date: -1 })
      .limit(query.limit ?? DEFAULT_SERIES_LIMIT)
      .lean<LeanMarketDataPoint[]>();
    return docs.map(toExistingRecord);
  }
}
