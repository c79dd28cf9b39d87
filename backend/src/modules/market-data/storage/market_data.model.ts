/**
 * MARKET DATA MODEL
 *
 * Collection `market_data`: one document per (seriesType, date).
 */

import mongoose, { Schema, type Types } from 'mongoose';
import type { RawPayload } from '../contracts/market-data.contracts.js';

export interface IMarketDataPoint {
  seriesType: string;
  date: string;         // ISO date (YYYY-MM-DD)
  value: number;
  high: number;
  low: number;
  rawPayload: RawPayload;
  createdAt: Date;
  updatedAt: Date;
}

export type LeanMarketDataPoint = IMarketDataPoint & { _id: Types.ObjectId };

const MarketDataPointSchema = new Schema<IMarketDataPoint>(
  {
    seriesType: { type: String, required: true, index: true },
    date: { type: String, required: true },
    value: { type: Number, required: true },
    high: { type: Number, required: true },
    low: { type: Number, required: true },
    rawPayload: { type: Schema.Types.Mixed, default: {} },
  },
  {
    timestamps: true,
    minimize: false,
    collection: 'market_data',
  }
);

// One point per series per date
MarketDataPointSchema.index({ seriesType: 1, date: 1 }, { unique: true });

export const MarketDataPointModel = mongoose.model<IMarketDataPoint>('MarketDataPoint', MarketDataPointSchema);
