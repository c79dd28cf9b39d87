/**
 * MongoDB connection
 */

import mongoose from 'mongoose';
import type { StoreDescriptor } from '../config/ingest.config.js';
import type { Logger } from '../common/logger.js';

export { mongoose };

export async function connectMongo(store: StoreDescriptor, logger: Logger): Promise<void> {
  if (mongoose.connection.readyState === 1) {
    return;
  }
  await mongoose.connect(store.mongoUrl, {
    dbName: store.dbName,
    serverSelectionTimeoutMS: 10_000,
  });
  logger.info({ dbName: store.dbName }, '[DB] MongoDB connected');
}

export async function disconnectMongo(): Promise<void> {
  await mongoose.disconnect();
}

export function isMongoConnected(): boolean {
  return mongoose.connection.readyState === 1;
}
