import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { AppError } from './common/errors.js';
import type { Env } from './config/env.js';
import { registerMarketDataModule, type MarketDataRouteDeps } from './modules/market-data/index.js';

export interface AppDeps {
  env: Pick<Env, 'CORS_ORIGINS' | 'NODE_ENV' | 'LOG_LEVEL'>;
  marketData: MarketDataRouteDeps;
  isStoreConnected?: () => boolean;
}

/**
 * Build Fastify Application
 */
export function buildApp(deps: AppDeps): FastifyInstance {
  const { env } = deps;
  const app = Fastify({
    logger: {
      level: env.LOG_LEVEL,
    },
    trustProxy: true,
  });

  // CORS
  app.register(cors, {
    origin: env.CORS_ORIGINS === '*' ? true : env.CORS_ORIGINS.split(','),
    credentials: true,
  });

  // Global error handler
  app.setErrorHandler((err, _req, reply) => {
    if (err instanceof AppError) {
      if (err.statusCode >= 500) app.log.error(err);
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
      });
    }

    app.log.error(err);

    // Fastify validation errors
    if (err.validation) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.message,
      });
    }

    // Unknown errors
    const statusCode = err.statusCode ?? 500;
    return reply.status(statusCode).send({
      ok: false,
      error: 'INTERNAL_ERROR',
      message: env.NODE_ENV === 'production' ? 'Internal server error' : err.message,
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({
      ok: false,
      error: 'NOT_FOUND',
      message: 'Route not found',
    });
  });

  app.get('/api/health', async () => ({
    ok: true,
    store: deps.isStoreConnected ? deps.isStoreConnected() : null,
    ingestRunning: deps.marketData.coordinator.isRunning(),
    timestamp: new Date().toISOString(),
  }));

  app.register(async fastify => {
    await registerMarketDataModule(fastify, deps.marketData);
  });

  return app;
}
