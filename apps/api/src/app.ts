import express from 'express';
import cors from 'cors';
import { createComplexesRouter, type ComplexesRouterDeps } from './routes/complexes.js';
import { getEnv } from './env.js';
import { fetchListings } from './providers/naverLand.js';
import { createSnapshotStore } from './store/index.js';

export function createApp(overrides: Partial<ComplexesRouterDeps> = {}) {
  const env = getEnv();

  const normalizeOrigin = (value: string) => value.trim().replace(/\/+$/, '');
  const allowedOrigins = (env.CORS_ORIGIN ? env.CORS_ORIGIN.split(',') : [])
    .map((o) => o.trim())
    .filter(Boolean)
    .map(normalizeOrigin);

  const app = express();
  app.use(express.json({ limit: '1mb' }));

  app.use(
    cors({
      origin: (origin, callback) => {
        // Non-browser requests (curl/health checks) may omit Origin.
        if (!origin) return callback(null, true);

        // No allow-list configured: accept any origin.
        if (allowedOrigins.length === 0) return callback(null, true);

        const normalized = normalizeOrigin(origin);
        return callback(null, allowedOrigins.includes(normalized));
      }
    })
  );

  app.get('/health', (_req, res) => res.json({ ok: true }));

  app.use(
    createComplexesRouter({
      store: overrides.store ?? createSnapshotStore(env),
      fetchListings: overrides.fetchListings ?? fetchListings,
      complexes: overrides.complexes ?? env.TRACKED_COMPLEXES,
      defaultTradeType: overrides.defaultTradeType ?? env.DEFAULT_TRADE_TYPE,
      adminToken: 'adminToken' in overrides ? overrides.adminToken : env.ADMIN_TOKEN
    })
  );

  return app;
}
