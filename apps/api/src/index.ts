import dotenv from 'dotenv';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { getEnv } from './env.js';
import { createApp } from './app.js';
import { runCollection } from './pipeline/collect.js';
import { fetchListings } from './providers/naverLand.js';
import { startScheduler } from './scheduler.js';
import { createSnapshotStore } from './store/index.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Load repo-root .env first, then let the working directory's .env override it.
dotenv.config({ path: path.resolve(__dirname, '../../../.env') });
dotenv.config({ override: true });

const env = getEnv();
const store = createSnapshotStore(env);

const app = createApp({ store, fetchListings });

app.listen(env.PORT, () => {
  // eslint-disable-next-line no-console
  console.log(`API listening on http://localhost:${env.PORT}`);
});

if (env.COLLECT_INTERVAL_MINUTES > 0) {
  const complexIds = env.TRACKED_COMPLEXES.map((c) => c.id);
  console.log('[scheduler] starting', {
    complexIds,
    tradeType: env.DEFAULT_TRADE_TYPE,
    intervalMinutes: env.COLLECT_INTERVAL_MINUTES
  });

  startScheduler({
    complexIds,
    tradeType: env.DEFAULT_TRADE_TYPE,
    intervalMs: env.COLLECT_INTERVAL_MINUTES * 60_000,
    collect: (complexId, tradeType) => runCollection({ complexId, tradeType }, { fetchListings, store })
  });
}
