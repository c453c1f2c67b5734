import { z } from 'zod';
import { TRADE_TYPES, type TrackedComplex } from './types.js';

const DEFAULT_COMPLEXES = '108064:DMC파크뷰자이,104917:마포래미안푸르지오,3833:남산타운';

function parseComplexes(value: string): TrackedComplex[] {
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean)
    .map((entry) => {
      const sep = entry.indexOf(':');
      if (sep === -1) return { id: entry };
      const id = entry.slice(0, sep).trim();
      const name = entry.slice(sep + 1).trim();
      return name ? { id, name } : { id };
    })
    .filter((c) => c.id.length > 0);
}

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  CORS_ORIGIN: z.string().optional(),

  FIREBASE_PROJECT_ID: z.string().optional(),
  FIREBASE_SERVICE_ACCOUNT_JSON: z.string().optional(),
  FIREBASE_SERVICE_ACCOUNT_PATH: z.string().optional(),

  SNAPSHOT_STORE: z.enum(['file', 'firestore']).default('file'),
  DATA_DIR: z.string().min(1).default('./data'),

  TRACKED_COMPLEXES: z.string().default(DEFAULT_COMPLEXES).transform(parseComplexes),
  DEFAULT_TRADE_TYPE: z.enum(TRADE_TYPES).default('A1'),
  COLLECT_INTERVAL_MINUTES: z.coerce.number().int().min(0).max(1440).default(0),
  ADMIN_TOKEN: z
    .string()
    .optional()
    .transform((v) => (v && v.trim().length > 0 ? v : undefined)),

  LISTING_API_BASE_URL: z.string().url().default('https://m.land.naver.com'),
  LISTING_MAX_PAGES: z.coerce.number().int().positive().default(5),
  LISTING_PAGE_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000)
});

export type Env = z.infer<typeof envSchema>;

export function getEnv(): Env {
  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    throw new Error(`Invalid environment variables: ${parsed.error.message}`);
  }
  return parsed.data;
}
