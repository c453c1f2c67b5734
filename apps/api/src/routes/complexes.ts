import { Router, type Response } from 'express';
import { z } from 'zod';
import { breakdown, summarizeLatest } from '../analysis/breakdown.js';
import { diffLatest, diffSnapshots } from '../analysis/diff.js';
import { DiffFailure, FetchFailure, StoreFailure, errorMessage } from '../errors.js';
import { runCollection } from '../pipeline/collect.js';
import type { SnapshotStore } from '../store/index.js';
import { TRADE_TYPES, type FetchListings, type TimeRange, type TrackedComplex, type TradeType } from '../types.js';

export interface ComplexesRouterDeps {
  store: SnapshotStore;
  fetchListings: FetchListings;
  complexes: readonly TrackedComplex[];
  defaultTradeType: TradeType;
  adminToken?: string;
}

const timestampParam = z
  .string()
  .min(1)
  .transform((value, ctx) => {
    const date = new Date(value);
    if (Number.isNaN(date.getTime())) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected an ISO-8601 timestamp' });
      return z.NEVER;
    }
    return date;
  });

const rangeQuerySchema = z.object({
  from: timestampParam.optional(),
  to: timestampParam.optional()
});

const BREAKDOWN_FIELDS = { realtor: 'realtorName', building: 'buildingName' } as const;

const breakdownQuerySchema = rangeQuerySchema.extend({
  by: z.enum(['realtor', 'building'])
});

const collectBodySchema = z.object({
  tradeType: z.enum(TRADE_TYPES).optional()
});

function toRange(query: z.infer<typeof rangeQuerySchema>): TimeRange {
  return {
    ...(query.from ? { from: query.from } : {}),
    ...(query.to ? { to: query.to } : {})
  };
}

function sendFailure(res: Response, err: unknown, fallback: string) {
  if (err instanceof DiffFailure) {
    return res.status(err.code === 'UNKNOWN_COMPLEX' ? 404 : 400).json({ error: err.code, message: err.message });
  }
  if (err instanceof FetchFailure) {
    return res.status(502).json({ error: 'FETCH_FAILED', message: err.message });
  }
  if (err instanceof StoreFailure) {
    return res.status(500).json({ error: 'STORE_FAILED', code: err.code, message: err.message });
  }
  return res.status(500).json({ error: fallback, message: errorMessage(err) });
}

export function createComplexesRouter(deps: ComplexesRouterDeps): Router {
  const router = Router();
  const trackedComplexIds = deps.complexes.map((c) => c.id);
  const isTracked = (complexId: string) => trackedComplexIds.includes(complexId);

  router.get('/v1/complexes', (_req, res) => res.json({ complexes: deps.complexes }));

  router.post('/v1/complexes/:complexId/collect', async (req, res) => {
    if (deps.adminToken && req.get('x-admin-token') !== deps.adminToken) {
      return res.status(401).json({ error: 'UNAUTHORIZED' });
    }

    const { complexId } = req.params;
    if (!isTracked(complexId)) return res.status(404).json({ error: 'NOT_FOUND', message: 'Complex is not tracked' });

    const parsed = collectBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ error: 'VALIDATION_ERROR', details: parsed.error.flatten() });
    }

    try {
      const result = await runCollection(
        { complexId, tradeType: parsed.data.tradeType ?? deps.defaultTradeType },
        { fetchListings: deps.fetchListings, store: deps.store }
      );
      return res.json(result);
    } catch (err) {
      console.error('[collect] run failed', { complexId, error: errorMessage(err) });
      return sendFailure(res, err, 'COLLECT_FAILED');
    }
  });

  router.get('/v1/complexes/:complexId/listings', async (req, res) => {
    const parsed = rangeQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ error: 'VALIDATION_ERROR', details: parsed.error.flatten() });
    }

    try {
      const listings = await deps.store.query(req.params.complexId, toRange(parsed.data));
      return res.json({ complexId: req.params.complexId, listings });
    } catch (err) {
      return sendFailure(res, err, 'QUERY_FAILED');
    }
  });

  router.get('/v1/complexes/:complexId/listings/:listingId/history', async (req, res) => {
    try {
      const history = await deps.store.listingHistory(req.params.complexId, req.params.listingId);
      return res.json({ complexId: req.params.complexId, listingId: req.params.listingId, history });
    } catch (err) {
      return sendFailure(res, err, 'QUERY_FAILED');
    }
  });

  router.get('/v1/complexes/:complexId/snapshots', async (req, res) => {
    const parsed = rangeQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ error: 'VALIDATION_ERROR', details: parsed.error.flatten() });
    }

    try {
      const snapshots = await deps.store.listSnapshots(req.params.complexId, toRange(parsed.data));
      return res.json({ complexId: req.params.complexId, snapshots });
    } catch (err) {
      return sendFailure(res, err, 'QUERY_FAILED');
    }
  });

  router.get('/v1/complexes/:complexId/summary', async (req, res) => {
    try {
      return res.json(await summarizeLatest(deps.store, req.params.complexId));
    } catch (err) {
      return sendFailure(res, err, 'QUERY_FAILED');
    }
  });

  router.get('/v1/complexes/:complexId/breakdown', async (req, res) => {
    const parsed = breakdownQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ error: 'VALIDATION_ERROR', details: parsed.error.flatten() });
    }

    try {
      const result = await breakdown(
        deps.store,
        req.params.complexId,
        BREAKDOWN_FIELDS[parsed.data.by],
        toRange(parsed.data)
      );
      return res.json(result);
    } catch (err) {
      return sendFailure(res, err, 'QUERY_FAILED');
    }
  });

  router.get('/v1/complexes/:complexId/diff', async (req, res) => {
    const parsed = rangeQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ error: 'VALIDATION_ERROR', details: parsed.error.flatten() });
    }

    const { complexId } = req.params;
    const { from, to } = parsed.data;
    const diffDeps = { store: deps.store, trackedComplexIds };

    try {
      if (from && to) {
        return res.json(await diffSnapshots(diffDeps, complexId, from, to));
      }
      if (from || to) {
        return res.status(400).json({ error: 'VALIDATION_ERROR', message: 'Provide both from and to, or neither' });
      }

      const latest = await diffLatest(diffDeps, complexId);
      if (!latest) {
        return res.json({
          complexId,
          from: null,
          to: null,
          fromSnapshotAt: null,
          toSnapshotAt: null,
          disappeared: [],
          appeared: [],
          priceChanged: []
        });
      }
      return res.json(latest);
    } catch (err) {
      return sendFailure(res, err, 'DIFF_FAILED');
    }
  });

  return router;
}
