import { errorMessage } from './errors.js';
import type { CollectionResult, TradeType } from './types.js';

export interface SchedulerOptions {
  complexIds: readonly string[];
  tradeType: TradeType;
  intervalMs: number;
  collect: (complexId: string, tradeType: TradeType) => Promise<CollectionResult>;
}

export interface Scheduler {
  /** Runs one round now; resolves to false if a round was already in flight. */
  tick(): Promise<boolean>;
  stop(): void;
}

/**
 * Collects every tracked complex on a fixed interval. Complexes within a
 * round run concurrently; rounds never overlap.
 */
export function startScheduler(opts: SchedulerOptions): Scheduler {
  let running = false;

  async function tick(): Promise<boolean> {
    if (running) {
      console.warn('[scheduler] previous round still running, skipping');
      return false;
    }
    running = true;
    try {
      const outcomes = await Promise.allSettled(opts.complexIds.map((id) => opts.collect(id, opts.tradeType)));
      outcomes.forEach((outcome, i) => {
        const complexId = opts.complexIds[i];
        if (outcome.status === 'fulfilled') {
          console.log('[scheduler] collected', {
            complexId,
            stored: outcome.value.stored,
            failed: outcome.value.failed
          });
        } else {
          console.error('[scheduler] collection failed', { complexId, error: errorMessage(outcome.reason) });
        }
      });
      return true;
    } finally {
      running = false;
    }
  }

  const runTick = () => {
    tick().catch((err: unknown) => {
      console.error('[scheduler] round crashed', { error: errorMessage(err) });
    });
  };

  runTick();
  const timer = setInterval(runTick, opts.intervalMs);

  return {
    tick,
    stop: () => clearInterval(timer)
  };
}
