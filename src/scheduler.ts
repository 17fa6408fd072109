import { setTimeout as sleep } from 'node:timers/promises';
import { errorMessage } from './result.js';
import { warnEvent } from './log.js';

export interface Clock {
  now(): number;
  /** Resolves after `ms`, or early (without throwing) once `signal` aborts. */
  sleep(ms: number, signal: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  async sleep(ms, signal) {
    try {
      await sleep(ms, undefined, { signal });
    } catch (e) {
      if (!signal.aborted) throw e;
    }
  },
};

export type TickerOptions = {
  intervalMs: number;
  clock?: Clock;
  tick: (n: number) => Promise<void>;
};

export type Ticker = {
  stop(): Promise<void>;
  readonly done: Promise<void>;
};

/**
 * Runs `tick`, sleeps a fixed interval, repeats until stopped.
 * Ticks never overlap. A throwing tick is logged and the next one still runs.
 */
export function startTicker(opts: TickerOptions): Ticker {
  const clock = opts.clock ?? systemClock;
  const controller = new AbortController();
  const loop = async () => {
    for (let n = 0; !controller.signal.aborted; n++) {
      try {
        await opts.tick(n);
      } catch (e) {
        warnEvent('ticker.tick_failed', { tick: n, error: errorMessage(e) });
      }
      if (controller.signal.aborted) break;
      await clock.sleep(opts.intervalMs, controller.signal);
    }
  };
  const done = loop();
  return {
    done,
    async stop() {
      controller.abort();
      await done;
    },
  };
}
