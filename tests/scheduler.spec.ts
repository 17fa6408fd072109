import { describe, it, expect, vi } from 'vitest';
import { startTicker, systemClock, type Ticker } from '../src/scheduler.js';
import { ManualClock } from './helpers/fakes.js';

describe('ticker', () => {
  it('ticks, sleeps the fixed interval, and stops cleanly', async () => {
    const clock = new ManualClock(1_000);
    const seen: Array<[number, number]> = [];
    let stopping: Promise<void> | undefined;
    const ticker: Ticker = startTicker({
      intervalMs: 300_000,
      clock,
      tick: async (n) => {
        seen.push([n, clock.now()]);
        if (n === 2) stopping = ticker.stop();
      },
    });
    await ticker.done;
    await stopping;
    expect(seen).toEqual([[0, 1_000], [1, 301_000], [2, 601_000]]);
    expect(clock.sleeps).toEqual([300_000, 300_000]);
  });

  it('keeps ticking after a tick throws', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const clock = new ManualClock();
    let calls = 0;
    let stopping: Promise<void> | undefined;
    const ticker: Ticker = startTicker({
      intervalMs: 10,
      clock,
      tick: async (n) => {
        calls++;
        if (n === 0) throw new Error('provider exploded');
        stopping = ticker.stop();
      },
    });
    await ticker.done;
    await stopping;
    expect(calls).toBe(2);
    expect(console.warn).toHaveBeenCalledWith(JSON.stringify({ at: 'ticker.tick_failed', tick: 0, error: 'provider exploded' }));
  });
});

describe('system clock', () => {
  it('wakes early when aborted', async () => {
    const controller = new AbortController();
    const t0 = Date.now();
    const slept = systemClock.sleep(60_000, controller.signal);
    controller.abort();
    await expect(slept).resolves.toBeUndefined();
    expect(Date.now() - t0).toBeLessThan(5_000);
  });
});
