import { ok, miss, type Result } from '../../src/result.js';
import type { MarketDataSource } from '../../src/providers.js';
import type { TokenSource } from '../../src/tokens.js';
import type { Notifier } from '../../src/sinks_telegram.js';
import type { HistoryRecorder } from '../../src/sinks_history.js';
import type { Clock } from '../../src/scheduler.js';
import type { ParseMode } from '../../src/config/monitor.js';
import type { AlertEvent, PairSnapshot } from '../../src/spikes/schemas.js';

export const ADDR_A = 'So11111111111111111111111111111111111111112';
export const ADDR_B = '0xeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeee';

export function pair(volume5m: number | undefined, extra: Partial<PairSnapshot> = {}): PairSnapshot {
  return { symbol: 'TEST', volume5m, marketCap: 1_200_000, priceUsd: 0.5, liquidityUsd: 10_000, ...extra };
}

export class StaticTokens implements TokenSource {
  constructor(public addresses: string[]) {}
  async load() { return [...this.addresses]; }
}

export class FakeMarket implements MarketDataSource {
  calls: string[] = [];
  private results = new Map<string, Result<PairSnapshot> | Error>();
  set(address: string, r: Result<PairSnapshot> | Error) { this.results.set(address, r); return this; }
  volume(address: string, v: number | undefined, extra: Partial<PairSnapshot> = {}) { return this.set(address, ok(pair(v, extra))); }
  async fetchPair(address: string): Promise<Result<PairSnapshot>> {
    this.calls.push(address);
    const r = this.results.get(address);
    if (r instanceof Error) throw r;
    return r ?? miss('no_pairs');
  }
}

export class RecordingNotifier implements Notifier {
  sent: string[] = [];
  fail = false;
  constructor(readonly parseMode?: ParseMode) {}
  async send(text: string): Promise<Result<void>> {
    this.sent.push(text);
    return this.fail ? miss('send_failed') : ok(undefined);
  }
}

export class RecordingHistory implements HistoryRecorder {
  events: AlertEvent[] = [];
  fail = false;
  async recordEvent(e: AlertEvent): Promise<Result<void>> {
    this.events.push(e);
    return this.fail ? miss('http_500') : ok(undefined);
  }
}

/** Virtual clock: sleeping advances time instantly. */
export class ManualClock implements Clock {
  sleeps: number[] = [];
  constructor(public t = 0) {}
  now() { return this.t; }
  async sleep(ms: number, _signal: AbortSignal) {
    this.sleeps.push(ms);
    this.t += ms;
  }
}
