import { SpikeDetector } from './spikes/detect.js';
import { toObservation, type MarketDataSource } from './providers.js';
import { renderSpikeAlert, escapeFor } from './ui.js';
import { startTicker, systemClock, type Clock, type Ticker } from './scheduler.js';
import { errorMessage, type Result } from './result.js';
import { logEvent, warnEvent, maskAddr } from './log.js';
import type { TokenSource } from './tokens.js';
import type { Notifier } from './sinks_telegram.js';
import type { HistoryRecorder } from './sinks_history.js';
import type { MonitorMetrics } from './metrics.js';
import type { AlertEvent } from './spikes/schemas.js';

export type MonitorDeps = {
  tokens: TokenSource;
  market: MarketDataSource;
  detector: SpikeDetector;
  notifier: Notifier;
  history: HistoryRecorder;
  clock?: Clock;
  metrics?: MonitorMetrics;
};

export type CycleSummary = {
  tokens: number;
  observed: number;
  missed: number;
  spikes: number;
  suppressed: number;
  notified: number;
  recorded: number;
};

export type DispatchOutcome = { notified: boolean; recorded: boolean };

function emptySummary(tokens: number): CycleSummary {
  return { tokens, observed: 0, missed: 0, spikes: 0, suppressed: 0, notified: 0, recorded: 0 };
}

export class VolumeMonitor {
  private clock: Clock;

  constructor(private deps: MonitorDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  /** One pass that only records baselines. Returns how many addresses were seeded. */
  async warmUp(): Promise<number> {
    const addresses = await this.deps.tokens.load();
    let seeded = 0;
    for (const address of addresses) {
      const pair = await this.deps.market.fetchPair(address);
      if (!pair.ok) { this.noteMiss(address, pair.reason); continue; }
      if (this.deps.detector.seed(toObservation(address, pair.value))) seeded++;
    }
    this.deps.metrics?.cycles.inc({ phase: 'warmup' });
    logEvent('monitor.warmup', { tokens: addresses.length, seeded });
    return seeded;
  }

  async runCycle(): Promise<CycleSummary> {
    const addresses = await this.deps.tokens.load();
    const summary = emptySummary(addresses.length);
    for (const address of addresses) {
      try {
        await this.checkAddress(address, summary);
      } catch (e) {
        summary.missed++;
        warnEvent('monitor.address_failed', { address: maskAddr(address), error: errorMessage(e) });
      }
    }
    this.deps.metrics?.cycles.inc({ phase: 'evaluate' });
    logEvent('monitor.cycle', { ...summary });
    return summary;
  }

  private async checkAddress(address: string, summary: CycleSummary) {
    const pair = await this.deps.market.fetchPair(address);
    if (!pair.ok) { summary.missed++; this.noteMiss(address, pair.reason); return; }

    const obs = toObservation(address, pair.value);
    const ev = this.deps.detector.evaluate(obs, this.clock.now());
    if (ev.kind === 'skipped') { summary.missed++; return; }

    summary.observed++;
    this.deps.metrics?.observations.inc();
    const { chainId, dexId, pairAddress, liquidityUsd } = pair.value;
    logEvent('monitor.observe', {
      symbol: obs.symbol,
      address: maskAddr(address),
      chain: chainId,
      dex: dexId,
      pair: pairAddress === undefined ? undefined : maskAddr(pairAddress),
      liquidityUsd,
      vol5m: ev.current,
      prev: ev.previous ?? null,
      verdict: ev.kind,
    });

    if (ev.kind === 'suppressed') {
      summary.suppressed++;
      this.deps.metrics?.suppressed.inc();
      return;
    }
    if (ev.kind !== 'spike') return;

    summary.spikes++;
    this.deps.metrics?.spikes.inc();
    logEvent('monitor.spike', { symbol: obs.symbol, address: maskAddr(address), note: ev.alert.note, detectedAt: new Date(ev.alert.detectedAt).toISOString() });
    const out = await this.dispatch(ev.alert);
    if (out.notified) summary.notified++;
    if (out.recorded) summary.recorded++;
  }

  /** Sends the alert and writes history; the history write happens whatever the send outcome. */
  async dispatch(alert: AlertEvent): Promise<DispatchOutcome> {
    const { notifier, history } = this.deps;
    const text = escapeFor(notifier.parseMode, renderSpikeAlert(alert));
    const sent = await notifier.send(text);
    this.noteSink('telegram', alert, sent);
    const stored = await history.recordEvent(alert);
    this.noteSink('history', alert, stored);
    return { notified: sent.ok, recorded: stored.ok };
  }

  /** First tick warms up (when asked), every later tick evaluates. */
  start(opts: { intervalMs: number; warmUp?: boolean }): Ticker {
    const warm = opts.warmUp ?? true;
    return startTicker({
      intervalMs: opts.intervalMs,
      clock: this.clock,
      tick: async (n) => {
        if (n === 0 && warm) await this.warmUp();
        else await this.runCycle();
      },
    });
  }

  private noteMiss(address: string, reason: string) {
    logEvent('monitor.no_pair', { address: maskAddr(address), reason });
  }

  private noteSink(sink: 'telegram' | 'history', alert: AlertEvent, res: Result<void>) {
    const outcome = res.ok ? 'ok' : res.reason === 'disabled' ? 'disabled' : 'failed';
    this.deps.metrics?.sinkResults.inc({ sink, outcome });
    if (!res.ok && res.reason !== 'disabled') {
      warnEvent(`${sink}.failed`, { symbol: alert.symbol, address: maskAddr(alert.address), reason: res.reason, error: res.error === undefined ? undefined : errorMessage(res.error) });
    }
  }
}
