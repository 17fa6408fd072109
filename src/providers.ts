import { request } from 'undici';
import { ok, miss, errorMessage, type Result } from './result.js';
import type { PairSnapshot, VolumeObservation } from './spikes/schemas.js';
import type { MonitorMetrics } from './metrics.js';
import { DEFAULT_DEXSCREENER_API } from './config/monitor.js';

export const SYMBOL_PLACEHOLDER = '—';

export type FetchOptions = {
  apiBase?: string;
  timeoutMs?: number;
  metrics?: MonitorMetrics;
};

export type MarketDataSource = {
  fetchPair(address: string): Promise<Result<PairSnapshot>>;
};

type Json = Record<string, unknown>;

function isRecord(v: unknown): v is Json {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/** Number or numeric string; NaN and blanks count as missing. */
export function toNumber(v: unknown): number | undefined {
  if (typeof v === 'number') return Number.isFinite(v) ? v : undefined;
  if (typeof v === 'string' && v.trim() !== '') {
    const n = Number(v.trim());
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}

function field(obj: unknown, key: string): unknown {
  return isRecord(obj) ? obj[key] : undefined;
}

function text(v: unknown): string | undefined {
  return typeof v === 'string' && v ? v : undefined;
}

/** Highest `liquidity.usd` wins; ties keep provider order. */
export function pickBestPair(pairs: unknown[]): Json | null {
  let best: Json | null = null;
  let bestLiq = -Infinity;
  for (const p of pairs) {
    if (!isRecord(p)) continue;
    const liq = toNumber(field(p.liquidity, 'usd')) ?? 0;
    if (liq > bestLiq) { best = p; bestLiq = liq; }
  }
  return best;
}

export function toPairSnapshot(p: Json): PairSnapshot {
  const rawSymbol = field(p.baseToken, 'symbol');
  const symbol = (typeof rawSymbol === 'string' ? rawSymbol : '').trim().toUpperCase() || SYMBOL_PLACEHOLDER;
  return {
    pairAddress: text(p.pairAddress),
    chainId: text(p.chainId),
    dexId: text(p.dexId),
    symbol,
    volume5m: toNumber(field(p.volume, 'm5')),
    marketCap: toNumber(p.marketCap),
    priceUsd: toNumber(p.priceUsd) ?? 0,
    liquidityUsd: toNumber(field(p.liquidity, 'usd')) ?? 0,
  };
}

export function toObservation(address: string, pair: PairSnapshot): VolumeObservation {
  return { address, symbol: pair.symbol, volume5m: pair.volume5m, marketCap: pair.marketCap, priceUsd: pair.priceUsd };
}

async function getJSON(url: string, timeoutMs: number): Promise<Result<unknown>> {
  const controller = new AbortController();
  const id = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const res = await request(url, { method: 'GET', headers: { accept: 'application/json' }, signal: controller.signal });
    if (res.statusCode < 200 || res.statusCode >= 300) {
      await res.body.dump();
      return miss(`http_${res.statusCode}`);
    }
    try {
      return ok(await res.body.json());
    } catch (e) {
      if (controller.signal.aborted) return miss('timeout', e);
      return miss('bad_body', e);
    }
  } catch (e) {
    return miss(controller.signal.aborted ? 'timeout' : 'network', e);
  } finally {
    clearTimeout(id);
  }
}

/** Best-liquidity DexScreener pair for a token address. Never throws. */
export async function fetchPair(address: string, opts: FetchOptions = {}): Promise<Result<PairSnapshot>> {
  const base = (opts.apiBase ?? DEFAULT_DEXSCREENER_API).replace(/\/+$/, '');
  const t0 = Date.now();
  let res: Result<PairSnapshot>;
  try {
    const body = await getJSON(`${base}/${encodeURIComponent(address)}`, opts.timeoutMs ?? 15_000);
    if (!body.ok) {
      res = body;
    } else {
      const pairs = field(body.value, 'pairs');
      const best = Array.isArray(pairs) ? pickBestPair(pairs) : null;
      res = best ? ok(toPairSnapshot(best)) : miss('no_pairs');
    }
  } catch (e) {
    res = miss('unexpected', new Error(errorMessage(e)));
  }
  const m = opts.metrics;
  if (m) {
    m.providerLatency.observe({ outcome: res.ok ? 'ok' : 'miss' }, (Date.now() - t0) / 1000);
    if (!res.ok) m.providerFailures.inc({ reason: res.reason });
  }
  return res;
}

export function dexscreenerSource(opts: FetchOptions = {}): MarketDataSource {
  return { fetchPair: (address) => fetchPair(address, opts) };
}
