import { request } from 'undici';
import { ok, miss, type Result } from './result.js';
import type { AlertEvent } from './spikes/schemas.js';

export type HistoryPayload = {
  tokenAddress: string;
  tokenSymbol: string;
  targetPrice: number;
  actualPrice: number;
  type: 'volume_spike';
  note: string;
  marketCap?: number;
};

export type HistoryRecorder = {
  recordEvent(event: AlertEvent): Promise<Result<void>>;
};

export const disabledHistory: HistoryRecorder = {
  recordEvent: async () => miss('disabled'),
};

export function toHistoryPayload(e: AlertEvent): HistoryPayload {
  const p: HistoryPayload = {
    tokenAddress: e.address,
    tokenSymbol: e.symbol,
    targetPrice: 0,
    actualPrice: e.priceUsd,
    type: 'volume_spike',
    note: e.note,
  };
  if (e.marketCap !== undefined) p.marketCap = e.marketCap;
  return p;
}

function acknowledged(body: unknown): boolean {
  return typeof body === 'object' && body !== null && 'ok' in body && body.ok === true;
}

/** Dashboard `addHistory` endpoint. */
export class DashboardHistory implements HistoryRecorder {
  readonly url: string;

  constructor(baseUrl: string, private timeoutMs = 10_000) {
    this.url = `${baseUrl.replace(/\/+$/, '')}/api.php?action=addHistory`;
  }

  async recordEvent(event: AlertEvent): Promise<Result<void>> {
    const controller = new AbortController();
    const id = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const res = await request(this.url, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify(toHistoryPayload(event)),
        signal: controller.signal,
      });
      if (res.statusCode < 200 || res.statusCode >= 300) {
        await res.body.dump();
        return miss(`http_${res.statusCode}`);
      }
      const body: unknown = await res.body.json().catch(() => null);
      return acknowledged(body) ? ok(undefined) : miss('not_acknowledged');
    } catch (e) {
      return miss(controller.signal.aborted ? 'timeout' : 'network', e);
    } finally {
      clearTimeout(id);
    }
  }
}

export function createHistory(baseUrl: string | null, timeoutMs = 10_000): HistoryRecorder {
  return baseUrl ? new DashboardHistory(baseUrl, timeoutMs) : disabledHistory;
}
