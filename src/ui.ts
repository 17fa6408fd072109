import type { AlertEvent, VolumeFormat } from './spikes/schemas.js';
import type { ParseMode } from './config/monitor.js';

export const NO_VALUE = '—';

/** 1.5m / 2.3b / 12.0k style; negatives and NaN render as 0. */
export function formatCompact(value: number, mode: VolumeFormat = 'integer'): string {
  const v = Number.isFinite(value) && value > 0 ? value : 0;
  if (v >= 1e9) return `${(v / 1e9).toFixed(1)}b`;
  if (v >= 1e6) return `${(v / 1e6).toFixed(1)}m`;
  if (v >= 1e3) return `${(v / 1e3).toFixed(1)}k`;
  return mode === 'decimal' ? v.toFixed(1) : String(Math.round(v));
}

export function changePct(current: number, previous: number): number {
  // `|| 0` folds -0 into 0
  return Math.round((current / previous - 1) * 100) || 0;
}

export function formatChangePct(pct: number): string {
  return `${pct >= 0 ? '+' : ''}${pct}%`;
}

export function spikeNote(a: Pick<AlertEvent, 'changePct' | 'volumeText'>): string {
  return a.changePct !== undefined ? `5m Vol Spike ${formatChangePct(a.changePct)}` : `5m Vol Spike $${a.volumeText}`;
}

export function renderSpikeAlert(a: AlertEvent): string {
  const pct = a.changePct !== undefined ? ` (${formatChangePct(a.changePct)})` : '';
  return [
    `⚡$${a.symbol} 5m Volume Spike`,
    `Mcap: $${a.marketCapText}`,
    `5m Vol: $${a.volumeText}${pct}`,
  ].join('\n');
}

const MD_CHARS = /([_*\[\]()~`>#+\-=|{}.!])/g;
export function escapeMD(s: string) { return s.replace(MD_CHARS, '\\$1'); }

const MD_LEGACY_CHARS = /([_*`\[])/g;
export function escapeLegacyMD(s: string) { return s.replace(MD_LEGACY_CHARS, '\\$1'); }

export function escapeHTML(s: string) {
  return s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/** Plain text in, text safe for the chosen Telegram parse mode out. */
export function escapeFor(mode: ParseMode | undefined, s: string): string {
  switch (mode) {
    case 'HTML': return escapeHTML(s);
    case 'MarkdownV2': return escapeMD(s);
    case 'Markdown': return escapeLegacyMD(s);
    default: return s;
  }
}
