import type { SpikePolicy, VolumeFormat } from '../spikes/schemas.js';
import { warnEvent } from '../log.js';

export type PolicyName = 'ratio' | 'threshold' | 'cooldown';
export type ParseMode = 'HTML' | 'MarkdownV2' | 'Markdown';

export type TelegramConfig = { botToken: string; chatId: string; parseMode?: ParseMode };

export type MonitorConfig = {
  tokensFile: string;
  dexscreenerApi: string;
  pollIntervalMs: number;
  providerTimeoutMs: number;
  sinkTimeoutMs: number;
  policyName: PolicyName;
  policy: SpikePolicy;
  volumeFormat: VolumeFormat;
  warmUp: boolean;
  telegram: TelegramConfig | null;
  dashboardUrl: string | null;
  healthPort: number;
  /** Serve the watch-list edit routes on the health port. */
  tokensApi: boolean;
};

export const DEFAULT_DEXSCREENER_API = 'https://api.dexscreener.com/latest/dex/tokens';
const DEFAULT_COOLDOWN_SEC = 3600;

function parsePolicyName(raw: string | undefined): PolicyName {
  const v = (raw || '').trim().toLowerCase();
  if (v === 'ratio' || v === 'threshold' || v === 'cooldown') return v;
  if (v) warnEvent('config.unknown_policy', { value: v, fallback: 'ratio' });
  return 'ratio';
}

function parseParseMode(raw: string | undefined): ParseMode | undefined {
  const v = (raw || '').trim().toLowerCase();
  if (v === 'html') return 'HTML';
  if (v === 'markdownv2') return 'MarkdownV2';
  if (v === 'markdown') return 'Markdown';
  return undefined;
}

export function readMonitorConfig(env: NodeJS.ProcessEnv = process.env): MonitorConfig {
  const str = (k: string) => (env[k] ?? '').trim();
  const num = (k: string, d: number) => {
    const raw = str(k);
    if (!raw) return d;
    const n = Number(raw);
    return Number.isFinite(n) ? n : d;
  };
  const bool = (k: string, d: boolean) => {
    const raw = str(k).toLowerCase();
    if (!raw) return d;
    return raw === 'true' || raw === '1' || raw === 'yes';
  };

  const policyName = parsePolicyName(env.SPIKE_POLICY);
  const ratio = num('SPIKE_RATIO', 2);
  const thresholdUsd = Math.max(0, num('SPIKE_THRESHOLD_USD', 100_000));
  // The cooldown policy always has a window; 0 there means "use the default".
  const cooldownRaw = Math.max(0, num('SPIKE_COOLDOWN_SEC', 0));
  const cooldownSec = policyName === 'cooldown' && cooldownRaw === 0 ? DEFAULT_COOLDOWN_SEC : cooldownRaw;
  const policy: SpikePolicy = {
    rule: policyName === 'ratio' ? { kind: 'ratio', ratio: ratio > 0 ? ratio : 2 } : { kind: 'threshold', thresholdUsd },
    cooldownMs: cooldownSec * 1000,
  };

  const botToken = str('TELEGRAM_BOT_TOKEN');
  const chatId = str('TELEGRAM_CHAT_ID');
  const parseMode = parseParseMode(env.TELEGRAM_PARSE_MODE);
  const dashboardUrl = str('DASHBOARD_URL').replace(/\/+$/, '');

  return {
    tokensFile: str('TOKENS_FILE') || 'config.json',
    dexscreenerApi: (str('DEXSCREENER_API') || DEFAULT_DEXSCREENER_API).replace(/\/+$/, ''),
    pollIntervalMs: Math.max(1000, num('POLL_INTERVAL_MS', 300_000)),
    providerTimeoutMs: Math.max(1, num('PROVIDER_TIMEOUT_MS', 15_000)),
    sinkTimeoutMs: Math.max(1, num('SINK_TIMEOUT_MS', 10_000)),
    policyName,
    policy,
    volumeFormat: str('VOLUME_FORMAT').toLowerCase() === 'decimal' ? 'decimal' : 'integer',
    warmUp: bool('WARMUP', true),
    telegram: botToken && chatId ? { botToken, chatId, ...(parseMode ? { parseMode } : {}) } : null,
    dashboardUrl: dashboardUrl || null,
    healthPort: Math.max(0, Math.trunc(num('HEALTH_PORT', 3000))),
    tokensApi: bool('TOKENS_API', false),
  };
}
