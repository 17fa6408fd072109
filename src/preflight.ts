import fs from 'node:fs';
import type { MonitorConfig } from './config/monitor.js';
import { describePolicy } from './spikes/policy.js';

export type Finding = { ok: boolean; label: string; hint?: string };

export function checkSinks(cfg: MonitorConfig, fileExists: (p: string) => boolean = fs.existsSync): Finding[] {
  const f: Finding[] = [];
  f.push({ ok: !!cfg.telegram, label: 'Telegram alerts', hint: 'Set TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID' });
  f.push({ ok: !!cfg.dashboardUrl, label: 'Dashboard history', hint: 'Set DASHBOARD_URL' });
  f.push({ ok: fileExists(cfg.tokensFile), label: `Token file ${cfg.tokensFile}`, hint: 'Watch-list is empty until the file exists' });
  if (cfg.tokensApi) f.push({ ok: cfg.healthPort > 0, label: 'Watch-list edit routes', hint: 'Set HEALTH_PORT to serve /tokens' });
  return f;
}

export function renderPreflight(cfg: MonitorConfig, findings: Finding[]): string {
  const rows = findings.map(f => `${f.ok ? '✅' : '❌'} ${f.label}${f.ok ? '' : (f.hint ? ` — ${f.hint}` : '')}`);
  const head = `[preflight] policy ${cfg.policyName} (${describePolicy(cfg.policy)}) | every ${Math.round(cfg.pollIntervalMs / 1000)}s | warm-up ${cfg.warmUp ? 'on' : 'off'}`;
  return [head, ...rows].join('\n');
}
