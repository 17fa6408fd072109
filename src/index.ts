import fs from 'node:fs';
import dotenv from 'dotenv';
if (fs.existsSync('.env.local')) dotenv.config({ path: '.env.local' }); else dotenv.config();
import { readMonitorConfig } from './config/monitor.js';
import { fileTokenSource } from './tokens.js';
import { dexscreenerSource } from './providers.js';
import { SpikeDetector } from './spikes/detect.js';
import { createNotifier } from './sinks_telegram.js';
import { createHistory } from './sinks_history.js';
import { createMetrics } from './metrics.js';
import { startHealthServer } from './health.js';
import { checkSinks, renderPreflight } from './preflight.js';
import { VolumeMonitor } from './monitor.js';
import { errorMessage } from './result.js';

const cfg = readMonitorConfig();
const metrics = createMetrics({ defaults: true });

console.log(renderPreflight(cfg, checkSinks(cfg)));

const monitor = new VolumeMonitor({
  tokens: fileTokenSource(cfg.tokensFile),
  market: dexscreenerSource({ apiBase: cfg.dexscreenerApi, timeoutMs: cfg.providerTimeoutMs, metrics }),
  detector: new SpikeDetector({ policy: cfg.policy, volumeFormat: cfg.volumeFormat }),
  notifier: createNotifier(cfg.telegram, cfg.sinkTimeoutMs),
  history: createHistory(cfg.dashboardUrl, cfg.sinkTimeoutMs),
  metrics,
});

let stopping = false;
const health = cfg.healthPort > 0 ? startHealthServer(metrics.registry, cfg.healthPort, {
  ready: () => !stopping,
  tokensFile: cfg.tokensApi ? cfg.tokensFile : undefined,
}) : null;

const ticker = monitor.start({ intervalMs: cfg.pollIntervalMs, warmUp: cfg.warmUp });
console.log('[monitor] started');

ticker.done.catch((e: unknown) => {
  console.error('[monitor] loop stopped', errorMessage(e));
  process.exit(1);
});

async function shutdown(signal: string) {
  if (stopping) return;
  stopping = true;
  console.log(`[monitor] ${signal} received, shutting down`);
  await ticker.stop().catch((e: unknown) => console.error('[monitor] stop failed', errorMessage(e)));
  if (health) await new Promise<void>((resolve) => health.close(() => resolve()));
  process.exit(0);
}

process.on('SIGINT', () => { void shutdown('SIGINT'); });
process.on('SIGTERM', () => { void shutdown('SIGTERM'); });
