import http from 'node:http';
import type { Registry } from 'prom-client';
import { addToken, readTokenEntries, removeToken, reorderTokens, type TokenListResponse } from './tokens.js';
import { errorMessage } from './result.js';
import { warnEvent } from './log.js';

export type HealthOptions = {
  ready?: () => boolean;
  /** Watch-list file edited through `/tokens`; the routes 404 when unset. */
  tokensFile?: string;
};

function sendJSON(res: http.ServerResponse, status: number, body: TokenListResponse) {
  res.writeHead(status, { 'content-type': 'application/json' });
  res.end(JSON.stringify(body));
}

async function tokensRoute(file: string, req: http.IncomingMessage, url: URL): Promise<[number, TokenListResponse]> {
  if (req.method === 'GET') {
    try {
      return [200, { ok: true, tokens: await readTokenEntries(file) }];
    } catch (e) {
      warnEvent('tokens.read_failed', { path: file, error: errorMessage(e) });
      return [500, { ok: false, tokens: [], error: 'Failed to read config' }];
    }
  }
  if (req.method !== 'POST') return [405, { ok: false, tokens: [], error: 'Method not allowed' }];

  const action = (url.searchParams.get('action') ?? '').trim();
  const token = (url.searchParams.get('token') ?? '').trim();
  if (action === 'reorder') {
    const order = (url.searchParams.get('order') ?? '').split(',');
    return [200, await reorderTokens(file, order)];
  }
  if (!action || !token) return [200, { ok: false, tokens: [], error: 'Missing action or token' }];
  if (action === 'add') return [200, await addToken(file, token)];
  if (action === 'remove') return [200, await removeToken(file, token)];
  return [200, { ok: false, tokens: [], error: 'Invalid action' }];
}

export function createHealthServer(registry: Registry, opts: HealthOptions = {}) {
  const started = Date.now();
  const ready = opts.ready ?? (() => true);
  return http.createServer((req, res) => {
    const url = req.url || '/';
    if (url.startsWith('/live') || url.startsWith('/healthz')) {
      res.writeHead(200, { 'content-type': 'text/plain' });
      res.end('ok');
      return;
    }
    if (url.startsWith('/ready')) {
      if (ready()) {
        res.writeHead(200, { 'content-type': 'text/plain' });
        res.end('ready');
      } else {
        res.writeHead(503, { 'content-type': 'text/plain', 'Retry-After': '30' });
        res.end('not ready');
      }
      return;
    }
    if (url.startsWith('/metrics')) {
      registry.metrics().then((body) => {
        res.writeHead(200, { 'content-type': registry.contentType, 'x-uptime-sec': String(Math.round((Date.now() - started) / 1000)) });
        res.end(body);
      }).catch((e: unknown) => {
        res.writeHead(500, { 'content-type': 'text/plain' });
        res.end(e instanceof Error ? e.message : 'error');
      });
      return;
    }
    const parsed = new URL(url, 'http://localhost');
    if (opts.tokensFile && parsed.pathname === '/tokens') {
      tokensRoute(opts.tokensFile, req, parsed)
        .then(([status, body]) => sendJSON(res, status, body))
        .catch((e: unknown) => sendJSON(res, 500, { ok: false, tokens: [], error: errorMessage(e) }));
      return;
    }
    res.writeHead(404, { 'content-type': 'text/plain' });
    res.end('not found');
  });
}

/** A port that cannot be bound only costs the endpoints; polling carries on. */
export function startHealthServer(registry: Registry, port: number, opts?: HealthOptions) {
  const srv = createHealthServer(registry, opts);
  srv.on('error', (e) => warnEvent('health.listen_failed', { port, error: errorMessage(e) }));
  srv.listen(port, () => console.log(`[health] listening on :${port}`));
  return srv;
}
