import fs from 'node:fs';
import path from 'node:path';
import { errorMessage } from './result.js';
import { warnEvent } from './log.js';

export const MIN_ADDRESS_LENGTH = 20;
export const MAX_ADDRESS_LENGTH = 66;

export type TokenEntry = { address: string; order: number };
type Entry = TokenEntry;

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function normalizeEntry(t: unknown): Entry | null {
  if (typeof t === 'string') {
    const address = t.trim();
    return address ? { address, order: 0 } : null;
  }
  if (isRecord(t) && typeof t.address === 'string') {
    const address = t.address.trim();
    if (!address) return null;
    const order = Number(t.order ?? 0);
    return { address, order: Number.isFinite(order) ? Math.trunc(order) : 0 };
  }
  return null;
}

export function isWatchableAddress(address: string): boolean {
  return address.length >= MIN_ADDRESS_LENGTH && address.length <= MAX_ADDRESS_LENGTH;
}

/** Pulls the watch-list out of a parsed `{ tokens: [...] }` document. */
export function tokensFromDocument(doc: unknown): string[] {
  if (!isRecord(doc) || !Array.isArray(doc.tokens)) return [];
  const entries = doc.tokens
    .map(normalizeEntry)
    .filter((e): e is Entry => e !== null);
  entries.sort((a, b) => a.order - b.order);
  const seen = new Set<string>();
  const out: string[] = [];
  for (const { address } of entries) {
    if (!isWatchableAddress(address) || seen.has(address)) continue;
    seen.add(address);
    out.push(address);
  }
  return out;
}

/**
 * Re-reads the token file on every call so edits apply on the next cycle.
 * Any problem with the file degrades to an empty watch-list.
 */
export async function loadTokens(file: string): Promise<string[]> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(file, 'utf8');
  } catch (e) {
    if (isRecord(e) && e.code === 'ENOENT') return [];
    warnEvent('tokens.read_failed', { path: file, error: errorMessage(e) });
    return [];
  }
  try {
    return tokensFromDocument(JSON.parse(raw));
  } catch (e) {
    warnEvent('tokens.parse_failed', { path: file, error: errorMessage(e) });
    return [];
  }
}

export type TokenSource = { load(): Promise<string[]> };

export function fileTokenSource(file: string): TokenSource {
  return { load: () => loadTokens(file) };
}

export type TokenListResponse = { ok: boolean; tokens: TokenEntry[]; error?: string };

/** The watch-list as stored, sorted by `order` and renumbered from 0. No length filter. */
export async function readTokenEntries(file: string): Promise<TokenEntry[]> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(file, 'utf8');
  } catch (e) {
    if (isRecord(e) && e.code === 'ENOENT') return [];
    throw e;
  }
  const doc: unknown = JSON.parse(raw);
  if (!isRecord(doc) || !Array.isArray(doc.tokens)) return [];
  const entries = doc.tokens.map(normalizeEntry).filter((e): e is Entry => e !== null);
  entries.sort((a, b) => a.order - b.order);
  return entries.map((e, i) => ({ address: e.address, order: i }));
}

async function writeTokenEntries(file: string, addresses: string[]): Promise<TokenEntry[]> {
  const tokens = addresses.map((address, order) => ({ address, order }));
  const tmp = path.join(path.dirname(file), `.${path.basename(file)}.${process.pid}.tmp`);
  await fs.promises.writeFile(tmp, JSON.stringify({ tokens }, null, 4) + '\n', 'utf8');
  await fs.promises.rename(tmp, file);
  return tokens;
}

const editQueues = new Map<string, Promise<unknown>>();

/** Serialises read-modify-write cycles on one file. */
function serialize<T>(file: string, fn: () => Promise<T>): Promise<T> {
  const prev = editQueues.get(file) ?? Promise.resolve();
  const next = prev.then(fn, fn);
  const tail = next.catch(() => undefined);
  editQueues.set(file, tail);
  void tail.then(() => { if (editQueues.get(file) === tail) editQueues.delete(file); });
  return next;
}

async function editTokens(
  file: string,
  edit: (current: string[]) => { error: string } | { next: string[] },
): Promise<TokenListResponse> {
  return serialize(file, async () => {
    let current: TokenEntry[];
    try {
      current = await readTokenEntries(file);
    } catch (e) {
      warnEvent('tokens.read_failed', { path: file, error: errorMessage(e) });
      return { ok: false, tokens: [], error: 'Failed to read config' };
    }
    const out = edit(current.map(t => t.address));
    if ('error' in out) return { ok: false, tokens: current, error: out.error };
    try {
      return { ok: true, tokens: await writeTokenEntries(file, out.next) };
    } catch (e) {
      warnEvent('tokens.write_failed', { path: file, error: errorMessage(e) });
      return { ok: false, tokens: current, error: 'Failed to save config' };
    }
  });
}

/** Appends `address` to the watch-list file. Rejects out-of-range lengths and duplicates. */
export function addToken(file: string, address: string): Promise<TokenListResponse> {
  const addr = address.trim();
  if (!isWatchableAddress(addr)) return Promise.resolve({ ok: false, tokens: [], error: 'Invalid token address' });
  return editTokens(file, (current) =>
    current.includes(addr) ? { error: 'Token already added' } : { next: [...current, addr] });
}

export function removeToken(file: string, address: string): Promise<TokenListResponse> {
  const addr = address.trim();
  if (!isWatchableAddress(addr)) return Promise.resolve({ ok: false, tokens: [], error: 'Invalid token address' });
  return editTokens(file, (current) => ({ next: current.filter(a => a !== addr) }));
}

/**
 * Moves the listed addresses to the front in the given order; the rest keep
 * their relative order behind them. Unknown addresses in `order` are ignored.
 */
export function reorderTokens(file: string, order: string[]): Promise<TokenListResponse> {
  const wanted = order.map(a => a.trim()).filter(Boolean);
  if (wanted.length === 0) return Promise.resolve({ ok: false, tokens: [], error: 'Missing order' });
  return editTokens(file, (current) => {
    const known = new Set(current);
    const front = [...new Set(wanted)].filter(a => known.has(a));
    const picked = new Set(front);
    return { next: [...front, ...current.filter(a => !picked.has(a))] };
  });
}
