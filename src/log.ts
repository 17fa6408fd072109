export const mask = (s: string, keep = 6) => (s && s.length > keep * 2 ? s.slice(0, keep) + '…' + s.slice(-keep) : s);

// base58 addresses are case-sensitive, so no lowercasing here
export const maskAddr = (s: string, enabled = process.env.LOG_ADDRESS_MASK !== 'false') => (enabled ? mask(s, 6) : s);

export type LogFields = Record<string, string | number | boolean | null | undefined>;

export function logEvent(at: string, fields: LogFields = {}) {
  console.log(JSON.stringify({ at, ...fields }));
}

export function warnEvent(at: string, fields: LogFields = {}) {
  console.warn(JSON.stringify({ at, ...fields }));
}
