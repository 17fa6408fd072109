export type Ok<T> = { ok: true; value: T };
export type Miss = { ok: false; reason: string; error?: unknown };
export type Result<T> = Ok<T> | Miss;

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });
export const miss = (reason: string, error?: unknown): Miss => (error === undefined ? { ok: false, reason } : { ok: false, reason, error });

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e ?? 'error');
}
