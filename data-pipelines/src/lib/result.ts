import type { GeoPoint } from '@disaster-maps/schema';

export type LoadErrorKind = 'FetchFailure' | 'ParseFailure' | 'DataUnavailable';

export type LoadError = { kind: LoadErrorKind; message: string; cause?: unknown };

export type LoadResult<T> = { ok: true; value: T } | { ok: false; error: LoadError };

/** Points kept from one source payload, with how many records were dropped on the way. */
export type LoadSummary = { points: GeoPoint[]; total: number; skipped: number };

export function ok<T>(value: T): LoadResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(kind: LoadErrorKind, message: string, cause?: unknown): LoadResult<T> {
  return { ok: false, error: cause === undefined ? { kind, message } : { kind, message, cause } };
}

export function summarize(points: GeoPoint[], total: number, what: string): LoadResult<LoadSummary> {
  if (points.length === 0) return fail('DataUnavailable', `No usable ${what} in ${total} source records`);
  return ok({ points, total, skipped: total - points.length });
}
