import fs from 'fs/promises';
import { fileURLToPath } from 'url';
import { FETCH } from '@disaster-maps/config';
import { errorMessage } from './utils.js';
import { fail, ok, type LoadResult } from './result.js';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export type SourceOptions = { timeoutMs?: number; fetchImpl?: FetchLike };

function isRemote(location: string): boolean {
  return /^https?:\/\//i.test(location);
}

function localPath(location: string): string {
  return location.startsWith('file:') ? fileURLToPath(location) : location;
}

/**
 * Reads a whole payload as text, from an http(s) URL or from disk.
 * Every way this can go wrong (refused connection, timeout, non-2xx status,
 * missing file) comes back as a FetchFailure.
 */
export async function readSource(location: string, opts: SourceOptions = {}): Promise<LoadResult<string>> {
  if (!isRemote(location)) {
    try {
      return ok(await fs.readFile(localPath(location), 'utf8'));
    } catch (e) {
      return fail('FetchFailure', `Cannot read ${location}: ${errorMessage(e)}`, e);
    }
  }

  const fetchImpl = opts.fetchImpl ?? fetch;
  const timeoutMs = opts.timeoutMs ?? FETCH.timeoutMs;
  let res: Response;
  try {
    res = await fetchImpl(location, {
      headers: { 'User-Agent': FETCH.userAgent },
      signal: AbortSignal.timeout(timeoutMs)
    });
  } catch (e) {
    if (e instanceof Error && e.name === 'TimeoutError') {
      return fail('FetchFailure', `Request to ${location} timed out after ${timeoutMs} ms`, e);
    }
    return fail('FetchFailure', `Request to ${location} failed: ${errorMessage(e)}`, e);
  }
  if (!res.ok) {
    await res.body?.cancel();
    return fail('FetchFailure', `${location} responded ${res.status} ${res.statusText}`.trim());
  }
  try {
    return ok(await res.text());
  } catch (e) {
    return fail('FetchFailure', `Reading body of ${location} failed: ${errorMessage(e)}`, e);
  }
}
