import { BackendError, errorMessage } from './errors.js';

export type JsonReply = {
  status: number;
  data: unknown;
};

function isAbort(e: unknown): boolean {
  return e instanceof Error && e.name === 'AbortError';
}

/**
 * POST-style request whose JSON body is read under the same abort timer as the
 * request itself. Timeouts, network failures, non-2xx statuses and unparseable
 * bodies all become BackendError.
 */
export async function requestJson(label: string, url: string, init: RequestInit, timeoutMs: number): Promise<JsonReply> {
  const ac = new AbortController();
  const t = setTimeout(() => ac.abort(), timeoutMs);
  const timedOut = () => new BackendError(`${label} request timed out after ${timeoutMs}ms`);

  try {
    let resp: Response;
    try {
      resp = await fetch(url, { ...init, signal: ac.signal });
    } catch (e) {
      if (isAbort(e)) throw timedOut();
      throw new BackendError(`${label} request failed: ${errorMessage(e)}`);
    }

    if (!resp.ok) throw await httpError(label, resp);

    try {
      return { status: resp.status, data: await resp.json() };
    } catch (e) {
      if (isAbort(e)) throw timedOut();
      throw new BackendError(`${label} returned invalid JSON: ${errorMessage(e)}`, resp.status);
    }
  } finally {
    clearTimeout(t);
  }
}

export async function httpError(label: string, resp: Response): Promise<BackendError> {
  const text = await resp.text().catch(() => '');
  return new BackendError(`${label} error: ${resp.status} ${resp.statusText}${text ? `\n${text}` : ''}`, resp.status);
}

export function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === 'object' && x !== null && !Array.isArray(x);
}
