import { systemClock, type CheckOutcome, type Clock, type ServiceEntry } from './types';

export type ProbeOptions = {
  timeoutMs: number;
  now?: Clock;
};

export type Probe = (entry: ServiceEntry, options: ProbeOptions) => Promise<CheckOutcome>;

export const USER_AGENT = 'healthwatch/0.1';
export const TIMEOUT_MESSAGE = 'Connection timeout';

export function toErrorMessage(err: unknown): string {
  if (!(err instanceof Error)) return String(err);

  // undici reports every network failure as "fetch failed"; the detail lives on `cause`.
  const cause: unknown = err.cause;
  if (cause instanceof Error && cause.message && cause.message !== err.message) {
    return err.message ? `${err.message}: ${cause.message}` : cause.message;
  }
  return err.message || err.name;
}

function isAbortError(err: unknown): boolean {
  if (err && typeof err === 'object' && 'name' in err) {
    const name = (err as { name?: unknown }).name;
    return name === 'AbortError' || name === 'TimeoutError';
  }
  return false;
}

function elapsedMs(started: number): number {
  const ms = performance.now() - started;
  return Math.max(0, Math.round(ms * 100) / 100);
}

async function fetchWithTimeout(
  url: string,
  timeoutMs: number,
  init: RequestInit,
): Promise<Response> {
  const controller = new AbortController();
  const t = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await fetch(url, { ...init, signal: controller.signal });
  } finally {
    clearTimeout(t);
  }
}

export const probeService: Probe = async (entry, options) => {
  const now = options.now ?? systemClock;
  const base = { serviceName: entry.name, url: entry.url };
  const started = performance.now();

  try {
    const res = await fetchWithTimeout(entry.url, options.timeoutMs, {
      method: 'GET',
      headers: { 'User-Agent': USER_AGENT },
      cache: 'no-store',
      redirect: 'follow',
    });
    const responseTimeMs = elapsedMs(started);

    // Only the status matters; release the connection without reading the body.
    await res.body?.cancel().catch(() => undefined);

    return Object.freeze({
      ...base,
      isHealthy: res.status < 400,
      statusCode: res.status,
      responseTimeMs,
      errorMessage: null,
      checkedAt: now(),
    });
  } catch (err) {
    const responseTimeMs = elapsedMs(started);
    return Object.freeze({
      ...base,
      isHealthy: false,
      statusCode: null,
      responseTimeMs,
      errorMessage: isAbortError(err) ? TIMEOUT_MESSAGE : toErrorMessage(err),
      checkedAt: now(),
    });
  }
};
