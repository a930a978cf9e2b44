import type { ResultCache } from '../cache/result-cache';

export type RefreshSchedulerOptions = {
  cache: Pick<ResultCache, 'getResults'>;
  checkIntervalMs: number;
};

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(t);
      resolve();
    };
    const t = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

// Keeps the cache warm: sleep, force a refresh, repeat until stopped.
export class RefreshScheduler {
  private readonly cache: Pick<ResultCache, 'getResults'>;
  private readonly checkIntervalMs: number;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(options: RefreshSchedulerOptions) {
    if (!Number.isFinite(options.checkIntervalMs) || options.checkIntervalMs <= 0) {
      throw new RangeError('checkIntervalMs must be a positive number');
    }
    this.cache = options.cache;
    this.checkIntervalMs = options.checkIntervalMs;
  }

  get running(): boolean {
    return this.controller !== null;
  }

  start(): void {
    if (this.controller) return;

    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal);
  }

  // Does not wait for an in-flight refresh; it may still install its batch.
  stop(): void {
    this.controller?.abort();
    this.controller = null;
  }

  /** Resolves once the loop has observed cancellation. */
  async stopped(): Promise<void> {
    await this.loop;
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await sleep(this.checkIntervalMs, signal);
      if (signal.aborted) break;

      try {
        await this.cache.getResults(true);
      } catch (err) {
        console.warn('scheduler: refresh failed', err);
      }
    }
  }
}
