import { systemClock, type Clock, type ResultBatch } from '../monitor/types';

export const DEFAULT_FRESHNESS_WINDOW_MS = 5_000;

export type ResultCacheOptions = {
  refresh: () => Promise<ResultBatch>;
  freshnessWindowMs?: number;
  now?: Clock;
};

/**
 * Holds the latest batch and coalesces refreshes.
 *
 * At most one refresh runs at a time. Callers that need a refresh while one is
 * in flight (forced or not) share its promise instead of starting their own.
 * The freshness check, the refresh decision and the installation of a new batch
 * contain no await between them, so no other caller can interleave.
 */
export class ResultCache {
  private current: ResultBatch | null = null;
  private inflight: Promise<ResultBatch> | null = null;
  private refreshCount = 0;

  private readonly refresh: () => Promise<ResultBatch>;
  private readonly now: Clock;
  readonly freshnessWindowMs: number;

  constructor(options: ResultCacheOptions) {
    this.refresh = options.refresh;
    this.now = options.now ?? systemClock;
    this.freshnessWindowMs = options.freshnessWindowMs ?? DEFAULT_FRESHNESS_WINDOW_MS;
  }

  getResults(force = false): Promise<ResultBatch> {
    if (!force && this.current && this.isFresh(this.current)) {
      return Promise.resolve(this.current);
    }
    if (this.inflight) return this.inflight;

    const run: Promise<ResultBatch> = this.runRefresh().finally(() => {
      if (this.inflight === run) this.inflight = null;
    });
    this.inflight = run;
    return run;
  }

  /** The latest installed batch, without triggering a refresh. */
  peek(): ResultBatch | null {
    return this.current;
  }

  /** Number of refresh runs started since construction. */
  get refreshes(): number {
    return this.refreshCount;
  }

  private isFresh(batch: ResultBatch): boolean {
    return this.now() - batch.producedAt < this.freshnessWindowMs;
  }

  private async runRefresh(): Promise<ResultBatch> {
    this.refreshCount += 1;
    const batch = await this.refresh();
    return this.install(batch);
  }

  private install(batch: ResultBatch): ResultBatch {
    const previous = this.current;
    const next =
      previous && batch.producedAt < previous.producedAt
        ? Object.freeze({ results: batch.results, producedAt: previous.producedAt })
        : batch;
    this.current = next;
    // Callers arriving from here on see the new batch or start a new run.
    this.inflight = null;
    return next;
  }
}
