import { probeService, toErrorMessage, type Probe } from './http';
import { systemClock, type CheckOutcome, type Clock, type ResultBatch, type ServiceRegistry } from './types';

export type CheckAllOptions = {
  timeoutMs: number;
  probe?: Probe;
  now?: Clock;
};

// Probes all services in parallel. The batch resolves once the slowest probe has
// finished or hit its timeout, with results in registry order.
export async function checkAll(
  registry: ServiceRegistry,
  options: CheckAllOptions,
): Promise<ResultBatch> {
  const now = options.now ?? systemClock;
  if (registry.length === 0) {
    return Object.freeze({ results: Object.freeze([]), producedAt: now() });
  }

  const probe = options.probe ?? probeService;
  const probeOptions = { timeoutMs: options.timeoutMs, now };

  const results = await Promise.all(
    registry.map((entry) =>
      probe(entry, probeOptions).catch(
        (err: unknown): CheckOutcome =>
          Object.freeze({
            serviceName: entry.name,
            url: entry.url,
            isHealthy: false,
            statusCode: null,
            responseTimeMs: 0,
            errorMessage: toErrorMessage(err),
            checkedAt: now(),
          }),
      ),
    ),
  );

  return Object.freeze({ results: Object.freeze(results), producedAt: now() });
}
