import type { CheckOutcome, ResultBatch } from '../../src/monitor/types';

export const CHECKED_AT = 1_700_000_000_000;

export function buildOutcome(overrides: Partial<CheckOutcome> = {}): CheckOutcome {
  const serviceName = overrides.serviceName ?? 'api';
  return {
    serviceName,
    url: `https://${serviceName}.example.com`,
    isHealthy: true,
    statusCode: 200,
    responseTimeMs: 12.34,
    errorMessage: null,
    checkedAt: CHECKED_AT,
    ...overrides,
  };
}

export function buildBatch(producedAt: number, names: string[] = ['api']): ResultBatch {
  return {
    results: names.map((serviceName) => buildOutcome({ serviceName, checkedAt: producedAt })),
    producedAt,
  };
}

export type Deferred<T> = {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
};

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
