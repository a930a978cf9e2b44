export type ServiceEntry = {
  readonly name: string;
  readonly url: string;
};

export type ServiceRegistry = readonly ServiceEntry[];

export type CheckOutcome = {
  readonly serviceName: string;
  readonly url: string;
  readonly isHealthy: boolean;
  readonly statusCode: number | null;
  readonly responseTimeMs: number;
  readonly errorMessage: string | null;
  // epoch ms
  readonly checkedAt: number;
};

export type ResultBatch = {
  readonly results: readonly CheckOutcome[];
  // epoch ms
  readonly producedAt: number;
};

export type Clock = () => number;

export const systemClock: Clock = () => Date.now();
