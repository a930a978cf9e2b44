import type { CheckOutcome, ResultBatch } from '../monitor/types';

export type ServiceStatusView = {
  service_name: string;
  url: string;
  is_healthy: boolean;
  status_code: number | null;
  response_time_ms: number;
  error_message: string | null;
  checked_at: string;
};

export type ServicesResponse = {
  services: ServiceStatusView[];
  total: number;
  healthy: number;
  unhealthy: number;
};

export function toServiceStatusView(outcome: CheckOutcome): ServiceStatusView {
  return {
    service_name: outcome.serviceName,
    url: outcome.url,
    is_healthy: outcome.isHealthy,
    status_code: outcome.statusCode,
    response_time_ms: outcome.responseTimeMs,
    error_message: outcome.errorMessage,
    checked_at: new Date(outcome.checkedAt).toISOString(),
  };
}

export function toServicesResponse(batch: ResultBatch): ServicesResponse {
  const services = batch.results.map(toServiceStatusView);
  const healthy = services.filter((s) => s.is_healthy).length;
  return {
    services,
    total: services.length,
    healthy,
    unhealthy: services.length - healthy,
  };
}
