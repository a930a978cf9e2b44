export { DEFAULT_FRESHNESS_WINDOW_MS, ResultCache, type ResultCacheOptions } from './cache/result-cache';
export {
  toServicesResponse,
  toServiceStatusView,
  type ServiceStatusView,
  type ServicesResponse,
} from './format/services';
export { METRICS_CONTENT_TYPE, toMetricsText } from './format/metrics';
export { checkAll, type CheckAllOptions } from './monitor/fanout';
export {
  probeService,
  TIMEOUT_MESSAGE,
  USER_AGENT,
  type Probe,
  type ProbeOptions,
} from './monitor/http';
export { createServiceRegistry, RegistryError } from './monitor/registry';
export {
  systemClock,
  type CheckOutcome,
  type Clock,
  type ResultBatch,
  type ServiceEntry,
  type ServiceRegistry,
} from './monitor/types';
export { RefreshScheduler, type RefreshSchedulerOptions } from './scheduler/refresh';
