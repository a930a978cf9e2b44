// Prometheus text exposition format, version 0.0.4.

import type { CheckOutcome, ResultBatch } from '../monitor/types';

export const METRICS_CONTENT_TYPE = 'text/plain; version=0.0.4; charset=utf-8';

type GaugeSeries = {
  name: string;
  help: string;
  value: (outcome: CheckOutcome) => number;
};

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

function formatValue(n: number): string {
  if (Number.isNaN(n)) return 'NaN';
  if (n === Infinity) return '+Inf';
  if (n === -Infinity) return '-Inf';
  return String(n);
}

const SERIES: readonly GaugeSeries[] = [
  {
    name: 'service_up',
    help: 'Whether the service responded with a status below 400 (1) or not (0).',
    value: (r) => (r.isHealthy ? 1 : 0),
  },
  {
    name: 'service_response_time_ms',
    help: 'Response time of the last health check in milliseconds.',
    value: (r) => r.responseTimeMs,
  },
];

export function toMetricsText(batch: ResultBatch): string {
  const lines: string[] = [];
  for (const s of SERIES) {
    lines.push(`# HELP ${s.name} ${s.help}`);
    lines.push(`# TYPE ${s.name} gauge`);
    for (const r of batch.results) {
      lines.push(`${s.name}{service="${escapeLabelValue(r.serviceName)}"} ${formatValue(s.value(r))}`);
    }
  }
  return lines.join('\n') + '\n';
}
