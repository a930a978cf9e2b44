import { METRICS_CONTENT_TYPE, toMetricsText } from '@healthwatch/core';
import { Hono } from 'hono';

import type { AppEnv } from '../env';

export const metricsRoutes = new Hono<AppEnv>();

metricsRoutes.get('/metrics', async (c) => {
  const batch = await c.get('cache').getResults(false);
  return c.body(toMetricsText(batch), 200, { 'Content-Type': METRICS_CONTENT_TYPE });
});
