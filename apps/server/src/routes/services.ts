import { toServicesResponse, toServiceStatusView } from '@healthwatch/core';
import { Hono } from 'hono';
import { z } from 'zod';

import type { AppEnv } from '../env';
import { AppError } from '../middleware/errors';

export const servicesRoutes = new Hono<AppEnv>();

const serviceNameSchema = z.string().trim().min(1).max(200);

servicesRoutes.get('/services', async (c) => {
  const batch = await c.get('cache').getResults(false);
  return c.json(toServicesResponse(batch));
});

servicesRoutes.get('/services/:name', async (c) => {
  const name = serviceNameSchema.parse(c.req.param('name'));
  const batch = await c.get('cache').getResults(false);

  const outcome = batch.results.find((r) => r.serviceName === name);
  if (!outcome) throw new AppError(404, 'NOT_FOUND', `Service '${name}' is not monitored`);
  return c.json(toServiceStatusView(outcome));
});

// Forces a refresh; concurrent calls share the same run.
servicesRoutes.post('/check', async (c) => {
  const batch = await c.get('cache').getResults(true);
  return c.json(toServicesResponse(batch));
});
