import type { ResultCache } from '@healthwatch/core';
import { Hono } from 'hono';
import { logger } from 'hono/logger';

import type { AppEnv, AppInfo } from './env';
import { handleError, handleNotFound } from './middleware/errors';
import { metaRoutes } from './routes/meta';
import { metricsRoutes } from './routes/metrics';
import { servicesRoutes } from './routes/services';

export type AppDeps = {
  cache: ResultCache;
  info: AppInfo;
  debug?: boolean;
};

export function createApp(deps: AppDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.onError(handleError);
  app.notFound(handleNotFound);

  if (deps.debug) {
    app.use('*', logger());
  }

  app.use('*', async (c, next) => {
    c.set('cache', deps.cache);
    c.set('info', deps.info);
    await next();
  });

  app.route('/', metaRoutes);
  app.route('/', metricsRoutes);
  app.route('/api', servicesRoutes);

  return app;
}
