import { Hono } from 'hono';

import type { AppEnv } from '../env';

export const metaRoutes = new Hono<AppEnv>();

metaRoutes.get('/', (c) => {
  const info = c.get('info');
  return c.json({
    name: info.name,
    version: info.version,
    endpoints: ['/health', '/api/services', '/api/services/:name', '/api/check', '/metrics'],
  });
});

// Liveness of the monitor process itself, independent of the monitored services.
metaRoutes.get('/health', (c) => {
  return c.json({
    status: 'healthy',
    version: c.get('info').version,
    timestamp: new Date().toISOString(),
  });
});
