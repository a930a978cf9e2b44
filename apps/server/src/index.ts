import { serve } from '@hono/node-server';
import {
  checkAll,
  createServiceRegistry,
  RefreshScheduler,
  ResultCache,
} from '@healthwatch/core';

import { createApp } from './app';
import { loadConfig, type Config } from './config';

function readConfig(): Config {
  try {
    return loadConfig(process.env);
  } catch (err) {
    console.error(err instanceof Error ? err.message : err);
    process.exit(1);
  }
}

function main(): void {
  const config = readConfig();
  const registry = createServiceRegistry(config.services);

  const cache = new ResultCache({
    refresh: () => checkAll(registry, { timeoutMs: config.requestTimeoutMs }),
  });
  const scheduler = new RefreshScheduler({ cache, checkIntervalMs: config.checkIntervalMs });
  const app = createApp({
    cache,
    info: { name: config.appName, version: config.appVersion },
    debug: config.debug,
  });

  const server = serve({ fetch: app.fetch, hostname: config.host, port: config.port }, (info) => {
    console.log(
      `server: listening on http://${info.address}:${info.port} services=${registry.length} interval=${config.checkIntervalMs}ms timeout=${config.requestTimeoutMs}ms`,
    );
  });
  scheduler.start();

  const shutdown = (signal: NodeJS.Signals) => {
    console.log(`server: ${signal} received, shutting down`);
    scheduler.stop();
    server.close((err) => {
      if (err) console.error('server: close failed', err);
      process.exit(err ? 1 : 0);
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main();
