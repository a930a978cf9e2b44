import type { ResultCache } from '@healthwatch/core';

export type AppInfo = {
  name: string;
  version: string;
};

// Per-request variables; the cache is owned by the process entry point.
export type AppEnv = {
  Variables: {
    cache: ResultCache;
    info: AppInfo;
  };
};
