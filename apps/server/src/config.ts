// Process configuration, read once from environment variables at startup.
//
// - Invalid values fail fast with a ConfigError listing every problem.
// - SERVICES_CONFIG format: `name=url,name2=url2`.
// - The cache freshness window is not configurable here; see DEFAULT_FRESHNESS_WINDOW_MS.

import { z } from 'zod';

export const DEFAULT_SERVICES_CONFIG =
  'github=https://api.github.com,google=https://www.google.com';

export type ServicePair = readonly [name: string, url: string];

export type Config = {
  appName: string;
  appVersion: string;
  debug: boolean;
  host: string;
  port: number;
  checkIntervalMs: number;
  requestTimeoutMs: number;
  services: ServicePair[];
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

export const servicesConfigSchema = z.string().transform((raw, ctx): ServicePair[] => {
  if (raw.trim().length === 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must not be empty' });
    return z.NEVER;
  }

  const pairs: ServicePair[] = [];
  const seen = new Set<string>();

  for (const item of raw.split(',')) {
    const idx = item.indexOf('=');
    if (idx === -1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `invalid item '${item}', expected 'name=url'`,
      });
      continue;
    }

    const name = item.slice(0, idx).trim();
    const url = item.slice(idx + 1).trim();
    if (!name || !url) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `empty name or url in '${item}'` });
      continue;
    }
    if (!isHttpUrl(url)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `url for '${name}' must be a valid http or https URL`,
      });
      continue;
    }
    if (seen.has(name)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate service name '${name}'` });
      continue;
    }

    seen.add(name);
    pairs.push([name, url]);
  }

  return pairs;
});

const booleanFlagSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

const envSchema = z.object({
  APP_NAME: z.string().trim().min(1).default('Service Health Monitor'),
  APP_VERSION: z.string().trim().min(1).default('dev'),
  DEBUG: booleanFlagSchema.default('false'),
  HOST: z.string().trim().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  CHECK_INTERVAL_SECONDS: z.coerce.number().int().positive().default(60),
  REQUEST_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(10),
  SERVICES_CONFIG: servicesConfigSchema.default(DEFAULT_SERVICES_CONFIG),
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

export function loadConfig(env: Record<string, string | undefined>): Config {
  const r = envSchema.safeParse(env);
  if (!r.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(r.error)}`);
  }

  const v = r.data;
  return {
    appName: v.APP_NAME,
    appVersion: v.APP_VERSION,
    debug: v.DEBUG,
    host: v.HOST,
    port: v.PORT,
    checkIntervalMs: v.CHECK_INTERVAL_SECONDS * 1000,
    requestTimeoutMs: v.REQUEST_TIMEOUT_SECONDS * 1000,
    services: v.SERVICES_CONFIG,
  };
}
