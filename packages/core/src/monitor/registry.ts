import type { ServiceEntry, ServiceRegistry } from './types';

export class RegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RegistryError';
  }
}

// Built once at startup; iteration order is the order results are reported in.
export function createServiceRegistry(
  pairs: Iterable<readonly [string, string]>,
): ServiceRegistry {
  const entries: ServiceEntry[] = [];
  const seen = new Set<string>();

  for (const [rawName, rawUrl] of pairs) {
    const name = rawName.trim();
    const url = rawUrl.trim();
    if (name.length === 0) throw new RegistryError('service name must not be empty');
    if (url.length === 0) throw new RegistryError(`service "${name}" has an empty url`);
    if (seen.has(name)) throw new RegistryError(`duplicate service name "${name}"`);

    seen.add(name);
    entries.push(Object.freeze({ name, url }));
  }

  return Object.freeze(entries);
}
