import { describe, expect, it } from 'vitest';

import { createServiceRegistry, RegistryError } from '../src/monitor/registry';

describe('monitor/registry', () => {
  it('keeps insertion order and trims names and urls', () => {
    const registry = createServiceRegistry([
      [' web ', ' https://web.example.com '],
      ['api', 'https://api.example.com'],
    ]);

    expect(registry).toEqual([
      { name: 'web', url: 'https://web.example.com' },
      { name: 'api', url: 'https://api.example.com' },
    ]);
  });

  it('accepts Object.entries and Map input', () => {
    const fromRecord = createServiceRegistry(Object.entries({ a: 'https://a.test' }));
    const fromMap = createServiceRegistry(new Map([['a', 'https://a.test']]));

    expect(fromRecord).toEqual(fromMap);
  });

  it('returns a frozen registry of frozen entries', () => {
    const registry = createServiceRegistry([['a', 'https://a.test']]);

    expect(Object.isFrozen(registry)).toBe(true);
    expect(Object.isFrozen(registry[0])).toBe(true);
  });

  it('allows an empty registry', () => {
    expect(createServiceRegistry([])).toEqual([]);
  });

  it('rejects empty names, empty urls and duplicates', () => {
    expect(() => createServiceRegistry([[' ', 'https://a.test']])).toThrow(RegistryError);
    expect(() => createServiceRegistry([['a', '']])).toThrow('service "a" has an empty url');
    expect(() =>
      createServiceRegistry([
        ['a', 'https://a.test'],
        ['a', 'https://b.test'],
      ]),
    ).toThrow('duplicate service name "a"');
  });
});
