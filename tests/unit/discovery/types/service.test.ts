import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import {
  createService,
  instanceKey,
  sameInstances,
  sameService,
  serviceKey,
} from '../../../../src/discovery/types/service.js';

describe('createService', () => {
  it('defaults to the single nearest instance', () => {
    expect(createService('api', 8080)).toEqual({ name: 'api', port: 8080, nearestCount: 1 });
  });

  it('returns a frozen value', () => {
    expect(Object.isFrozen(createService('api', 8080, 2))).toBe(true);
  });

  it.each([
    ['an empty name', '', 8080, undefined],
    ['a negative port', 'api', -1, undefined],
    ['a port above 65535', 'api', 65536, undefined],
    ['a fractional port', 'api', 80.5, undefined],
    ['a zero nearest count', 'api', 8080, 0],
  ])('rejects %s', (_label, name, port, nearestCount) => {
    expect(() => createService(name, port, nearestCount)).toThrow(ZodError);
  });
});

describe('service identity', () => {
  it('ignores the nearest count', () => {
    const one = createService('api', 8080, 1);
    const three = createService('api', 8080, 3);

    expect(serviceKey(one)).toBe('api:8080');
    expect(serviceKey(three)).toBe('api:8080');
    expect(sameService(one, three)).toBe(true);
    expect(sameService(one, createService('api', 8081))).toBe(false);
  });
});

describe('sameInstances', () => {
  const a = { host: 'fdaa::1', port: 80 };
  const b = { host: 'fdaa::2', port: 80 };

  it('brackets the host in the instance key', () => {
    expect(instanceKey(a)).toBe('[fdaa::1]:80');
  });

  it('compares membership, not order', () => {
    expect(sameInstances([a, b], [b, a])).toBe(true);
    expect(sameInstances([], [])).toBe(true);
  });

  it('detects added, removed and replaced instances', () => {
    expect(sameInstances([a], [a, b])).toBe(false);
    expect(sameInstances([a, b], [a])).toBe(false);
    expect(sameInstances([a], [b])).toBe(false);
    expect(sameInstances([a], [{ host: 'fdaa::1', port: 81 }])).toBe(false);
  });
});
