import { describe, it, expect, beforeEach } from 'vitest';
import { ServiceRegistry } from '../../../../src/discovery/engine/service-registry.js';
import { createService } from '../../../../src/discovery/types/service.js';
import { silentLogger } from '../../../helpers/stub-name-resolution-client.js';

describe('ServiceRegistry', () => {
  const api = createService('api', 8080);
  const worker = createService('worker', 9000);
  const first = { host: 'fdaa::1', port: 8080 };
  const second = { host: 'fdaa::2', port: 8080 };

  let registry: ServiceRegistry;

  beforeEach(() => {
    registry = new ServiceRegistry(silentLogger);
  });

  it('registers services with an empty entry', () => {
    registry.register([api, worker]);

    expect(registry.has(api)).toBe(true);
    expect(registry.getInstances(api)).toEqual([]);
    expect(registry.getServiceCount()).toBe(2);
  });

  it('returns undefined for an unregistered service', () => {
    expect(registry.has(api)).toBe(false);
    expect(registry.getInstances(api)).toBeUndefined();
    expect(registry.setInstances(api, [first])).toBe(false);
  });

  it('identifies services by name and port only', () => {
    registry.register([api]);

    expect(registry.has(createService('api', 8080, 3))).toBe(true);
    expect(registry.has(createService('api', 8081))).toBe(false);
  });

  it('hands out copies of the cached list', () => {
    registry.register([api]);
    registry.setInstances(api, [first]);

    registry.getInstances(api)?.push(second);

    expect(registry.getInstances(api)).toEqual([first]);
  });

  it('resets the entry when a service is registered again', () => {
    registry.register([api]);
    registry.setInstances(api, [first]);

    registry.register([api]);

    expect(registry.getInstances(api)).toEqual([]);
    expect(registry.getServiceCount()).toBe(1);
  });

  it('applies a batch and reports the replaced lists', () => {
    registry.register([api]);
    registry.setInstances(api, [first]);

    const applied = registry.applyBatch([
      { service: api, instances: [second] },
      { service: worker, instances: [first] },
    ]);

    expect(applied).toEqual([{ service: api, instances: [second], previous: [first] }]);
    expect(registry.getInstances(api)).toEqual([second]);
    expect(registry.has(worker)).toBe(false);
  });

  it('snapshots the registered services', () => {
    registry.register([api, worker]);

    expect(registry.getServices()).toEqual([api, worker]);
  });
});
