/**
 * Service Registry
 *
 * In-memory cache of registered services and their last-known instances.
 * Key presence means "registered"; an empty list means "registered but not
 * resolved yet". Only touched from tasks on the engine's serial executor.
 */

import type { Logger } from 'pino';
import { serviceKey, type Instance, type Service } from '../types/service.js';

interface RegistryEntry {
  service: Service;
  instances: Instance[];
  updatedAt: number;
}

/**
 * One service's outcome from a refresh round
 */
export interface InstanceUpdate {
  service: Service;
  instances: Instance[];
}

/**
 * Service Registry
 *
 * @example
 * ```typescript
 * const registry = new ServiceRegistry(logger);
 * registry.register([api]);
 * registry.setInstances(api, [{ host: 'fdaa::1', port: 8080 }]);
 * registry.getInstances(api); // [{ host: 'fdaa::1', port: 8080 }]
 * ```
 */
export class ServiceRegistry {
  private entries: Map<string, RegistryEntry> = new Map();

  constructor(private readonly logger: Logger) {}

  /**
   * Register services with an empty cache entry
   *
   * Re-registering a service resets its cache.
   */
  register(services: readonly Service[]): void {
    for (const service of services) {
      const key = serviceKey(service);
      const existing = this.entries.get(key);

      this.entries.set(key, { service, instances: [], updatedAt: Date.now() });

      if (existing) {
        this.logger.info({ service: service.name, port: service.port }, 'Service re-registered, cache reset');
      } else {
        this.logger.info({ service: service.name, port: service.port }, 'Service registered');
      }
    }
  }

  has(service: Service): boolean {
    return this.entries.has(serviceKey(service));
  }

  /**
   * Cached instances, or undefined if the service is not registered
   */
  getInstances(service: Service): Instance[] | undefined {
    const entry = this.entries.get(serviceKey(service));
    return entry ? [...entry.instances] : undefined;
  }

  /**
   * Replace the cached instances of a registered service
   *
   * @returns false if the service is not registered
   */
  setInstances(service: Service, instances: readonly Instance[]): boolean {
    const entry = this.entries.get(serviceKey(service));
    if (!entry) {
      return false;
    }
    entry.instances = [...instances];
    entry.updatedAt = Date.now();
    return true;
  }

  /**
   * Apply a whole round of updates at once
   *
   * @returns the updates whose service is still registered, with the list
   *   each one replaced
   */
  applyBatch(
    updates: readonly InstanceUpdate[]
  ): Array<InstanceUpdate & { previous: Instance[] }> {
    const applied: Array<InstanceUpdate & { previous: Instance[] }> = [];
    for (const update of updates) {
      const previous = this.getInstances(update.service);
      if (previous === undefined) {
        continue;
      }
      this.setInstances(update.service, update.instances);
      applied.push({ ...update, previous });
    }
    return applied;
  }

  /**
   * Snapshot of every registered service
   */
  getServices(): Service[] {
    return Array.from(this.entries.values(), (entry) => entry.service);
  }

  getServiceCount(): number {
    return this.entries.size;
  }
}
