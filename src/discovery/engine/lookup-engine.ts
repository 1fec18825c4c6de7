/**
 * Lookup Engine
 *
 * Deadline-bounded point lookups against the service registry.
 *
 * Resolution path:
 * - unregistered service: UnknownServiceError, no network call
 * - non-empty cache: cached instances, no network call
 * - empty cache: on-demand transport call; a non-empty answer is cached,
 *   an empty answer or a failure leaves the cache untouched so the next
 *   lookup retries. An answer that arrives after the deadline is dropped.
 */

import type { Logger } from 'pino';
import type { NameResolutionClient } from '../dns/client.js';
import { UnknownServiceError, wrapTransportError } from '../utils/errors.js';
import type { Instance, Service } from '../types/service.js';
import type { SerialExecutor } from './serial-executor.js';
import type { ServiceRegistry } from './service-registry.js';
import type { TimeoutHandler } from './timeout-handler.js';

export interface LookupEngineDependencies {
  registry: ServiceRegistry;
  client: NameResolutionClient;
  executor: SerialExecutor;
  timeouts: TimeoutHandler;
  logger: Logger;
  /** Called on the executor after an on-demand answer filled an empty entry */
  onCacheFilled?: (service: Service, instances: Instance[]) => void;
}

export class LookupEngine {
  private readonly registry: ServiceRegistry;
  private readonly client: NameResolutionClient;
  private readonly executor: SerialExecutor;
  private readonly timeouts: TimeoutHandler;
  private readonly logger: Logger;
  private readonly onCacheFilled?: (service: Service, instances: Instance[]) => void;

  constructor(dependencies: LookupEngineDependencies) {
    this.registry = dependencies.registry;
    this.client = dependencies.client;
    this.executor = dependencies.executor;
    this.timeouts = dependencies.timeouts;
    this.logger = dependencies.logger;
    this.onCacheFilled = dependencies.onCacheFilled;
  }

  /**
   * Resolve a service within `timeoutMs`
   *
   * @throws {UnknownServiceError} if the service is not registered
   * @throws {LookupTimedOutError} if the timer wins the race
   * @throws {TransportError} if the on-demand call fails
   */
  async lookup(service: Service, timeoutMs: number): Promise<Instance[]> {
    this.logger.debug({ service: service.name, timeoutMs }, 'Looking up instances');

    try {
      const instances = await this.timeouts.withTimeout(
        (signal) => this.resolve(service, signal),
        timeoutMs,
        `Lookup of '${service.name}'`
      );
      this.logger.debug({ service: service.name, count: instances.length }, 'Found instances');
      return instances;
    } catch (error) {
      this.logger.debug({ service: service.name, err: error }, 'Error looking up instances');
      throw error;
    }
  }

  private async resolve(service: Service, signal: AbortSignal): Promise<Instance[]> {
    const cached = await this.executor.submit(() => {
      const instances = this.registry.getInstances(service);
      if (instances === undefined) {
        throw new UnknownServiceError(service);
      }
      return instances;
    });

    if (cached.length > 0) {
      return cached;
    }

    let fetched: Instance[];
    try {
      fetched = await this.client.listInstancesOf(service, { signal });
    } catch (error) {
      throw wrapTransportError(error, `Failed to resolve instances of '${service.name}'`);
    }

    if (fetched.length === 0 || signal.aborted) {
      return fetched;
    }

    await this.executor.submit(() => {
      // The deadline may have passed while this task was queued
      if (signal.aborted) {
        return;
      }
      // Only fill an entry that is still registered and still empty
      const current = this.registry.getInstances(service);
      if (current !== undefined && current.length === 0) {
        this.registry.setInstances(service, fetched);
        this.onCacheFilled?.(service, fetched);
      }
    });

    return fetched;
  }
}
