/**
 * Service Discovery engine
 *
 * Composition root for the discovery components. Owns the registry, the
 * subscription map and the shutdown flag, and confines every access to them
 * to one serial executor.
 *
 * Features:
 * - All-or-nothing registration against the overlay's service list
 * - Deadline-bounded lookups with on-demand refill of empty entries
 * - Background refresh with change-only subscriber notification
 * - Idempotent shutdown that completes every live subscription once
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { Ok, Err } from 'ts-results';
import { DnsNameResolutionClient, type NameResolutionClient } from '../dns/client.js';
import { createLogger, childLogger } from '../utils/logger.js';
import { TimerGuard } from '../utils/timer-guard.js';
import {
  ServicesNotFoundError,
  UnavailableError,
  wrapTransportError,
} from '../utils/errors.js';
import {
  DiscoveryConfigSchema,
  defaultLifecycleCheck,
  type DiscoveryConfig,
  type DiscoveryConfigInput,
} from '../types/config.js';
import type { LookupOptions, ServiceDiscoveryContract } from '../types/contract.js';
import {
  sameInstances,
  type CompletionHandler,
  type Instance,
  type LookupResult,
  type NextHandler,
  type Service,
} from '../types/service.js';
import { AtomicFlag } from './atomic-flag.js';
import { CancellationToken } from './cancellation-token.js';
import { watchEngine } from './lifecycle-check.js';
import { LookupEngine } from './lookup-engine.js';
import { RefreshScheduler, type RoundSummary } from './refresh-scheduler.js';
import { SerialExecutor } from './serial-executor.js';
import { ServiceRegistry } from './service-registry.js';
import { SubscriptionRegistry, type Subscription, type SubscriptionRegistryStats } from './subscription-registry.js';
import { TimeoutHandler } from './timeout-handler.js';

/**
 * Service discovery events
 */
export interface ServiceDiscoveryEvents {
  registered: (services: Service[]) => void;
  instancesChanged: (service: Service, instances: Instance[]) => void;
  roundComplete: (summary: RoundSummary) => void;
  shutdown: () => void;
}

export interface ServiceDiscoveryDependencies {
  logger?: Logger;
}

/**
 * Service discovery statistics
 */
export interface ServiceDiscoveryStats {
  isShutdown: boolean;
  services: number;
  rounds: number;
  subscriptions: SubscriptionRegistryStats;
}

/**
 * Service Discovery
 *
 * @example
 * ```typescript
 * const discovery = new ServiceDiscovery(client, { defaultLookupTimeoutMs: 1000 });
 * const api = createService('api', 8080);
 *
 * await discovery.register([api]);
 * const instances = await discovery.lookup(api);
 *
 * const token = discovery.subscribe(api, (result) => {
 *   if (result.ok) console.log('Instances:', result.val);
 * });
 *
 * token.cancel();
 * await discovery.shutdown();
 * ```
 */
export class ServiceDiscovery
  extends EventEmitter<ServiceDiscoveryEvents>
  implements ServiceDiscoveryContract
{
  private readonly config: DiscoveryConfig;
  private readonly client: NameResolutionClient;
  private readonly logger: Logger;

  private readonly executor = new SerialExecutor();
  private readonly registration = new SerialExecutor();
  private readonly shutdownFlag = new AtomicFlag();
  private readonly sweepTimer = new TimerGuard();
  private teardown?: Promise<void>;

  private readonly registry: ServiceRegistry;
  private readonly subscriptions: SubscriptionRegistry;
  private readonly lookupEngine: LookupEngine;
  private readonly scheduler: RefreshScheduler;

  constructor(
    client: NameResolutionClient,
    config: DiscoveryConfigInput = {},
    dependencies: ServiceDiscoveryDependencies = {}
  ) {
    super();
    this.config = DiscoveryConfigSchema.parse(config);
    this.client = client;
    this.logger = dependencies.logger ?? createLogger('ServiceDiscovery', this.config.logging.level);

    const timeouts = new TimeoutHandler(childLogger(this.logger, 'TimeoutHandler'));

    // Background timers must not keep the engine reachable, otherwise an
    // engine that is never shut down is never reported
    const shutdownFlag = this.shutdownFlag;
    const engineRef = new WeakRef(this);

    this.registry = new ServiceRegistry(childLogger(this.logger, 'ServiceRegistry'));
    this.subscriptions = new SubscriptionRegistry(
      childLogger(this.logger, 'SubscriptionRegistry'),
      () => shutdownFlag.isSet
    );

    this.lookupEngine = new LookupEngine({
      registry: this.registry,
      client: this.client,
      executor: this.executor,
      timeouts,
      logger: childLogger(this.logger, 'LookupEngine'),
      onCacheFilled: (service, instances) => this.handleCacheFilled(service, instances),
    });

    this.scheduler = new RefreshScheduler(
      {
        refreshIntervalMs: this.config.refreshIntervalMs,
        callTimeoutMs: this.config.defaultLookupTimeoutMs,
      },
      {
        registry: this.registry,
        subscriptions: this.subscriptions,
        client: this.client,
        executor: this.executor,
        timeouts,
        isShutdown: () => shutdownFlag.isSet,
        logger: childLogger(this.logger, 'RefreshScheduler'),
      }
    );
    this.scheduler.on('roundComplete', (summary) => engineRef.deref()?.emit('roundComplete', summary));
    this.scheduler.on('instancesChanged', (service, instances) =>
      engineRef.deref()?.emit('instancesChanged', service, instances)
    );

    const scheduler = this.scheduler;
    const sweepTimer = this.sweepTimer;
    watchEngine(this, {
      shutdownFlag,
      logger: this.logger,
      mode: this.config.lifecycleCheck ?? defaultLifecycleCheck(),
      release: () => {
        scheduler.stop();
        sweepTimer.clear();
      },
    });
  }

  get isShutdown(): boolean {
    return this.shutdownFlag.isSet;
  }

  get defaultLookupTimeoutMs(): number {
    return this.config.defaultLookupTimeoutMs;
  }

  /**
   * Register services
   *
   * Every requested name must be known to the overlay, otherwise nothing is
   * registered. Concurrent calls run one after another.
   *
   * @throws {ServicesNotFoundError} listing every requested service not found
   * @throws {TransportError} if the service list cannot be fetched
   * @throws {UnavailableError} after shutdown
   */
  register(services: readonly Service[]): Promise<void> {
    return this.registration.submit(async () => {
      if (this.shutdownFlag.isSet) {
        throw new UnavailableError();
      }
      if (services.length === 0) {
        this.logger.debug('Nothing to register');
        return;
      }

      this.logger.info({ requested: services.map((s) => s.name) }, 'Querying overlay for all service names');

      let names: string[];
      try {
        names = await this.client.listAllServiceNames();
      } catch (error) {
        this.logger.error({ err: error }, 'Failed to list service names');
        throw wrapTransportError(error, 'Failed to list service names');
      }

      const known = new Set(names);
      const missing = services.filter((service) => !known.has(service.name));
      if (missing.length > 0) {
        this.logger.error({ missing: missing.map((s) => s.name) }, 'Services were not found on the overlay');
        throw new ServicesNotFoundError(missing);
      }

      await this.executor.submit(() => {
        if (this.shutdownFlag.isSet) {
          throw new UnavailableError();
        }
        this.registry.register(services);
        this.scheduler.start();
      });

      this.logger.info({ count: services.length }, 'Found all services on the overlay');
      this.emit('registered', [...services]);
    });
  }

  /**
   * Resolve a registered service
   *
   * @throws {UnavailableError} after shutdown
   * @throws {UnknownServiceError} if the service was never registered
   * @throws {LookupTimedOutError} if the deadline passes first
   * @throws {TransportError} if the on-demand refill fails
   */
  async lookup(service: Service, options: LookupOptions = {}): Promise<Instance[]> {
    if (this.shutdownFlag.isSet) {
      throw new UnavailableError();
    }

    const timeoutMs =
      options.deadline === undefined
        ? this.config.defaultLookupTimeoutMs
        : options.deadline - Date.now();

    return this.lookupEngine.lookup(service, timeoutMs);
  }

  lookupWithCallback(
    service: Service,
    callback: (result: LookupResult) => void,
    options: LookupOptions = {}
  ): void {
    void this.settle(service, options).then((result) => {
      try {
        callback(result);
      } catch (error) {
        this.logger.warn({ service: service.name, err: error }, 'Lookup callback threw');
      }
    });
  }

  /**
   * Subscribe to instance updates
   *
   * The returned token is live immediately. The subscriber first receives
   * the outcome of one lookup, then every change found by refresh rounds.
   */
  subscribe(service: Service, onNext: NextHandler, onComplete?: CompletionHandler): CancellationToken {
    this.logger.debug({ service: service.name }, 'Subscribing to instance updates');

    if (this.shutdownFlag.isSet) {
      onComplete?.('serviceDiscoveryUnavailable');
      return CancellationToken.cancelled();
    }

    const token = new CancellationToken(onComplete);
    const subscription: Subscription = { service, nextHandler: onNext, token, initialDelivered: false };

    void this.executor
      .submit(() => {
        if (this.shutdownFlag.isSet) {
          token.complete('serviceDiscoveryUnavailable');
          return false;
        }
        this.subscriptions.add(subscription);
        this.startSweep();
        return true;
      })
      .then(async (added) => {
        if (!added) {
          return;
        }
        const result = await this.settle(service, {});
        await this.executor.submit(() => {
          subscription.initialDelivered = true;
          this.subscriptions.deliver(subscription, this.latest(service, result));
        });
        this.logger.debug({ service: service.name }, 'Subscribed to instance updates');
      })
      .catch((error: unknown) => {
        this.logger.error({ service: service.name, err: error }, 'Error subscribing to instance updates');
      });

    return token;
  }

  /**
   * Shut the engine down
   *
   * The first call closes the transport and completes every live
   * subscription; later calls resolve with the same teardown.
   */
  shutdown(): Promise<void> {
    if (!this.shutdownFlag.trySet()) {
      return this.teardown ?? Promise.resolve();
    }

    this.teardown = this.executor.submit(() => {
      this.logger.info('Service discovery shutting down, closing active queries and subscriptions');

      this.scheduler.stop();
      this.sweepTimer.clear();

      try {
        this.client.close();
      } catch (error) {
        this.logger.warn({ err: error }, 'Error closing name resolution client');
      }

      const completed = this.subscriptions.completeAll('serviceDiscoveryUnavailable');
      this.logger.debug({ completed }, 'Subscriptions completed');

      try {
        this.emit('shutdown');
      } catch (err) {
        this.logger.error({ err }, 'Error in shutdown handler');
      }
    });

    return this.teardown;
  }

  getStats(): ServiceDiscoveryStats {
    return {
      isShutdown: this.shutdownFlag.isSet,
      services: this.registry.getServiceCount(),
      rounds: this.scheduler.getRoundCount(),
      subscriptions: this.subscriptions.getStats(),
    };
  }

  private settle(service: Service, options: LookupOptions): Promise<LookupResult> {
    return this.lookup(service, options).then(
      (instances): LookupResult => Ok(instances),
      (error: unknown): LookupResult => Err(wrapTransportError(error))
    );
  }

  /**
   * Initial delivery value. A refresh round that applied a different set
   * while the lookup was in flight skipped this subscriber, so the cache
   * wins over the lookup's answer.
   */
  private latest(service: Service, result: LookupResult): LookupResult {
    if (!result.ok) {
      return result;
    }
    const cached = this.registry.getInstances(service);
    if (cached === undefined || cached.length === 0 || sameInstances(cached, result.val)) {
      return result;
    }
    return Ok(cached);
  }

  /**
   * Runs on the executor after a lookup filled an empty entry. Only the
   * event fires; subscribers hear about instances through refresh rounds.
   */
  private handleCacheFilled(service: Service, instances: Instance[]): void {
    if (this.shutdownFlag.isSet) {
      return;
    }
    try {
      this.emit('instancesChanged', service, [...instances]);
    } catch (err) {
      this.logger.error({ err }, 'Error in instancesChanged handler');
    }
  }

  private startSweep(): void {
    if (this.sweepTimer.isActive()) {
      return;
    }
    const { executor, subscriptions, sweepTimer, shutdownFlag, logger } = this;
    sweepTimer.setInterval(() => {
      void executor
        .submit(() => {
          if (shutdownFlag.isSet) {
            sweepTimer.clear();
            return;
          }
          subscriptions.sweep();
          if (subscriptions.isEmpty()) {
            sweepTimer.clear();
          }
        })
        .catch((error: unknown) => {
          logger.error({ err: error }, 'Subscription sweep failed');
        });
    }, this.config.cleanupIntervalMs);
  }

}

/**
 * Create a service discovery engine backed by the overlay's DNS
 *
 * @example
 * ```typescript
 * const discovery = createServiceDiscovery({ dns: { servers: ['fdaa::3'] } });
 * ```
 */
export function createServiceDiscovery(
  config: DiscoveryConfigInput = {},
  dependencies: ServiceDiscoveryDependencies = {}
): ServiceDiscovery {
  const parsed = DiscoveryConfigSchema.parse(config);
  const logger = dependencies.logger ?? createLogger('ServiceDiscovery', parsed.logging.level);
  const client = new DnsNameResolutionClient(parsed.dns, { logger: childLogger(logger, 'DnsClient') });
  return new ServiceDiscovery(client, parsed, { logger });
}
