/**
 * Refresh Scheduler
 *
 * Repeating background task that re-resolves every registered service.
 *
 * Round lifecycle:
 * 1. Stop for good if the engine is shut down
 * 2. Snapshot the registered services
 * 3. Resolve all of them concurrently, each bounded by the default lookup
 *    timeout. A failed or timed-out call keeps that service's last-known
 *    instances for this round and is only logged
 * 4. Apply every answer to the registry in one executor task
 * 5. Notify live subscribers of each service whose instance set changed
 *
 * The first round runs on start(); each later round starts
 * `refreshIntervalMs` after the previous one finished.
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { Ok, Err } from 'ts-results';
import type { NameResolutionClient } from '../dns/client.js';
import { wrapTransportError } from '../utils/errors.js';
import { TimerGuard } from '../utils/timer-guard.js';
import { sameInstances, type Instance, type LookupResult, type Service } from '../types/service.js';
import type { SerialExecutor } from './serial-executor.js';
import type { InstanceUpdate, ServiceRegistry } from './service-registry.js';
import type { SubscriptionRegistry } from './subscription-registry.js';
import type { TimeoutHandler } from './timeout-handler.js';

/**
 * Refresh scheduler configuration
 */
export interface RefreshSchedulerConfig {
  /** Delay between the end of one round and the start of the next (ms) */
  refreshIntervalMs: number;
  /** Bound on each per-service transport call (ms) */
  callTimeoutMs: number;
}

/**
 * Summary of one completed round
 */
export interface RoundSummary {
  /** Services resolved this round */
  services: number;
  /** Services whose instance set changed */
  changed: Service[];
  /** Services whose call failed or timed out */
  failed: Service[];
  durationMs: number;
}

/**
 * Refresh scheduler events
 */
export interface RefreshSchedulerEvents {
  roundComplete: (summary: RoundSummary) => void;
  instancesChanged: (service: Service, instances: Instance[]) => void;
}

export interface RefreshSchedulerDependencies {
  registry: ServiceRegistry;
  subscriptions: SubscriptionRegistry;
  client: NameResolutionClient;
  executor: SerialExecutor;
  timeouts: TimeoutHandler;
  isShutdown: () => boolean;
  logger: Logger;
}

interface RoundOutcome {
  service: Service;
  result: LookupResult;
}

export class RefreshScheduler extends EventEmitter<RefreshSchedulerEvents> {
  private readonly config: RefreshSchedulerConfig;
  private readonly deps: RefreshSchedulerDependencies;
  private readonly logger: Logger;
  private readonly timer = new TimerGuard();
  private running = false;
  private rounds = 0;

  constructor(config: RefreshSchedulerConfig, dependencies: RefreshSchedulerDependencies) {
    super();
    this.config = config;
    this.deps = dependencies;
    this.logger = dependencies.logger;
  }

  /**
   * Start the repeating task; a no-op if it is already running
   */
  start(): void {
    if (this.running) {
      this.logger.debug('Refresh scheduler already running');
      return;
    }
    this.running = true;
    this.logger.debug({ refreshIntervalMs: this.config.refreshIntervalMs }, 'Refresh scheduler started');
    this.tick();
  }

  /**
   * Stop the repeating task. A round already in flight still finishes.
   */
  stop(): void {
    if (!this.running) {
      return;
    }
    this.running = false;
    this.timer.clear();
    this.logger.debug('Refresh scheduler stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  getRoundCount(): number {
    return this.rounds;
  }

  private tick(): void {
    void this.runRound()
      .catch((error: unknown) => {
        this.logger.error({ err: error }, 'Refresh round failed');
      })
      .finally(() => {
        if (this.running) {
          this.timer.set(() => this.tick(), this.config.refreshIntervalMs);
        }
      });
  }

  /**
   * Run one round
   *
   * @returns the round summary, or undefined if the engine was shut down
   */
  async runRound(): Promise<RoundSummary | undefined> {
    if (this.deps.isShutdown()) {
      this.stop();
      return undefined;
    }

    const startTime = Date.now();
    const services = await this.deps.executor.submit(() => this.deps.registry.getServices());

    this.logger.info({ services: services.length }, 'Updating service instances');

    const outcomes = await Promise.all(services.map((service) => this.refreshOne(service)));

    return this.deps.executor.submit(() => {
      if (this.deps.isShutdown()) {
        this.stop();
        return undefined;
      }
      return this.apply(outcomes, Date.now() - startTime);
    });
  }

  private async refreshOne(service: Service): Promise<RoundOutcome> {
    this.logger.debug(
      { service: service.name, port: service.port, nearest: service.nearestCount },
      'Looking for closest instances'
    );

    try {
      const instances = await this.deps.timeouts.withTimeout(
        (signal) => this.deps.client.listInstancesOf(service, { signal }),
        this.config.callTimeoutMs,
        `Updating instances of '${service.name}'`
      );
      return { service, result: Ok(instances) };
    } catch (error) {
      const wrapped = wrapTransportError(error);
      this.logger.warn(
        { service: service.name, port: service.port, err: wrapped },
        'Updating service instances failed'
      );
      return { service, result: Err(wrapped) };
    }
  }

  private apply(outcomes: RoundOutcome[], durationMs: number): RoundSummary {
    const updates: InstanceUpdate[] = [];
    const failed: Service[] = [];

    for (const outcome of outcomes) {
      if (outcome.result.ok) {
        updates.push({ service: outcome.service, instances: outcome.result.val });
      } else {
        failed.push(outcome.service);
      }
    }

    const applied = this.deps.registry.applyBatch(updates);
    const changed: Service[] = [];

    for (const update of applied) {
      if (sameInstances(update.previous, update.instances)) {
        continue;
      }
      changed.push(update.service);

      // Subscribers still waiting for their initial delivery read the cache then
      const notified = this.deps.subscriptions.notify(
        update.service,
        Ok([...update.instances]),
        (subscription) => subscription.initialDelivered
      );
      this.logger.debug(
        { service: update.service.name, count: update.instances.length, notified },
        'Service instances changed'
      );
      try {
        this.emit('instancesChanged', update.service, [...update.instances]);
      } catch (err) {
        this.logger.error({ err, service: update.service.name }, 'Error in instancesChanged handler');
      }
    }

    this.rounds++;
    const summary: RoundSummary = { services: outcomes.length, changed, failed, durationMs };
    try {
      this.emit('roundComplete', summary);
    } catch (err) {
      this.logger.error({ err }, 'Error in roundComplete handler');
    }
    return summary;
  }
}
