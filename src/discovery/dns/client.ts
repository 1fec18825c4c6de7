/**
 * Name resolution transport
 *
 * The engine talks to the overlay through `NameResolutionClient`. The live
 * implementation queries the overlay's internal DNS:
 * - `_apps.<domain>` TXT lists every app name, comma separated
 * - `top<N>.nearest.of.<app>.<domain>` AAAA lists the N nearest instances
 */

import { promises as dns } from 'node:dns';
import type { Logger } from 'pino';
import { createLogger } from '../utils/logger.js';
import { TransportError, wrapTransportError } from '../utils/errors.js';
import { DnsConfigSchema, type DnsConfig } from '../types/config.js';
import type { Instance, Service } from '../types/service.js';

export interface ListInstancesOptions {
  /** Aborted when the caller stops waiting for the answer */
  signal?: AbortSignal;
}

/**
 * Transport boundary consumed by the discovery engine
 *
 * Implementations must tolerate concurrent outstanding calls.
 */
export interface NameResolutionClient {
  listAllServiceNames(): Promise<string[]>;
  listInstancesOf(service: Service, options?: ListInstancesOptions): Promise<Instance[]>;
  /** Release resources. Called exactly once. */
  close(): void;
}

/**
 * Subset of node's promise-based DNS resolver used by the live client
 */
export interface DnsResolver {
  setServers(servers: readonly string[]): void;
  resolveTxt(hostname: string): Promise<string[][]>;
  resolve6(hostname: string): Promise<string[]>;
  cancel(): void;
}

export interface DnsClientDependencies {
  resolver?: DnsResolver;
  logger?: Logger;
}

/**
 * DNS-backed name resolution client
 *
 * @example
 * ```typescript
 * const client = new DnsNameResolutionClient({ servers: ['fdaa::3'] });
 * const names = await client.listAllServiceNames();
 * const instances = await client.listInstancesOf(createService('api', 8080));
 * client.close();
 * ```
 */
export class DnsNameResolutionClient implements NameResolutionClient {
  private readonly config: DnsConfig;
  private readonly resolver: DnsResolver;
  private readonly logger: Logger;

  constructor(config: Partial<DnsConfig> = {}, dependencies: DnsClientDependencies = {}) {
    this.config = DnsConfigSchema.parse(config);
    this.logger = dependencies.logger ?? createLogger('DnsClient');
    this.resolver =
      dependencies.resolver ??
      new dns.Resolver({ timeout: this.config.queryTimeoutMs, tries: this.config.tries });
    this.resolver.setServers(this.config.servers);
  }

  /**
   * Hostname of the TXT record listing every app
   */
  appsHostname(): string {
    return `_apps.${this.config.domain}`;
  }

  /**
   * Hostname of the AAAA record listing a service's nearest instances
   */
  instancesHostname(service: Service): string {
    return `top${service.nearestCount}.nearest.of.${service.name}.${this.config.domain}`;
  }

  async listAllServiceNames(): Promise<string[]> {
    const hostname = this.appsHostname();
    let records: string[][];
    try {
      records = await this.resolver.resolveTxt(hostname);
    } catch (error) {
      this.logger.warn({ err: error, hostname }, 'TXT lookup of app names failed');
      throw wrapTransportError(error, `Error during TXT record DNS query for ${hostname}`);
    }

    const first = records[0];
    if (!first) {
      throw new TransportError(`The DNS query for ${hostname} did not have any answers`);
    }

    return first
      .join('')
      .split(',')
      .map((name) => name.trim())
      .filter((name) => name.length > 0);
  }

  async listInstancesOf(service: Service, options: ListInstancesOptions = {}): Promise<Instance[]> {
    const hostname = this.instancesHostname(service);
    let addresses: string[];
    try {
      addresses = await this.resolver.resolve6(hostname);
    } catch (error) {
      this.logger.warn(
        { err: error, service: service.name, port: service.port },
        'Error finding instances of service'
      );
      throw wrapTransportError(error, `Error during AAAA record DNS query for ${hostname}`);
    }

    if (options.signal?.aborted) {
      this.logger.debug({ service: service.name }, 'Instance answer arrived after caller gave up');
    } else {
      this.logger.info(
        { service: service.name, port: service.port, count: addresses.length },
        'Found instances of service'
      );
    }

    return addresses.map((host) => ({ host, port: service.port }));
  }

  close(): void {
    this.resolver.cancel();
    this.logger.debug('DNS resolver closed');
  }
}
