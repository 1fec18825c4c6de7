/**
 * Service discovery for the private network overlay
 *
 * Main entry point for discovery functionality.
 * Provides the discovery engine, the DNS transport, configuration loading
 * and error types.
 */

// Engine
export {
  ServiceDiscovery,
  createServiceDiscovery,
  type ServiceDiscoveryEvents,
  type ServiceDiscoveryDependencies,
  type ServiceDiscoveryStats,
} from './engine/service-discovery.js';
export { CancellationToken } from './engine/cancellation-token.js';
export { type RoundSummary } from './engine/refresh-scheduler.js';

// Transport
export {
  DnsNameResolutionClient,
  type NameResolutionClient,
  type ListInstancesOptions,
  type DnsResolver,
  type DnsClientDependencies,
} from './dns/client.js';

// Configuration
export {
  loadDiscoveryConfig,
  loadDiscoveryConfigWithEnv,
  validateConfig,
} from './config/loader.js';

// Types and Schemas
export * from './types/index.js';
export type { LookupOptions, ServiceDiscoveryContract } from './types/contract.js';

// Logger
export { createLogger, childLogger, type Logger, type LogLevel } from './utils/logger.js';

// Errors
export {
  DiscoveryError,
  UnknownServiceError,
  ServicesNotFoundError,
  LookupTimedOutError,
  UnavailableError,
  TransportError,
  ConfigurationError,
  ValidationError,
  LifecycleError,
  isDiscoveryError,
  wrapTransportError,
} from './utils/errors.js';
