/**
 * Type exports for service discovery
 */

export {
  ServiceSchema,
  InstanceSchema,
  createService,
  serviceKey,
  sameService,
  instanceKey,
  sameInstances,
  type Service,
  type Instance,
  type LookupResult,
  type CompletionReason,
  type NextHandler,
  type CompletionHandler,
} from './service.js';

export {
  DnsConfigSchema,
  LoggingConfigSchema,
  LifecycleCheckSchema,
  DiscoveryConfigSchema,
  defaultLifecycleCheck,
  validateDiscoveryConfig,
  createDefaultDiscoveryConfig,
  type DnsConfig,
  type LoggingConfig,
  type LifecycleCheck,
  type DiscoveryConfig,
  type DiscoveryConfigInput,
} from './config.js';
