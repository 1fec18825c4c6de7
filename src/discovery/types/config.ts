/**
 * Configuration types for service discovery
 *
 * All configuration types are defined with Zod schemas for runtime validation.
 */

import { z } from 'zod';

// ============================================================================
// DNS transport
// ============================================================================

/**
 * DNS transport options
 */
export const DnsConfigSchema = z.object({
  /** Resolver addresses (the overlay's internal DNS server by default) */
  servers: z.array(z.string().min(1)).min(1).default(['fdaa::3']),
  /** Internal domain suffix for overlay names */
  domain: z.string().min(1).default('internal'),
  /** Per-query timeout handed to the resolver (ms), -1 for the resolver default */
  queryTimeoutMs: z.number().int().min(-1).default(-1),
  /** Resolver retry count */
  tries: z.number().int().positive().default(4),
});

export type DnsConfig = z.infer<typeof DnsConfigSchema>;

// ============================================================================
// Logging
// ============================================================================

export const LoggingConfigSchema = z.object({
  /** Log level */
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

// ============================================================================
// Discovery engine
// ============================================================================

/**
 * What to do when an engine is garbage collected without shutdown()
 */
export const LifecycleCheckSchema = z.enum(['off', 'warn', 'strict']);

export type LifecycleCheck = z.infer<typeof LifecycleCheckSchema>;

export function defaultLifecycleCheck(): LifecycleCheck {
  const env = process.env.NODE_ENV;
  return env === 'test' || env === 'development' ? 'strict' : 'warn';
}

/**
 * Discovery engine configuration
 */
export const DiscoveryConfigSchema = z.object({
  /** Timeout for lookups without a caller deadline, and for each refresh call (ms) */
  defaultLookupTimeoutMs: z.number().int().positive().default(5000),
  /** Delay between background refresh rounds (ms) */
  refreshIntervalMs: z.number().int().positive().default(60000),
  /** Interval of the cancelled-subscription sweep (ms) */
  cleanupIntervalMs: z.number().int().positive().default(60000),
  /** Shutdown-before-release check */
  lifecycleCheck: LifecycleCheckSchema.optional(),
  /** DNS transport */
  dns: DnsConfigSchema.default({}),
  /** Logging */
  logging: LoggingConfigSchema.default({}),
});

export type DiscoveryConfig = z.infer<typeof DiscoveryConfigSchema>;

export type DiscoveryConfigInput = z.input<typeof DiscoveryConfigSchema>;

/**
 * Validate a discovery configuration and apply defaults
 *
 * @throws {ZodError} if validation fails
 */
export function validateDiscoveryConfig(config: unknown): DiscoveryConfig {
  return DiscoveryConfigSchema.parse(config);
}

/**
 * Create a configuration with every default applied
 */
export function createDefaultDiscoveryConfig(): DiscoveryConfig {
  return DiscoveryConfigSchema.parse({});
}
