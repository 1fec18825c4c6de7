/**
 * Service and instance types
 *
 * A service is identified by (name, port). `nearestCount` is a hint passed
 * to the transport and does not take part in identity.
 */

import { z } from 'zod';
import type { Result } from 'ts-results';
import type { DiscoveryError } from '../utils/errors.js';

// ============================================================================
// Service
// ============================================================================

export const ServiceSchema = z.object({
  /** Logical service (app) name on the overlay */
  name: z.string().min(1, 'Service name cannot be empty'),
  /** Port the service's instances listen on */
  port: z.number().int().min(0).max(65535),
  /** How many nearest instances to ask the transport for */
  nearestCount: z.number().int().positive().default(1),
});

export type Service = Readonly<z.infer<typeof ServiceSchema>>;

/**
 * Build a validated, frozen service value
 *
 * @throws {ZodError} if the definition is invalid
 */
export function createService(name: string, port: number, nearestCount?: number): Service {
  return Object.freeze(ServiceSchema.parse({ name, port, nearestCount }));
}

/**
 * Identity key for a service
 */
export function serviceKey(service: Service): string {
  return `${service.name}:${service.port}`;
}

export function sameService(a: Service, b: Service): boolean {
  return a.name === b.name && a.port === b.port;
}

// ============================================================================
// Instance
// ============================================================================

export const InstanceSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(0).max(65535),
});

export type Instance = Readonly<z.infer<typeof InstanceSchema>>;

export function instanceKey(instance: Instance): string {
  return `[${instance.host}]:${instance.port}`;
}

/**
 * Membership comparison of two instance lists
 *
 * Order and duplicates are ignored, so a transport that shuffles its answers
 * does not count as a change.
 */
export function sameInstances(a: readonly Instance[], b: readonly Instance[]): boolean {
  const left = new Set(a.map(instanceKey));
  const right = new Set(b.map(instanceKey));
  if (left.size !== right.size) return false;
  for (const key of left) {
    if (!right.has(key)) return false;
  }
  return true;
}

// ============================================================================
// Results and completion
// ============================================================================

/**
 * Outcome delivered to lookup callbacks and subscribers
 */
export type LookupResult = Result<Instance[], DiscoveryError>;

/**
 * Why a subscription ended
 */
export type CompletionReason = 'cancellationRequested' | 'serviceDiscoveryUnavailable';

export type NextHandler = (result: LookupResult) => void;

export type CompletionHandler = (reason: CompletionReason) => void;
