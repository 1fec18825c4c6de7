/**
 * Custom error types for service discovery
 *
 * Every failure kind is its own class with a stable `code`, so callers can
 * branch with `instanceof` or on the code string.
 */

import type { Service } from '../types/service.js';

/**
 * Base error class for service discovery errors
 */
export class DiscoveryError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'DiscoveryError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * Lookup target was never registered
 */
export class UnknownServiceError extends DiscoveryError {
  constructor(public readonly service: Service) {
    super(`Unknown service '${service.name}' (port ${service.port})`, 'UNKNOWN_SERVICE');
    this.name = 'UnknownServiceError';
  }
}

/**
 * One or more requested services are absent from the overlay
 */
export class ServicesNotFoundError extends DiscoveryError {
  constructor(public readonly missing: Service[]) {
    super(
      `Could not find services: ${missing.map((s) => s.name).join(', ')}`,
      'SERVICES_NOT_FOUND'
    );
    this.name = 'ServicesNotFoundError';
  }
}

/**
 * Lookup deadline elapsed before instances were resolved
 */
export class LookupTimedOutError extends DiscoveryError {
  constructor(message: string, public readonly timeoutMs: number) {
    super(message, 'LOOKUP_TIMED_OUT');
    this.name = 'LookupTimedOutError';
  }
}

/**
 * Operation attempted after shutdown
 */
export class UnavailableError extends DiscoveryError {
  constructor(message = 'Service discovery is shut down') {
    super(message, 'UNAVAILABLE');
    this.name = 'UnavailableError';
  }
}

/**
 * Name resolution transport failure
 */
export class TransportError extends DiscoveryError {
  constructor(message: string, cause?: Error) {
    super(message, 'TRANSPORT_ERROR', cause);
    this.name = 'TransportError';
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends DiscoveryError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIGURATION_ERROR', cause);
    this.name = 'ConfigurationError';
  }
}

/**
 * Validation errors for configuration and service definitions
 */
export class ValidationError extends DiscoveryError {
  constructor(
    message: string,
    public readonly errors: Array<{ path: string; message: string }>,
    cause?: Error
  ) {
    super(message, 'VALIDATION_ERROR', cause);
    this.name = 'ValidationError';
  }
}

/**
 * Engine was released without calling shutdown()
 */
export class LifecycleError extends DiscoveryError {
  constructor(message: string) {
    super(message, 'LIFECYCLE_ERROR');
    this.name = 'LifecycleError';
  }
}

/**
 * Check if error is a discovery error
 */
export function isDiscoveryError(error: unknown): error is DiscoveryError {
  return error instanceof DiscoveryError;
}

/**
 * Wrap an unknown transport failure as TransportError
 *
 * Discovery errors pass through unchanged.
 */
export function wrapTransportError(error: unknown, message?: string): DiscoveryError {
  if (isDiscoveryError(error)) {
    return error;
  }

  const errorMessage = message || (error instanceof Error ? error.message : String(error));
  const cause = error instanceof Error ? error : undefined;

  return new TransportError(errorMessage, cause);
}
