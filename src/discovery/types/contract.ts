/**
 * Discovery interface consumed by callers
 */

import type { CancellationToken } from '../engine/cancellation-token.js';
import type { CompletionHandler, Instance, LookupResult, NextHandler, Service } from './service.js';

export interface LookupOptions {
  /** Absolute deadline (epoch ms); the engine default applies when omitted */
  deadline?: number;
}

export interface ServiceDiscoveryContract {
  /** Timeout used when a lookup carries no deadline (ms) */
  readonly defaultLookupTimeoutMs: number;
  readonly isShutdown: boolean;

  /**
   * Register services after checking the overlay knows every one of them
   */
  register(services: readonly Service[]): Promise<void>;

  /**
   * Resolve a registered service
   */
  lookup(service: Service, options?: LookupOptions): Promise<Instance[]>;

  /**
   * Callback form of lookup(); the callback fires exactly once
   */
  lookupWithCallback(service: Service, callback: (result: LookupResult) => void, options?: LookupOptions): void;

  /**
   * Receive the current instances and every later change until cancelled
   * or shut down
   */
  subscribe(service: Service, onNext: NextHandler, onComplete?: CompletionHandler): CancellationToken;

  /**
   * Idempotent; every caller resolves once teardown has happened
   */
  shutdown(): Promise<void>;
}
