/**
 * Shutdown-before-release check
 *
 * Watches engines with a FinalizationRegistry. The held value must not
 * reference the engine itself, only its shutdown flag, logger and a hook
 * that stops its timers.
 */

import type { Logger } from 'pino';
import { LifecycleError } from '../utils/errors.js';
import type { LifecycleCheck } from '../types/config.js';
import type { AtomicFlag } from './atomic-flag.js';

export interface WatchedEngine {
  shutdownFlag: AtomicFlag;
  logger: Logger;
  mode: LifecycleCheck;
  /** Stops the engine's background timers */
  release: () => void;
}

/**
 * Report an engine that was released while still running
 *
 * @throws {LifecycleError} in strict mode
 */
export function reportReleasedEngine(watched: WatchedEngine): void {
  if (watched.mode === 'off' || watched.shutdownFlag.isSet) {
    return;
  }

  watched.release();

  const message = 'ServiceDiscovery.shutdown() was not called before the engine was released';
  watched.logger.error(message);

  if (watched.mode === 'strict') {
    throw new LifecycleError(message);
  }
}

const registry = new FinalizationRegistry<WatchedEngine>(reportReleasedEngine);

/**
 * Watch an engine until it is garbage collected
 */
export function watchEngine(engine: object, watched: WatchedEngine): void {
  if (watched.mode === 'off') {
    return;
  }
  registry.register(engine, watched);
}
