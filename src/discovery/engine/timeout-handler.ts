/**
 * Timeout Handler
 *
 * Races an operation against a timer. The first to finish wins:
 * - operation settles first: the timer is cleared
 * - timer fires first: the operation's AbortSignal is aborted and its
 *   eventual result is discarded
 *
 * Used both for caller lookup deadlines and for each refresh call.
 */

import type { Logger } from 'pino';
import { LookupTimedOutError } from '../utils/errors.js';

/**
 * Operation started by the race; receives the signal aborted on timeout
 */
export type TimedOperation<T> = (signal: AbortSignal) => Promise<T>;

/**
 * Timeout Handler
 *
 * @example
 * ```typescript
 * const timeouts = new TimeoutHandler(logger);
 *
 * const instances = await timeouts.withTimeout(
 *   (signal) => client.listInstancesOf(service, { signal }),
 *   1000,
 *   'Lookup of api'
 * );
 * ```
 */
export class TimeoutHandler {
  constructor(private readonly logger?: Logger) {}

  /**
   * Execute operation with timeout
   *
   * @param operation - Operation to run
   * @param timeoutMs - Timeout in milliseconds (clamped at 0)
   * @param label - Operation name for the error message
   * @throws {LookupTimedOutError} if the timer wins
   */
  withTimeout<T>(operation: TimedOperation<T>, timeoutMs: number, label = 'Operation'): Promise<T> {
    const effectiveMs = Math.max(0, timeoutMs);
    const controller = new AbortController();
    const startTime = Date.now();

    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        const elapsed = Date.now() - startTime;
        controller.abort();

        this.logger?.debug({ operation: label, timeoutMs: effectiveMs, elapsedMs: elapsed }, 'Timeout exceeded');

        reject(new LookupTimedOutError(`${label} timed out after ${elapsed}ms`, effectiveMs));
      }, effectiveMs);

      // Start inside a promise so a synchronous throw becomes a rejection
      Promise.resolve()
        .then(() => operation(controller.signal))
        .then(
          (value) => {
            clearTimeout(timer);
            resolve(value);
          },
          (error: unknown) => {
            clearTimeout(timer);
            reject(error);
          }
        );
    });
  }
}
