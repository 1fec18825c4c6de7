/**
 * Cancellation token handed back by subscribe()
 *
 * The completion handler fires at most once, whether the subscription ends
 * through cancel() or through engine shutdown.
 */

import type { CompletionHandler, CompletionReason } from '../types/service.js';

export class CancellationToken {
  private cancelled: boolean;
  private readonly completionHandler?: CompletionHandler;

  constructor(completionHandler?: CompletionHandler, isCancelled = false) {
    this.completionHandler = completionHandler;
    this.cancelled = isCancelled;
  }

  /**
   * A token that is cancelled from the start and never fires
   */
  static cancelled(): CancellationToken {
    return new CancellationToken(undefined, true);
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  /**
   * Cancel the subscription. No-op when already cancelled or completed.
   */
  cancel(): void {
    this.complete('cancellationRequested');
  }

  /**
   * End the subscription with a reason
   *
   * @returns true if this call ended it
   */
  complete(reason: CompletionReason): boolean {
    if (this.cancelled) {
      return false;
    }
    this.cancelled = true;
    this.completionHandler?.(reason);
    return true;
  }
}
