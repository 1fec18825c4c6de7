/**
 * Timer lifecycle guard
 *
 * Holds at most one pending timer. Every set() clears the previous one, and
 * clear() is idempotent, so stop paths never leave a timer behind.
 *
 * ```typescript
 * const guard = new TimerGuard();
 * guard.set(() => runRound(), 60000);
 * // Later...
 * guard.clear();
 * ```
 */
export class TimerGuard {
  private timer?: NodeJS.Timeout;

  /**
   * Set a one-shot timer, replacing any pending one
   */
  set(callback: () => void, delayMs: number): void {
    this.clear();
    this.timer = setTimeout(() => {
      this.timer = undefined;
      callback();
    }, delayMs);
  }

  /**
   * Set an interval, replacing any pending timer
   */
  setInterval(callback: () => void, intervalMs: number): void {
    this.clear();
    this.timer = setInterval(callback, intervalMs);
  }

  clear(): void {
    if (this.timer) {
      clearTimeout(this.timer); // Works for both setTimeout and setInterval
      this.timer = undefined;
    }
  }

  isActive(): boolean {
    return this.timer !== undefined;
  }
}
