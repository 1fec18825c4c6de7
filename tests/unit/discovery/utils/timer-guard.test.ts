import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { TimerGuard } from '../../../../src/discovery/utils/timer-guard.js';

describe('TimerGuard', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('keeps only the latest timer', () => {
    const guard = new TimerGuard();
    const first = vi.fn();
    const second = vi.fn();

    guard.set(first, 100);
    guard.set(second, 100);
    vi.advanceTimersByTime(100);

    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledTimes(1);
  });

  it('is inactive once a one-shot timer fired', () => {
    const guard = new TimerGuard();

    guard.set(() => undefined, 100);
    expect(guard.isActive()).toBe(true);
    vi.advanceTimersByTime(100);

    expect(guard.isActive()).toBe(false);
  });

  it('clears an interval, and clearing twice is harmless', () => {
    const guard = new TimerGuard();
    const tick = vi.fn();

    guard.setInterval(tick, 100);
    vi.advanceTimersByTime(250);
    guard.clear();
    guard.clear();
    vi.advanceTimersByTime(500);

    expect(tick).toHaveBeenCalledTimes(2);
    expect(vi.getTimerCount()).toBe(0);
  });
});
