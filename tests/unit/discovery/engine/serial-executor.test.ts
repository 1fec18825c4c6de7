import { describe, it, expect } from 'vitest';
import { SerialExecutor } from '../../../../src/discovery/engine/serial-executor.js';

describe('SerialExecutor', () => {
  it('runs tasks one at a time in submission order', async () => {
    const executor = new SerialExecutor();
    const events: string[] = [];

    const first = executor.submit(async () => {
      events.push('first:start');
      await Promise.resolve();
      await Promise.resolve();
      events.push('first:end');
      return 1;
    });
    const second = executor.submit(() => {
      events.push('second');
      return 2;
    });

    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(events).toEqual(['first:start', 'first:end', 'second']);
  });

  it('keeps running after a failing task', async () => {
    const executor = new SerialExecutor();

    const failing = executor.submit(() => {
      throw new Error('task failed');
    });
    const next = executor.submit(() => 'still running');

    await expect(failing).rejects.toThrow('task failed');
    await expect(next).resolves.toBe('still running');
  });

  it('tracks pending and completed tasks', async () => {
    const executor = new SerialExecutor();

    void executor.submit(() => undefined);
    void executor.submit(() => undefined);
    expect(executor.getStats()).toEqual({ pending: 2, completed: 0 });

    await executor.drain();

    expect(executor.getStats()).toEqual({ pending: 0, completed: 2 });
  });

  it('drains failing tasks too', async () => {
    const executor = new SerialExecutor();
    const failing = executor.submit(() => Promise.reject(new Error('boom')));

    await expect(executor.drain()).resolves.toBeUndefined();
    await expect(failing).rejects.toThrow('boom');
    expect(executor.getStats().completed).toBe(1);
  });
});
