import { describe, it, expect } from 'vitest';
import { AtomicFlag } from '../../../../src/discovery/engine/atomic-flag.js';

describe('AtomicFlag', () => {
  it('lets exactly one caller flip it', () => {
    const flag = new AtomicFlag();

    expect(flag.isSet).toBe(false);
    expect(flag.trySet()).toBe(true);
    expect(flag.trySet()).toBe(false);
    expect(flag.isSet).toBe(true);
  });
});
