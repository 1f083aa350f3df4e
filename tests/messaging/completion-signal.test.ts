import { describe, it, expect } from 'vitest';
import { CompletionSignal } from '../../src/infrastructure/messaging/index.js';

describe('CompletionSignal', () => {
  it('starts unset', () => {
    expect(new CompletionSignal().isSet).toBe(false);
  });

  it('releases every waiter once set', async () => {
    const done = new CompletionSignal();
    const waiters = [done.wait(), done.wait()];
    done.set();
    await Promise.all(waiters);
    expect(done.isSet).toBe(true);
  });

  it('resolves wait() called after set()', async () => {
    const done = new CompletionSignal();
    done.set();
    done.set();
    await expect(done.wait()).resolves.toBeUndefined();
  });
});
