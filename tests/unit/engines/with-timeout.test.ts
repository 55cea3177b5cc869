import { afterEach, beforeEach, describe, expect, it, jest } from '@jest/globals';
import { SourceTimeoutError } from '@engines/errors';
import { withTimeout } from '@engines/with-timeout';

describe('withTimeout', () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('rejects when the operation outlives the deadline', async () => {
    const pending = withTimeout(() => new Promise<number>(() => undefined), 100, {
      operation: 'row count',
    });
    const assertion = expect(pending).rejects.toThrow(
      new SourceTimeoutError(100, { operation: 'row count' }).message,
    );

    jest.advanceTimersByTime(100);
    await assertion;
  });

  it('resolves in time and clears its timer', async () => {
    await expect(withTimeout(async () => 5, 100)).resolves.toBe(5);
    expect(jest.getTimerCount()).toBe(0);
  });
});
