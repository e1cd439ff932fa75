import { describe, expect, it, vi } from 'vitest';
import { CallTimeoutError, callWithTimeout, retryWithBackoff } from './ResilientCall.js';

describe('callWithTimeout', () => {
  it('should pass the result through when the call is quick', async () => {
    await expect(callWithTimeout(async () => 'done', 1000)).resolves.toBe('done');
  });

  it('should reject and abort the signal at the deadline', async () => {
    const signals: AbortSignal[] = [];

    const call = callWithTimeout((signal) => {
      signals.push(signal);
      return new Promise<string>(() => undefined);
    }, 10);

    await expect(call).rejects.toBeInstanceOf(CallTimeoutError);
    expect(signals.map((signal) => signal.aborted)).toEqual([true]);
  });
});

describe('retryWithBackoff', () => {
  it('should retry until the call succeeds', async () => {
    const call = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('first'))
      .mockResolvedValueOnce('second');
    const onRetry = vi.fn();

    await expect(retryWithBackoff(call, { retries: 2, backoffMs: 0, onRetry })).resolves.toBe('second');
    expect(call).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledWith(new Error('first'), 1);
  });

  it('should give up after the configured retries', async () => {
    const call = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('down'));

    await expect(retryWithBackoff(call, { retries: 1, backoffMs: 0 })).rejects.toThrow('down');
    expect(call).toHaveBeenCalledTimes(2);
  });

  it('should double the wait between attempts', async () => {
    vi.useFakeTimers();
    try {
      const start = Date.now();
      const attempts: number[] = [];
      const call = async (): Promise<string> => {
        attempts.push(Date.now() - start);
        if (attempts.length < 3) throw new Error(`attempt ${attempts.length} failed`);
        return 'ok';
      };

      const pending = retryWithBackoff(call, { retries: 2, backoffMs: 100 });
      await vi.runAllTimersAsync();

      await expect(pending).resolves.toBe('ok');
      expect(attempts).toEqual([0, 100, 300]);
    } finally {
      vi.useRealTimers();
    }
  });
});
