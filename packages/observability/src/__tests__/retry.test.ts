import { describe, expect, it, jest } from '@jest/globals';
import { backoffDelay, withExponentialBackoff } from '../retry';

describe('backoffDelay', () => {
  it('doubles per attempt up to the cap', () => {
    expect(backoffDelay(1, 200, 2000)).toBe(200);
    expect(backoffDelay(2, 200, 2000)).toBe(400);
    expect(backoffDelay(4, 200, 2000)).toBe(1600);
    expect(backoffDelay(5, 200, 2000)).toBe(2000);
  });
});

describe('withExponentialBackoff', () => {
  it('retries until the call succeeds', async () => {
    const fn = jest
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValueOnce('ok');
    const onRetry = jest.fn();

    await expect(withExponentialBackoff(fn, { baseDelayMs: 1, maxDelayMs: 1, onRetry })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledTimes(1);
  });

  it('gives up after the last attempt with the last error', async () => {
    const fn = jest.fn<() => Promise<string>>().mockRejectedValue(new Error('down'));

    await expect(withExponentialBackoff(fn, { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 1 })).rejects.toThrow('down');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('fails fast when the error is not retryable', async () => {
    const fn = jest.fn<() => Promise<string>>().mockRejectedValue(new Error('bad request'));

    await expect(
      withExponentialBackoff(fn, { maxAttempts: 5, baseDelayMs: 1, shouldRetry: () => false })
    ).rejects.toThrow('bad request');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('reports the wait before each retry', async () => {
    const fn = jest
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValueOnce('ok');
    const delays: number[] = [];

    await withExponentialBackoff(fn, {
      baseDelayMs: 10,
      maxDelayMs: 15,
      onRetry: (attempt, _error, delayMs) => {
        delays.push(delayMs);
        expect(attempt).toBe(delays.length);
      },
    });

    expect(delays).toHaveLength(2);
    expect(delays[0]).toBeGreaterThanOrEqual(10);
    expect(delays[0]).toBeLessThanOrEqual(11);
    expect(delays[1]).toBeGreaterThanOrEqual(15);
    expect(delays[1]).toBeLessThanOrEqual(17);
  });

  it('always makes at least one call', async () => {
    const fn = jest.fn<() => Promise<string>>().mockResolvedValue('ok');

    await expect(withExponentialBackoff(fn, { maxAttempts: 0 })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('wraps non-Error rejections', async () => {
    const fn = jest.fn<() => Promise<string>>().mockRejectedValue('timeout');

    await expect(withExponentialBackoff(fn, { maxAttempts: 1 })).rejects.toThrow('timeout');
  });
});
