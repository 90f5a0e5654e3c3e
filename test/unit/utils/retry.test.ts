import { describe, it, expect, vi } from 'vitest';
import { backoffDelay, retry, sleep } from '../../../src/utils/retry.js';
import { CancelledError, DeviceConnectionError, isTransient } from '../../../src/core/errors.js';

describe('retry()', () => {
  it('should return the first successful result', async () => {
    const fn = vi.fn(async (attempt: number) => `attempt ${attempt}`);

    await expect(retry(fn, { baseDelay: 1 })).resolves.toBe('attempt 1');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should follow the explicit delay schedule', async () => {
    const delays: number[] = [];
    const fn = vi.fn(async (attempt: number) => {
      if (attempt < 3) throw new DeviceConnectionError('reset');
      return 'ok';
    });

    const result = await retry(fn, {
      delays: [1, 2, 3],
      onRetry: (_attempt, _err, delay) => delays.push(delay),
    });

    expect(result).toBe('ok');
    expect(delays).toEqual([1, 2]);
  });

  it('should make one attempt more than there are delays', async () => {
    const fn = vi.fn(async () => {
      throw new DeviceConnectionError('refused');
    });

    await expect(retry(fn, { delays: [1, 1, 1] })).rejects.toThrow('refused');
    expect(fn).toHaveBeenCalledTimes(4);
  });

  it('should stop when shouldRetry declines', async () => {
    const fn = vi.fn(async () => {
      throw new Error('permanent');
    });

    await expect(retry(fn, { delays: [1, 1], shouldRetry: isTransient })).rejects.toThrow('permanent');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should rethrow CancelledError without retrying', async () => {
    const fn = vi.fn(async () => {
      throw new CancelledError('install');
    });

    await expect(retry(fn, { delays: [1, 1] })).rejects.toBeInstanceOf(CancelledError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should abort a pending backoff', async () => {
    const controller = new AbortController();
    const fn = vi.fn(async () => {
      throw new DeviceConnectionError('reset');
    });

    const pending = retry(fn, { delays: [5000], signal: controller.signal });
    setTimeout(() => controller.abort(), 10);

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('backoffDelay()', () => {
  it('should grow exponentially up to the cap', () => {
    const opts = { baseDelay: 500, backoffFactor: 2, maxDelay: 3000 };
    expect([0, 1, 2, 3, 4].map(n => backoffDelay(n, opts))).toEqual([500, 1000, 2000, 3000, 3000]);
  });
});

describe('sleep()', () => {
  it('should reject immediately on an aborted signal', async () => {
    await expect(sleep(1000, AbortSignal.abort())).rejects.toBeInstanceOf(CancelledError);
  });
});
