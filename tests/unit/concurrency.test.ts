import { describe, it, expect, afterEach, vi } from 'vitest';
import { FetchError } from '../../src/utils/errors.js';
import { RateLimiter } from '../../src/utils/rate-limiter.js';
import { backoffDelay, withRetry } from '../../src/utils/retry.js';
import { Semaphore } from '../../src/utils/semaphore.js';

describe('withRetry', () => {
  it('retries until the call succeeds', async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValueOnce('ok');

    await expect(withRetry(fn, { maxAttempts: 3, initialDelayMs: 1 })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('gives up after maxAttempts with the last error', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('down'));

    await expect(withRetry(fn, { maxAttempts: 2, initialDelayMs: 1 })).rejects.toThrow('down');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('fails at once when retryIf rejects the error', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new FetchError('https://x.test/', 404));

    await expect(
      withRetry(fn, {
        maxAttempts: 3,
        initialDelayMs: 1,
        retryIf: (error) => !(error instanceof FetchError) || error.retryable,
      })
    ).rejects.toThrow('Fetch failed (404) for https://x.test/');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('rejects a policy without attempts', async () => {
    const fn = vi.fn<() => Promise<string>>().mockResolvedValue('ok');

    await expect(withRetry(fn, { maxAttempts: 0 })).rejects.toThrow(RangeError);
    expect(fn).not.toHaveBeenCalled();
  });
});

describe('backoffDelay', () => {
  it('grows by the factor and stops at the cap', () => {
    const policy = { maxAttempts: 5, initialDelayMs: 100, maxDelayMs: 500, factor: 3 };

    expect([1, 2, 3].map((attempt) => backoffDelay(attempt, policy))).toEqual([100, 300, 500]);
  });
});

describe('FetchError.retryable', () => {
  it.each([
    [null, true],
    [404, false],
    [403, false],
    [408, true],
    [429, true],
    [500, true],
    [503, true],
  ])('status %s -> %s', (status, expected) => {
    expect(new FetchError('https://x.test/', status).retryable).toBe(expected);
  });
});

describe('RateLimiter', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('spaces callers one interval apart in call order', async () => {
    vi.useFakeTimers();
    const limiter = new RateLimiter(1000);
    const done: number[] = [];

    void limiter.waitForSlot().then(() => done.push(1));
    void limiter.waitForSlot().then(() => done.push(2));
    void limiter.waitForSlot().then(() => done.push(3));

    await vi.advanceTimersByTimeAsync(0);
    expect(done).toEqual([1]);

    await vi.advanceTimersByTimeAsync(999);
    expect(done).toEqual([1]);

    await vi.advanceTimersByTimeAsync(1);
    expect(done).toEqual([1, 2]);

    await vi.advanceTimersByTimeAsync(1000);
    expect(done).toEqual([1, 2, 3]);
  });

  it('does not wait with a zero interval', async () => {
    const limiter = new RateLimiter(0);
    await expect(limiter.execute(async () => 'ok')).resolves.toBe('ok');
    expect(limiter.intervalMs).toBe(0);
  });
});

describe('Semaphore', () => {
  it('rejects a limit below one', () => {
    expect(() => new Semaphore(0)).toThrow('Semaphore limit must be at least 1, got 0');
  });

  it('runs at most `limit` tasks and admits waiters in order', async () => {
    const semaphore = new Semaphore(2);
    const started: string[] = [];
    const releases = new Map<string, () => void>();

    const task = (name: string) =>
      semaphore.execute(async () => {
        started.push(name);
        await new Promise<void>((resolve) => releases.set(name, resolve));
        return name;
      });

    const results = [task('a'), task('b'), task('c'), task('d')];
    await vi.waitFor(() => expect(started).toEqual(['a', 'b']));
    expect(semaphore.running).toBe(2);
    expect(semaphore.pending).toBe(2);

    releases.get('b')?.();
    await vi.waitFor(() => expect(started).toEqual(['a', 'b', 'c']));

    releases.get('a')?.();
    await vi.waitFor(() => expect(started).toEqual(['a', 'b', 'c', 'd']));

    releases.get('c')?.();
    releases.get('d')?.();
    await expect(Promise.all(results)).resolves.toEqual(['a', 'b', 'c', 'd']);
    expect(semaphore.running).toBe(0);
    expect(semaphore.pending).toBe(0);
  });
});
