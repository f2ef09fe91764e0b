import { describe, it, expect, vi } from 'vitest';
import { AbortedError, BackoffPolicy, RetryExhaustedError, sleep } from '../backoff.js';

function instantPolicy(overrides: ConstructorParameters<typeof BackoffPolicy>[0] = {}) {
  const sleeps: number[] = [];
  const policy = new BackoffPolicy({
    baseDelayMs: 100,
    jitter: 'none',
    sleep: async (ms) => {
      sleeps.push(ms);
    },
    ...overrides,
  });
  return { policy, sleeps };
}

describe('BackoffPolicy', () => {
  it('returns the first successful result', async () => {
    const { policy, sleeps } = instantPolicy();
    const op = vi.fn().mockResolvedValue('ok');
    await expect(policy.execute(op)).resolves.toBe('ok');
    expect(op).toHaveBeenCalledTimes(1);
    expect(sleeps).toEqual([]);
  });

  it('retries with exponential delays until success', async () => {
    const { policy, sleeps } = instantPolicy({ maxAttempts: 4 });
    const op = vi
      .fn()
      .mockRejectedValueOnce(new Error('one'))
      .mockRejectedValueOnce(new Error('two'))
      .mockResolvedValue('third time');
    await expect(policy.execute(op)).resolves.toBe('third time');
    expect(op).toHaveBeenCalledTimes(3);
    expect(sleeps).toEqual([100, 200]);
  });

  it('wraps the last error once attempts run out', async () => {
    const { policy, sleeps } = instantPolicy({ maxAttempts: 3 });
    const last = new Error('still down');
    const op = vi.fn().mockRejectedValueOnce(new Error('down')).mockRejectedValueOnce(new Error('down')).mockRejectedValue(last);

    const err = await policy.execute(op).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RetryExhaustedError);
    if (!(err instanceof RetryExhaustedError)) return;
    expect(err.attempts).toBe(3);
    expect(err.lastError).toBe(last);
    expect(err.message).toBe('Gave up after 3 attempt(s)');
    expect(sleeps).toEqual([100, 200]);
  });

  it('rethrows non-retryable errors untouched', async () => {
    const { policy } = instantPolicy({ isRetryable: () => false });
    const fatal = new Error('bad request');
    const op = vi.fn().mockRejectedValue(fatal);
    await expect(policy.execute(op)).rejects.toBe(fatal);
    expect(op).toHaveBeenCalledTimes(1);
  });

  it('calls onRetry with the failed attempt and delay', async () => {
    const onRetry = vi.fn();
    const { policy } = instantPolicy({ onRetry });
    const err = new Error('flaky');
    await policy.execute(vi.fn().mockRejectedValueOnce(err).mockResolvedValue(1));
    expect(onRetry).toHaveBeenCalledWith(err, 1, 100);
  });

  it('caps the delay at maxDelayMs', () => {
    const { policy } = instantPolicy({ maxDelayMs: 250 });
    expect(policy.delayFor(1)).toBe(100);
    expect(policy.delayFor(2)).toBe(200);
    expect(policy.delayFor(3)).toBe(250);
    expect(policy.delayFor(10)).toBe(250);
  });

  it('applies full jitter below the ceiling', () => {
    const policy = new BackoffPolicy({ baseDelayMs: 1000, random: () => 0.5 });
    expect(policy.delayFor(1)).toBe(500);
    expect(policy.delayFor(2)).toBe(1000);
  });

  it('with() swaps the predicate and keeps the timing', async () => {
    const { policy, sleeps } = instantPolicy({ maxAttempts: 2 });
    const strict = policy.with({ isRetryable: (err) => err instanceof TypeError });
    expect(strict.maxAttempts).toBe(2);

    const plain = new Error('plain');
    await expect(strict.execute(vi.fn().mockRejectedValue(plain))).rejects.toBe(plain);

    await expect(strict.execute(vi.fn().mockRejectedValue(new TypeError('t')))).rejects.toBeInstanceOf(
      RetryExhaustedError,
    );
    expect(sleeps).toEqual([100]);
  });

  it('stops before the first attempt when already aborted', async () => {
    const { policy } = instantPolicy();
    const controller = new AbortController();
    controller.abort();
    const op = vi.fn().mockResolvedValue('never');
    await expect(policy.execute(op, controller.signal)).rejects.toBeInstanceOf(AbortedError);
    expect(op).not.toHaveBeenCalled();
  });
});

describe('sleep', () => {
  it('resolves after the delay', async () => {
    await expect(sleep(1)).resolves.toBeUndefined();
  });

  it('rejects with AbortedError when aborted mid-sleep', async () => {
    const controller = new AbortController();
    const pending = sleep(60_000, controller.signal);
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(AbortedError);
  });

  it('rejects immediately on an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(sleep(60_000, controller.signal)).rejects.toBeInstanceOf(AbortedError);
  });
});
