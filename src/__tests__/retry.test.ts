import { afterEach, describe, expect, it, vi } from 'vitest';

import { backoffDelay, exponentialBackoff, isTransientError } from '../util/retry';

const httpError = (status: number): Error => Object.assign(new Error(`status ${status}`), { status });

describe('exponentialBackoff', () => {
  it('retries until the action succeeds', async () => {
    const onRetry = vi.fn();
    let attempts = 0;

    const result = await exponentialBackoff(
      async () => {
        attempts += 1;
        if (attempts < 3) {
          throw new Error('temporary outage');
        }
        return 'ok';
      },
      { maxAttempts: 3, initialDelayMs: 1, onRetry },
    );

    expect(result).toBe('ok');
    expect(attempts).toBe(3);
    expect(onRetry.mock.calls.map((call) => call[1])).toEqual([1, 2]);
  });

  it('gives up after maxAttempts', async () => {
    let attempts = 0;

    await expect(
      exponentialBackoff(
        async () => {
          attempts += 1;
          throw new Error(`failure ${attempts}`);
        },
        { maxAttempts: 2, initialDelayMs: 1 },
      ),
    ).rejects.toThrow('failure 2');
    expect(attempts).toBe(2);
  });

  it('does not retry client errors by default', async () => {
    let attempts = 0;

    await expect(
      exponentialBackoff(
        async () => {
          attempts += 1;
          throw httpError(400);
        },
        { maxAttempts: 5, initialDelayMs: 1 },
      ),
    ).rejects.toThrow('status 400');
    expect(attempts).toBe(1);
  });

  it('stops as soon as shouldRetry declines', async () => {
    let attempts = 0;

    await expect(
      exponentialBackoff(
        async () => {
          attempts += 1;
          throw new Error('bad request');
        },
        { maxAttempts: 5, initialDelayMs: 1, shouldRetry: () => false },
      ),
    ).rejects.toThrow('bad request');
    expect(attempts).toBe(1);
  });
});

describe('isTransientError', () => {
  it('treats rate limits and server failures as transient', () => {
    expect(isTransientError(httpError(429))).toBe(true);
    expect(isTransientError(httpError(503))).toBe(true);
    expect(isTransientError(new Error('socket hang up'))).toBe(true);
  });

  it('gives up on other client errors', () => {
    expect(isTransientError(httpError(401))).toBe(false);
    expect(isTransientError(httpError(404))).toBe(false);
  });
});

describe('backoffDelay', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('doubles per attempt and caps at 30 seconds', () => {
    vi.spyOn(Math, 'random').mockReturnValue(0.999_999);

    expect([1, 2, 3, 12].map((attempt) => backoffDelay(attempt, 100))).toEqual([100, 200, 400, 30_000]);
  });

  it('never waits less than half the capped delay', () => {
    vi.spyOn(Math, 'random').mockReturnValue(0);

    expect([1, 2, 3, 12].map((attempt) => backoffDelay(attempt, 100))).toEqual([50, 100, 200, 15_000]);
  });
});
