import logger from '../logger';

const BACKOFF_FACTOR = 2;
const MAX_DELAY_MS = 30_000;

type BackoffOptions = {
  maxAttempts?: number;
  initialDelayMs?: number;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  shouldRetry?: (error: unknown, attempt: number) => boolean;
};

const wait = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/** Doubles per attempt up to 30s, then picks a point in the upper half of that delay. */
export const backoffDelay = (attempt: number, initialDelayMs = 500): number => {
  const cappedDelay = Math.min(initialDelayMs * BACKOFF_FACTOR ** (attempt - 1), MAX_DELAY_MS);

  return Math.round(cappedDelay / 2 + Math.random() * (cappedDelay / 2));
};

export const httpStatusOf = (error: unknown): number | undefined => {
  if (error && typeof error === 'object' && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }

  return undefined;
};

// Client errors other than rate limiting will not improve on retry.
export const isTransientError = (error: unknown): boolean => {
  const status = httpStatusOf(error);
  return !(typeof status === 'number' && status >= 400 && status < 500 && status !== 429);
};

export const exponentialBackoff = async <T>(
  action: (attempt: number) => Promise<T>,
  { maxAttempts = 5, initialDelayMs, onRetry, shouldRetry = isTransientError }: BackoffOptions = {},
): Promise<T> => {
  let attempt = 0;

  // eslint-disable-next-line no-constant-condition
  while (true) {
    attempt += 1;

    try {
      return await action(attempt);
    } catch (error) {
      if (attempt >= maxAttempts || !shouldRetry(error, attempt)) {
        throw error;
      }

      const delay = backoffDelay(attempt, initialDelayMs);

      if (onRetry) {
        try {
          onRetry(error, attempt, delay);
        } catch (hookError) {
          logger.warn({ err: hookError }, 'Retry hook threw an error.');
        }
      }

      await wait(delay);
    }
  }
};

export type { BackoffOptions };
