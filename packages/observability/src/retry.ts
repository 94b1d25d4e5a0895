export interface RetryOptions {
  /** Total calls, the first one included. Values below 1 still make one call. */
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Return false to fail fast on errors that will not go away by retrying. */
  shouldRetry?: (error: unknown) => boolean;
  /** Called before each wait with the attempt that failed and the wait ahead. */
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
}

const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_BASE_DELAY_MS = 200;
const DEFAULT_MAX_DELAY_MS = 2000;
// Up to 10% on top of each wait.
const JITTER_RATIO = 0.1;

/** Wait before the retry that follows failed attempt `attempt` (1-based), without jitter. */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));
}

function wait(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export async function withExponentialBackoff<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
  const baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  const maxDelayMs = options.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= maxAttempts || (options.shouldRetry && !options.shouldRetry(error))) {
        throw asError(error);
      }
      const delay = backoffDelay(attempt, baseDelayMs, maxDelayMs);
      const delayMs = Math.round(delay + Math.random() * delay * JITTER_RATIO);
      options.onRetry?.(attempt, error, delayMs);
      await wait(delayMs);
    }
  }
}
