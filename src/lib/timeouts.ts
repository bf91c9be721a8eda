export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export type RetryOptions = {
  attempts: number;
  baseMs: number;
  shouldRetry: (error: unknown) => boolean;
  onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
};

/**
 * Runs `fn` up to `attempts` times, waiting base * 2^(n-1) ms between tries.
 * Errors `shouldRetry` rejects are raised immediately.
 */
export async function retryWithBackoff<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const attempts = Math.max(1, options.attempts);
  for (let attempt = 1; ; attempt += 1) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= attempts || !options.shouldRetry(error)) {
        throw error;
      }
      const delayMs = options.baseMs * 2 ** (attempt - 1);
      options.onRetry?.(attempt, delayMs, error);
      await sleep(delayMs);
    }
  }
}

/**
 * AbortSignal that fires after `ms`. Call `clear` once the guarded work ends
 * so the timer does not keep the process alive.
 */
export function deadlineSignal(ms: number, label: string): { signal: AbortSignal; clear: () => void } {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new TimeoutError(`${label} timed out after ${ms}ms`)), ms);
  return {
    signal: controller.signal,
    clear: () => clearTimeout(timer)
  };
}
