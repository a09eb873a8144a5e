/**
 * Which failures may be attempted again, how often, and how long to wait.
 * A request that is not idempotent must only list failures that never
 * reached the server, or a retry would repeat its side effect.
 */
export interface RetryPolicy {
  attempts: number;
  baseDelayMs: number;
  isRetryable: (error: unknown) => boolean;
}

export interface RetryAttempt {
  operation: string;
  attempt: number;
  attempts: number;
  delayMs: number;
  error: unknown;
}

export type RetryListener = (attempt: RetryAttempt) => void;

export function backoffDelayMs(policy: RetryPolicy, attempt: number): number {
  return Math.max(0, policy.baseDelayMs) * 2 ** (attempt - 1);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export async function retryWithPolicy<T>(
  operation: string,
  task: () => Promise<T>,
  policy: RetryPolicy,
  onRetry: RetryListener = () => {}
): Promise<T> {
  const attempts = Number.isFinite(policy.attempts) ? Math.max(1, Math.trunc(policy.attempts)) : 1;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await task();
    } catch (error) {
      if (attempt >= attempts || !policy.isRetryable(error)) {
        throw toError(error);
      }
      const delayMs = backoffDelayMs(policy, attempt);
      onRetry({ operation, attempt, attempts, delayMs, error });
      await sleep(delayMs);
    }
  }
}
