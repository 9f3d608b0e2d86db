/**
 * Back-off policy for calls to the inference service.
 *
 * The retry loop itself lives in the generation orchestrator; this
 * module only owns the numbers and the abortable wait between attempts.
 */

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffFactor: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 8000,
  backoffFactor: 2,
};

/**
 * Delay before the retry that follows failed attempt `attempt` (1-based).
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const raw = policy.initialDelayMs * Math.pow(policy.backoffFactor, Math.max(0, attempt - 1));
  return Math.min(raw, policy.maxDelayMs);
}

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Wait `ms`, rejecting with the signal's reason if it aborts first.
 */
export const sleep: Sleeper = (ms, signal) =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
