/**
 * Fixed-delay retry policy applied uniformly to endpoint and backend attempts.
 *
 * Each attempt reports a tagged outcome instead of throwing, so callers decide
 * what "retryable" means for their transport.
 */

export type RetryPolicy = {
  /** Attempts per target, including the first one (minimum 1). */
  maxAttempts: number;
  /** Delay between attempts in milliseconds. */
  delayMs: number;
};

export type AttemptOutcome<T> =
  | { kind: 'success'; value: T }
  /** Try again on the same target. `backoff: 'linear'` scales the delay by the attempt number. */
  | { kind: 'retryable'; error: unknown; backoff?: 'fixed' | 'linear' }
  /** Give up on this target now. */
  | { kind: 'terminal'; error: unknown };

export type PolicyResult<T> =
  | { kind: 'success'; value: T; attempts: number }
  | { kind: 'exhausted'; error: unknown; attempts: number }
  | { kind: 'terminal'; error: unknown; attempts: number };

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  delayMs: 2000,
};

/** Hard ceiling so a misconfigured policy cannot amplify load on an upstream. */
const MAX_ATTEMPTS_CEILING = 10;

export type Sleep = (ms: number) => Promise<void>;

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error('Aborted'));
      return;
    }
    if (ms <= 0) {
      resolve();
      return;
    }

    const timeout = setTimeout(resolve, ms);

    if (signal) {
      const onAbort = () => {
        clearTimeout(timeout);
        reject(new Error('Aborted'));
      };
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });
}

export function normalizePolicy(policy: RetryPolicy): RetryPolicy {
  const maxAttempts = Number.isFinite(policy.maxAttempts) ? Math.floor(policy.maxAttempts) : 1;
  return {
    maxAttempts: Math.min(Math.max(1, maxAttempts), MAX_ATTEMPTS_CEILING),
    delayMs: Math.max(0, policy.delayMs),
  };
}

export function delayFor(policy: RetryPolicy, attempt: number, backoff: 'fixed' | 'linear' = 'fixed'): number {
  return backoff === 'linear' ? policy.delayMs * attempt : policy.delayMs;
}

/**
 * Runs `attempt` until it succeeds, reports a terminal outcome, or the policy
 * runs out of attempts. Never throws for outcomes; a thrown exception from
 * `attempt` is treated as terminal.
 */
export async function runWithPolicy<T>(
  policy: RetryPolicy,
  attempt: (attemptNumber: number) => Promise<AttemptOutcome<T>>,
  options: { sleep?: Sleep } = {},
): Promise<PolicyResult<T>> {
  const { maxAttempts } = normalizePolicy(policy);
  const wait = options.sleep ?? sleep;
  let lastError: unknown;

  for (let n = 1; n <= maxAttempts; n++) {
    let outcome: AttemptOutcome<T>;
    try {
      outcome = await attempt(n);
    } catch (err) {
      outcome = { kind: 'terminal', error: err };
    }

    if (outcome.kind === 'success') {
      return { kind: 'success', value: outcome.value, attempts: n };
    }
    if (outcome.kind === 'terminal') {
      return { kind: 'terminal', error: outcome.error, attempts: n };
    }

    lastError = outcome.error;
    if (n < maxAttempts) {
      await wait(delayFor(policy, n, outcome.backoff));
    }
  }

  return { kind: 'exhausted', error: lastError, attempts: maxAttempts };
}
