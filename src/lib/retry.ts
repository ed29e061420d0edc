export interface RetryPolicy {
  /** Fixed wait between attempts, in milliseconds. */
  waitMs: number;
  /** Total attempts including the first; `Infinity` blocks until the window resets. */
  maxAttempts: number;
  /** Upper bound of a random delay added to each wait. */
  jitterMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  waitMs: 10 * 60 * 1000,
  maxAttempts: Infinity,
  jitterMs: 0,
};

export const RATE_LIMIT_STATUSES: ReadonlySet<number> = new Set([403, 429]);

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Repeat `request` while it answers with a rate-limit status. The API's limit
 * window is fixed, so the wait is too.
 */
export async function retryOnRateLimit<T extends { status: number }>(
  policy: RetryPolicy,
  wait: (ms: number) => Promise<void>,
  request: () => Promise<T>,
  describe = 'request',
): Promise<T> {
  let attempt = 1;
  let result = await request();
  while (RATE_LIMIT_STATUSES.has(result.status) && attempt < policy.maxAttempts) {
    const delay = policy.waitMs + Math.floor(Math.random() * policy.jitterMs);
    console.warn(
      `Got ${result.status} for ${describe}, the API rate limit is probably exhausted. ` +
        `Setting GITHUB_TOKEN raises the limit. Waiting ${Math.round(delay / 1000)}s (attempt ${attempt}).`,
    );
    await wait(delay);
    attempt++;
    result = await request();
  }
  return result;
}
