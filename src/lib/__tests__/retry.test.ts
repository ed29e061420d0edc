import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { retryOnRateLimit, type RetryPolicy } from '../retry.js';

const policy: RetryPolicy = { waitMs: 600_000, maxAttempts: Infinity, jitterMs: 0 };

function answers(...statuses: number[]) {
  const queue = [...statuses];
  return vi.fn(async () => ({ status: queue.shift() ?? 200 }));
}

describe('retryOnRateLimit', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns the first answer when it is not rate limited', async () => {
    const wait = vi.fn(async () => {});
    const request = answers(200);

    const result = await retryOnRateLimit(policy, wait, request);

    expect(result.status).toBe(200);
    expect(request).toHaveBeenCalledTimes(1);
    expect(wait).not.toHaveBeenCalled();
  });

  it('waits the fixed interval between rate-limited answers', async () => {
    const wait = vi.fn(async () => {});
    const request = answers(403, 429, 403, 200);

    const result = await retryOnRateLimit(policy, wait, request, 'test-org/engine@bbbb2222');

    expect(result.status).toBe(200);
    expect(request).toHaveBeenCalledTimes(4);
    expect(wait.mock.calls).toEqual([[600_000], [600_000], [600_000]]);
    expect(console.warn).toHaveBeenCalledTimes(3);
  });

  it('does not retry other errors', async () => {
    const wait = vi.fn(async () => {});
    const request = answers(500);

    const result = await retryOnRateLimit(policy, wait, request);

    expect(result.status).toBe(500);
    expect(wait).not.toHaveBeenCalled();
  });

  it('gives up after the configured number of attempts', async () => {
    const wait = vi.fn(async () => {});
    const request = answers(403, 403, 403, 200);

    const result = await retryOnRateLimit({ ...policy, maxAttempts: 2 }, wait, request);

    expect(result.status).toBe(403);
    expect(request).toHaveBeenCalledTimes(2);
    expect(wait).toHaveBeenCalledTimes(1);
  });

  it('adds jitter below the configured bound', async () => {
    vi.spyOn(Math, 'random').mockReturnValue(0.5);
    const wait = vi.fn(async () => {});

    await retryOnRateLimit({ ...policy, jitterMs: 1000 }, wait, answers(429, 200));

    expect(wait).toHaveBeenCalledWith(600_500);
  });
});
