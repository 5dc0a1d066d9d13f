import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { RateLimiter } from '../../src/services/rate-limiter.js';
import { AbortError } from '../../src/utils/async.js';

describe('RateLimiter', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('spaces permits by 1000 / rate milliseconds', async () => {
    const limiter = new RateLimiter(2);
    const start = Date.now();
    const times: number[] = [];

    const all = Promise.all(
      [0, 1, 2].map(() => limiter.wait().then(() => times.push(Date.now() - start))),
    );
    await vi.advanceTimersByTimeAsync(1000);
    await all;

    expect(times).toEqual([0, 500, 1000]);
  });

  it('does not pace at all for a non-positive rate', async () => {
    const limiter = new RateLimiter(0);

    await limiter.wait();
    await limiter.wait();

    expect(limiter.intervalMs).toBe(0);
  });

  it('applies a new rate from the next wait', async () => {
    const limiter = new RateLimiter(1);
    limiter.setRate(4);

    expect(limiter.intervalMs).toBe(250);
  });

  it('rejects an aborted waiter without holding up the next one', async () => {
    const limiter = new RateLimiter(1);
    const start = Date.now();
    await limiter.wait();

    const controller = new AbortController();
    const cancelled = limiter.wait(controller.signal);
    const next = limiter.wait().then(() => Date.now() - start);
    const cancelledResult = expect(cancelled).rejects.toThrow('stop waiting');

    await vi.advanceTimersByTimeAsync(100);
    controller.abort(new AbortError('stop waiting'));
    await cancelledResult;
    await vi.advanceTimersByTimeAsync(900);

    expect(await next).toBe(1000);
  });
});
