import { InMemorySemaphore, RedisSemaphore } from '../../src/concurrency/semaphore.js';
import { getConcurrencyLimits, DEFAULT_MAX_CONCURRENT_RELEASES } from '../../src/concurrency/limits.js';

describe('InMemorySemaphore', () => {
  test('hands out at most maxPermits and tracks the peak', async () => {
    const semaphore = new InMemorySemaphore(2);

    expect(await semaphore.tryAcquire()).toBe(true);
    expect(await semaphore.tryAcquire()).toBe(true);
    expect(await semaphore.tryAcquire()).toBe(false);
    expect(await semaphore.getInFlight()).toBe(2);
    expect(await semaphore.getAvailable()).toBe(0);

    await semaphore.release();
    expect(await semaphore.getAvailable()).toBe(1);
    expect(await semaphore.tryAcquire()).toBe(true);
    expect(semaphore.getPeak()).toBe(2);
  });

  test('ignores a release without an acquire', async () => {
    const semaphore = new InMemorySemaphore(1);
    await semaphore.release();
    expect(await semaphore.getAvailable()).toBe(1);
    expect(await semaphore.getInFlight()).toBe(0);
  });

  test('rejects a non-positive size', () => {
    expect(() => new InMemorySemaphore(0)).toThrow('Semaphore maxPermits must be > 0');
  });
});

describe('RedisSemaphore without a Redis connection', () => {
  test('fails open and reports the peak held by this instance', async () => {
    const semaphore = new RedisSemaphore('releases', 1);

    expect(await semaphore.tryAcquire()).toBe(true);
    expect(await semaphore.tryAcquire()).toBe(true);
    await semaphore.release();
    await semaphore.release();
    await semaphore.release();
    expect(await semaphore.tryAcquire()).toBe(true);

    expect(semaphore.getPeak()).toBe(2);
    expect(await semaphore.getInFlight()).toBe(0);
    expect(await semaphore.getAvailable()).toBe(1);
  });
});

describe('getConcurrencyLimits', () => {
  test('uses MAX_CONCURRENT_RELEASES when set', () => {
    expect(getConcurrencyLimits({ MAX_CONCURRENT_RELEASES: 5 })).toEqual({ releaseRuns: 5 });
    expect(getConcurrencyLimits()).toEqual({ releaseRuns: DEFAULT_MAX_CONCURRENT_RELEASES });
  });
});
