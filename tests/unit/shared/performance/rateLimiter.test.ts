import { IntervalRateLimiter, NoopRateLimiter } from '../../../../src/shared/performance';

describe('IntervalRateLimiter', () => {
  it('should not wait for the first request', async () => {
    const sleep = jest.fn(async () => undefined);
    const limiter = new IntervalRateLimiter(100, 'ESI', sleep, () => 1000);

    await limiter.wait();

    expect(sleep).not.toHaveBeenCalled();
  });

  it('should space consecutive requests by the minimum interval', async () => {
    let now = 1000;
    const sleep = jest.fn(async (ms: number) => {
      now += ms;
    });
    const limiter = new IntervalRateLimiter(100, 'ESI', sleep, () => now);

    await limiter.wait();
    now += 30;
    await limiter.wait();

    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(70);
  });

  it('should release concurrent callers one at a time', async () => {
    let now = 1000;
    const sleep = jest.fn(async (ms: number) => {
      now += ms;
    });
    const limiter = new IntervalRateLimiter(100, 'ESI', sleep, () => now);

    await Promise.all([limiter.wait(), limiter.wait(), limiter.wait()]);

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 100]);
  });

  it('should derive the interval from requests per second', () => {
    const limiter = IntervalRateLimiter.perSecond(10, 'ESI');
    expect(limiter.getTimeUntilNextRequest()).toBe(0);
  });

  it('should forget the last request on reset', async () => {
    const sleep = jest.fn(async () => undefined);
    const limiter = new IntervalRateLimiter(100, 'ESI', sleep, () => 1000);

    await limiter.wait();
    limiter.reset();
    await limiter.wait();

    expect(sleep).not.toHaveBeenCalled();
  });
});

describe('NoopRateLimiter', () => {
  it('should resolve immediately', async () => {
    await expect(new NoopRateLimiter().wait()).resolves.toBeUndefined();
  });
});
