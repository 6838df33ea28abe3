import { HostRateLimiter } from '../../middleware/rateLimiter';

describe('HostRateLimiter', () => {
  let limiter: HostRateLimiter;

  afterEach(async () => {
    await limiter.stop();
  });

  it('spaces navigations to the same host', async () => {
    limiter = new HostRateLimiter({ minTimeMs: 40 });
    const started: number[] = [];
    const task = async () => {
      started.push(Date.now());
    };

    await Promise.all([
      limiter.schedule('https://portal.test/a', task),
      limiter.schedule('https://portal.test/b', task),
    ]);

    expect(started).toHaveLength(2);
    expect(started[1] - started[0]).toBeGreaterThanOrEqual(35);
    expect(limiter.size).toBe(1);
  });

  it('keeps one limiter per host and returns task results', async () => {
    limiter = new HostRateLimiter({ minTimeMs: 0 });

    const results = await Promise.all([
      limiter.schedule('https://portal.test/a', async () => 'a'),
      limiter.schedule('https://other.test/b', async () => 'b'),
      limiter.schedule('not a url', async () => 'c'),
    ]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(limiter.size).toBe(3);
  });
});
