import { ManualClock } from '../../utils/clock';
import { RateLimitRule, SlidingWindowRateLimiter } from '../rate-limiter';

describe('SlidingWindowRateLimiter', () => {
  const perMinute: RateLimitRule = { key: 'tool_calls', limit: 2, windowMs: 60_000 };
  const perHour: RateLimitRule = { key: 'tool:web_search', limit: 3, windowMs: 3_600_000 };
  let clock: ManualClock;
  let limiter: SlidingWindowRateLimiter;

  beforeEach(() => {
    clock = new ManualClock(0);
    limiter = new SlidingWindowRateLimiter(clock);
  });

  it('should admit up to the limit and report when room frees up', () => {
    expect(limiter.consume([perMinute]).allowed).toBe(true);
    clock.advance(10_000);
    expect(limiter.consume([perMinute]).allowed).toBe(true);
    clock.advance(5_000);

    expect(limiter.consume([perMinute])).toEqual({ allowed: false, exceeded: perMinute, retryAfterMs: 45_000 });
  });

  it('should slide the window forward', () => {
    limiter.consume([perMinute]);
    limiter.consume([perMinute]);

    clock.advance(60_000);

    expect(limiter.consume([perMinute]).allowed).toBe(true);
    expect(limiter.usage(perMinute)).toBe(1);
  });

  it('should consume nothing when any rule refuses', () => {
    const tight: RateLimitRule = { key: 'tight', limit: 1, windowMs: 60_000 };
    limiter.consume([tight]);

    const result = limiter.consume([perHour, tight]);

    expect(result.allowed).toBe(false);
    expect(result.exceeded).toBe(tight);
    expect(limiter.usage(perHour)).toBe(0);
  });

  it('should record one admission against every rule', () => {
    limiter.consume([perMinute, perHour]);

    expect(limiter.usage(perMinute)).toBe(1);
    expect(limiter.usage(perHour)).toBe(1);

    limiter.reset();
    expect(limiter.usage(perHour)).toBe(0);
  });

  it('should refuse everything under a zero limit', () => {
    const closed: RateLimitRule = { key: 'closed', limit: 0, windowMs: 60_000 };

    expect(limiter.consume([closed])).toEqual({ allowed: false, exceeded: closed, retryAfterMs: 60_000 });
  });
});
