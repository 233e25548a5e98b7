/**
 * Sliding-window rate limiter
 *
 * Keeps a log of admission timestamps per key. A request is admitted only if
 * every rule that applies to it has room; admission then records the request
 * against all of them at once, so a refused request consumes nothing.
 */
import { Clock, systemClock } from '../utils/clock';

/**
 * Rate limit rule
 */
export interface RateLimitRule {
  key: string;          // Counter key, e.g. `tool:web_search:hour`
  limit: number;        // Max admissions per window
  windowMs: number;     // Window length in milliseconds
}

export interface RateLimitResult {
  allowed: boolean;
  /** First rule without room, when refused */
  exceeded?: RateLimitRule;
  /** Milliseconds until the exceeded rule admits again */
  retryAfterMs: number;
}

export class SlidingWindowRateLimiter {
  private readonly store = new Map<string, number[]>();
  private readonly clock: Clock;

  constructor(clock: Clock = systemClock) {
    this.clock = clock;
  }

  /**
   * Check every rule and, only if all have room, record one admission
   * against each.
   */
  consume(rules: readonly RateLimitRule[]): RateLimitResult {
    const now = this.clock.now();

    for (const rule of rules) {
      const used = this.recent(rule, now);
      if (used.length >= rule.limit) {
        const oldest = used[0];
        return {
          allowed: false,
          exceeded: rule,
          retryAfterMs: oldest === undefined ? rule.windowMs : Math.max(oldest + rule.windowMs - now, 0),
        };
      }
    }

    for (const rule of rules) {
      const log = this.recent(rule, now);
      log.push(now);
      this.store.set(rule.key, log);
    }
    return { allowed: true, retryAfterMs: 0 };
  }

  /**
   * Admissions counted against `rule` right now.
   */
  usage(rule: RateLimitRule): number {
    return this.recent(rule, this.clock.now()).length;
  }

  reset(): void {
    this.store.clear();
  }

  private recent(rule: RateLimitRule, now: number): number[] {
    const log = this.store.get(rule.key);
    if (!log) return [];

    const cutoff = now - rule.windowMs;
    return log.filter((timestamp) => timestamp > cutoff);
  }
}
