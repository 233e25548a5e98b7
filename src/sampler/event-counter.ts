/**
 * Event Counter
 *
 * Counts occurrences of named events (policy violations, tool errors, task
 * failures) so that collectors can expose windowed counts as metrics.
 */
import { Clock, systemClock } from '../utils/clock';

export const COUNTED_EVENTS = {
  POLICY_VIOLATION: 'policy_violations',
  TOOL_ERROR: 'tool_errors',
  TASK_FAILURE: 'task_failures',
} as const;

export type CountedEvent = (typeof COUNTED_EVENTS)[keyof typeof COUNTED_EVENTS];

export class EventCounter {
  private readonly events = new Map<string, number[]>();
  private readonly retentionMs: number;
  private readonly clock: Clock;

  constructor(retentionMs: number, clock: Clock = systemClock) {
    this.retentionMs = retentionMs;
    this.clock = clock;
  }

  record(event: string): void {
    const now = this.clock.now();
    const timestamps = this.events.get(event) ?? [];
    timestamps.push(now);
    this.events.set(event, this.prune(timestamps, now));
  }

  /**
   * Occurrences within the last `windowMs` (bounded by retention).
   */
  count(event: string, windowMs = this.retentionMs): number {
    const now = this.clock.now();
    const timestamps = this.events.get(event);
    if (!timestamps) {
      return 0;
    }

    const pruned = this.prune(timestamps, now);
    this.events.set(event, pruned);
    const cutoff = now - Math.min(windowMs, this.retentionMs);
    return pruned.filter((timestamp) => timestamp > cutoff).length;
  }

  private prune(timestamps: number[], now: number): number[] {
    const cutoff = now - this.retentionMs;
    const firstKept = timestamps.findIndex((timestamp) => timestamp > cutoff);
    return firstKept === -1 ? [] : timestamps.slice(firstKept);
  }
}
