/**
 * Metric Window
 *
 * Bounded, time-ordered buffer of samples. When capacity is exceeded the
 * oldest sample is evicted. Readers always get copies, so a reader holding
 * a window never observes later writes.
 */
import { z } from 'zod';
import { MetricAggregate, MetricSample } from './types';

const MetricSampleSchema = z.object({
  kind: z.string(),
  schema_version: z.number().int().positive(),
  timestamp: z.number(),
  readings: z.record(z.string(), z.number()),
});

const SerializedWindowSchema = z.object({
  capacity: z.number().int().positive(),
  samples: z.array(MetricSampleSchema),
});

export type SerializedMetricWindow = z.infer<typeof SerializedWindowSchema>;

export class MetricWindow {
  readonly capacity: number;
  private buffer: MetricSample[] = [];

  constructor(capacity: number, samples: Iterable<MetricSample> = []) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`MetricWindow capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    for (const sample of samples) {
      this.push(sample);
    }
  }

  get size(): number {
    return this.buffer.length;
  }

  /**
   * Append a sample, keeping time order and evicting the oldest on overflow.
   */
  push(sample: MetricSample): void {
    let index = this.buffer.length;
    while (index > 0 && this.buffer[index - 1].timestamp > sample.timestamp) {
      index--;
    }
    this.buffer.splice(index, 0, sample);

    if (this.buffer.length > this.capacity) {
      this.buffer.splice(0, this.buffer.length - this.capacity);
    }
  }

  samples(): MetricSample[] {
    return [...this.buffer];
  }

  latest(): MetricSample | undefined {
    return this.buffer[this.buffer.length - 1];
  }

  /**
   * Samples strictly newer than `timestamp`, as a new window.
   */
  since(timestamp: number): MetricWindow {
    return new MetricWindow(
      this.capacity,
      this.buffer.filter((sample) => sample.timestamp > timestamp),
    );
  }

  /**
   * Readings of one metric, oldest first, skipping samples without it.
   */
  values(metric: string): number[] {
    const values: number[] = [];
    for (const sample of this.buffer) {
      const value = sample.readings[metric];
      if (value !== undefined) {
        values.push(value);
      }
    }
    return values;
  }

  aggregate(metric: string): MetricAggregate | undefined {
    const values = this.values(metric);
    if (values.length === 0) {
      return undefined;
    }

    const sum = values.reduce((acc, value) => acc + value, 0);
    return {
      count: values.length,
      min: Math.min(...values),
      max: Math.max(...values),
      avg: sum / values.length,
      last: values[values.length - 1],
    };
  }

  toJSON(): SerializedMetricWindow {
    return {
      capacity: this.capacity,
      samples: this.buffer.map((sample) => ({
        kind: sample.kind,
        schema_version: sample.schema_version,
        timestamp: sample.timestamp,
        readings: { ...sample.readings },
      })),
    };
  }

  static fromJSON(data: unknown): MetricWindow {
    const parsed = SerializedWindowSchema.parse(data);
    return new MetricWindow(parsed.capacity, parsed.samples);
  }
}
