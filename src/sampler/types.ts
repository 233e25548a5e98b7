/**
 * Sampler Type Definitions
 */

/** Version of the readings layout carried by every sample */
export const SAMPLE_SCHEMA_VERSION = 1;

/**
 * One point-in-time reading. Timestamped when collection finishes; metrics
 * whose collector failed are absent rather than zero.
 */
export interface MetricSample {
  kind: string;
  schema_version: number;
  /** Milliseconds since the Unix epoch */
  timestamp: number;
  readings: Readonly<Record<string, number>>;
}

/**
 * Source of a single named reading.
 */
export interface MetricCollector {
  readonly name: string;
  collect(): number | Promise<number>;
}

/**
 * Emitted when a watched threshold is crossed (false -> true).
 * Each signal id is consumed at most once by the mode controller.
 */
export interface ControlSignal {
  id: string;
  name: string;
  metric: string;
  value: number;
  timestamp: number;
}

export interface MetricAggregate {
  count: number;
  min: number;
  max: number;
  avg: number;
  last: number;
}
