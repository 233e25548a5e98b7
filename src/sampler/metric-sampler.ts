/**
 * Metric Sampler
 *
 * Background loop that polls every collector on a fixed (mode-adjustable)
 * interval, keeps a rolling window of samples, and publishes samples and
 * threshold-crossing signals to subscribers. Sampling never stops while the
 * sampler is running: it is how the system learns it is safe to de-escalate.
 */
import { v4 as uuidv4 } from 'uuid';
import logger from '../utils/logger';
import { Clock, systemClock } from '../utils/clock';
import { errorMessage } from '../utils/errors';
import { withTimeout } from '../utils/timeout';
import { compare, SignalThreshold } from '../policy/conditions';
import { COLLECTOR_DEGRADED, CONTROL_SIGNAL, SENSOR_POLL } from '../telemetry/events';
import { recordCollectorFailure } from '../telemetry/metrics';
import { CollectionError } from './errors';
import { MetricWindow } from './metric-window';
import { ControlSignal, MetricCollector, MetricSample, SAMPLE_SCHEMA_VERSION } from './types';

export interface MetricSamplerOptions {
  collectors: MetricCollector[];
  intervalMs: number;
  collectorTimeoutMs: number;
  windowCapacity: number;
  thresholds?: SignalThreshold[];
  clock?: Clock;
  kind?: string;
}

type Listener<T> = (value: T) => void;

export class MetricSampler {
  private readonly collectors: MetricCollector[];
  private readonly collectorTimeoutMs: number;
  private readonly thresholds: SignalThreshold[];
  private readonly clock: Clock;
  private readonly kind: string;
  private readonly buffer: MetricWindow;
  private readonly thresholdState = new Map<string, boolean>();

  private readonly sampleListeners = new Set<Listener<MetricSample>>();
  private readonly signalListeners = new Set<Listener<ControlSignal>>();
  private readonly crashListeners = new Set<Listener<Error>>();

  private intervalMs: number;
  private timer?: NodeJS.Timeout;
  private running = false;
  private inCycle = false;

  constructor(options: MetricSamplerOptions) {
    const names = new Set<string>();
    for (const collector of options.collectors) {
      if (names.has(collector.name)) {
        throw new Error(`Duplicate metric collector '${collector.name}'`);
      }
      names.add(collector.name);
    }

    this.collectors = [...options.collectors];
    this.intervalMs = MetricSampler.validateInterval(options.intervalMs);
    this.collectorTimeoutMs = options.collectorTimeoutMs;
    this.thresholds = options.thresholds ?? [];
    this.clock = options.clock ?? systemClock;
    this.kind = options.kind ?? 'system';
    this.buffer = new MetricWindow(options.windowCapacity);
  }

  private static validateInterval(intervalMs: number): number {
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new RangeError(`Sampling interval must be a positive number, got ${intervalMs}`);
    }
    return intervalMs;
  }

  get isRunning(): boolean {
    return this.running;
  }

  get interval(): number {
    return this.intervalMs;
  }

  /**
   * Collect one reading from every collector. A failing or slow collector
   * is omitted from the sample, never zero-filled.
   */
  async sample(): Promise<MetricSample> {
    const results = await Promise.all(this.collectors.map((collector) => this.collectOne(collector)));

    const readings: Record<string, number> = {};
    results.forEach((value, index) => {
      if (value !== undefined) {
        readings[this.collectors[index].name] = value;
      }
    });

    const sample: MetricSample = Object.freeze({
      kind: this.kind,
      schema_version: SAMPLE_SCHEMA_VERSION,
      timestamp: this.clock.now(),
      readings: Object.freeze(readings),
    });

    this.buffer.push(sample);

    logger.debug(
      {
        event: SENSOR_POLL,
        readings,
        missing: this.collectors.length - Object.keys(readings).length,
      },
      'Metric sample collected',
    );

    this.notify(this.sampleListeners, sample);
    this.checkThresholds(sample);
    return sample;
  }

  /**
   * Samples newer than `now - durationMs`.
   */
  window(durationMs: number): MetricWindow {
    return this.buffer.since(this.clock.now() - durationMs);
  }

  latest(): MetricSample | undefined {
    return this.buffer.latest();
  }

  onSample(listener: Listener<MetricSample>): () => void {
    this.sampleListeners.add(listener);
    return () => this.sampleListeners.delete(listener);
  }

  onSignal(listener: Listener<ControlSignal>): () => void {
    this.signalListeners.add(listener);
    return () => this.signalListeners.delete(listener);
  }

  /**
   * Subscribe to unexpected failures of the sampling loop itself.
   */
  onCrash(listener: Listener<Error>): () => void {
    this.crashListeners.add(listener);
    return () => this.crashListeners.delete(listener);
  }

  start(): void {
    if (this.running) {
      logger.warn('Metric sampler already running');
      return;
    }
    this.running = true;
    logger.info({ interval_ms: this.intervalMs, collectors: this.collectors.length }, 'Metric sampler started');
    this.schedule(0);
  }

  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    logger.info('Metric sampler stopped');
  }

  /**
   * Change the sampling interval; takes effect from the next cycle. A cycle
   * in flight reschedules itself with the new interval when it ends.
   */
  setInterval(intervalMs: number): void {
    const next = MetricSampler.validateInterval(intervalMs);
    if (next === this.intervalMs) return;

    logger.info({ from_ms: this.intervalMs, to_ms: next }, 'Sampling interval changed');
    this.intervalMs = next;
    if (this.running && !this.inCycle && this.timer) {
      clearTimeout(this.timer);
      this.schedule(next);
    }
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      void this.cycle();
    }, delayMs);
    this.timer.unref();
  }

  private async cycle(): Promise<void> {
    this.inCycle = true;
    try {
      await this.sample();
    } catch (error) {
      const crash = error instanceof Error ? error : new Error(String(error));
      logger.fatal({ error: crash.message, stack: crash.stack }, 'Metric sampling cycle crashed');
      this.notify(this.crashListeners, crash);
    } finally {
      this.inCycle = false;
    }

    if (this.running) {
      this.schedule(this.intervalMs);
    }
  }

  private async collectOne(collector: MetricCollector): Promise<number | undefined> {
    try {
      const value = await withTimeout(
        Promise.resolve().then(() => collector.collect()),
        this.collectorTimeoutMs,
        () =>
          new CollectionError(
            collector.name,
            `Collector '${collector.name}' timed out after ${this.collectorTimeoutMs}ms`,
          ),
      );

      if (!Number.isFinite(value)) {
        throw new CollectionError(collector.name, `Collector '${collector.name}' returned a non-finite value`, {
          value,
        });
      }
      return value;
    } catch (error) {
      const failure =
        error instanceof CollectionError
          ? error
          : new CollectionError(collector.name, `Collector '${collector.name}' failed: ${errorMessage(error)}`);

      logger.warn(
        { event: COLLECTOR_DEGRADED, collector: collector.name, error: failure.message },
        'Metric collector degraded',
      );
      recordCollectorFailure(collector.name);
      return undefined;
    }
  }

  private checkThresholds(sample: MetricSample): void {
    for (const threshold of this.thresholds) {
      const value = sample.readings[threshold.metric];
      if (value === undefined) continue;

      const crossed = compare(value, threshold.operator, threshold.value);
      const previously = this.thresholdState.get(threshold.name) ?? false;
      this.thresholdState.set(threshold.name, crossed);

      if (crossed && !previously) {
        const signal: ControlSignal = {
          id: uuidv4(),
          name: threshold.name,
          metric: threshold.metric,
          value,
          timestamp: sample.timestamp,
        };
        logger.info({ event: CONTROL_SIGNAL, ...signal }, 'Threshold crossed');
        this.notify(this.signalListeners, signal);
      }
    }
  }

  private notify<T>(listeners: Set<Listener<T>>, value: T): void {
    for (const listener of listeners) {
      try {
        listener(value);
      } catch (error) {
        logger.error({ error: errorMessage(error) }, 'Sampler subscriber failed');
      }
    }
  }
}
