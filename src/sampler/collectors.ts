/**
 * Built-in metric collectors.
 */
import os from 'os';
import { EventCounter } from './event-counter';
import { MetricCollector } from './types';

function round(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * `cpu_load`: one-minute load average as a percentage of available cores,
 * capped at 100.
 */
export function cpuLoadCollector(): MetricCollector {
  return {
    name: 'cpu_load',
    collect: () => {
      const cores = Math.max(os.cpus().length, 1);
      const [oneMinute] = os.loadavg();
      return round(Math.min((oneMinute / cores) * 100, 100));
    },
  };
}

/**
 * `memory_used`: percentage of physical memory in use.
 */
export function memoryUsedCollector(): MetricCollector {
  return {
    name: 'memory_used',
    collect: () => {
      const total = os.totalmem();
      return round(((total - os.freemem()) / total) * 100);
    },
  };
}

/**
 * Windowed count of a recorded event, exposed under the event's name.
 */
export function eventCountCollector(
  counter: EventCounter,
  event: string,
  windowMs?: number,
): MetricCollector {
  return {
    name: event,
    collect: () => counter.count(event, windowMs),
  };
}

export function systemCollectors(): MetricCollector[] {
  return [cpuLoadCollector(), memoryUsedCollector()];
}
